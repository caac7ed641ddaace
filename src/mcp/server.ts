import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { WorkflowDeps } from '../git/types.js';
import { mcpLogger, serializeError } from '../logging/index.js';
import { ExecaCommandRunner, type CommandRunner } from '../runner/commandRunner.js';
import type { RepositoryLock } from '../runner/repositoryLock.js';
import * as tools from './tools/index.js';

export const SERVER_NAME = 'gitlab-flow-mcp';
export const SERVER_VERSION = '0.1.0';

// Tool names registered by createMcpServer, in registration order
export const REGISTERED_MCP_TOOLS = [
  'create_merge_request',
  'rebase_on_staging',
  'health_check',
] as const;

export interface ServerOptions {
  runner?: CommandRunner;
  /** Read on every tool call; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  lock?: RepositoryLock;
}

export function createMcpServer(options: ServerOptions = {}): McpServer {
  const deps: WorkflowDeps = {
    runner: options.runner ?? new ExecaCommandRunner(),
    env: options.env,
    lock: options.lock,
  };

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool('create_merge_request', tools.createMergeRequestSchema, (args) => tools.createMergeRequest(args, deps));
  server.registerTool('rebase_on_staging', tools.rebaseOnStagingSchema, () => tools.rebaseOnStaging(deps));
  server.registerTool('health_check', tools.healthCheckSchema, () => tools.healthCheck(deps));

  return server;
}

export async function startStdioServer(options: ServerOptions = {}): Promise<McpServer> {
  const server = createMcpServer(options);
  const transport = new StdioServerTransport();
  try {
    await server.connect(transport);
  } catch (error) {
    mcpLogger.fatal({ error: serializeError(error) }, 'Error starting MCP server');
    throw error;
  }
  mcpLogger.info({ tools: REGISTERED_MCP_TOOLS }, `${SERVER_NAME} running on stdio`);
  return server;
}
