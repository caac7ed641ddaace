import { z } from 'zod';
import { checkHealth, type HealthCheckDeps } from '../../git/healthcheck.js';
import { mcpLogger } from '../../logging/index.js';
import { textResponse, type ToolResponse } from './shared/response.js';

export const healthCheckParams = z.object({});

export const healthCheckSchema = {
  description: `Check that the server is ready: GITLAB_USERNAME and PROJECT_DIR are set,
PROJECT_DIR exists, which target branch is in effect, glab is installed and
authenticated, and git is installed. One ✅/❌ line per check.`,
  inputSchema: healthCheckParams.shape,
};

export async function healthCheck(deps: HealthCheckDeps): Promise<ToolResponse> {
  mcpLogger.toolCall('health_check');
  const lines = await checkHealth(deps);
  return textResponse(lines.join('\n'));
}
