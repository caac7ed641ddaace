import pino from 'pino';
import { buildLogger } from './factory.js';

const { logger: rootLogger, flush: flushDestination } = buildLogger();

export const logger = rootLogger;

export async function flushLogger(): Promise<void> {
  await flushDestination();
}

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}

function withHelpers<T extends pino.Logger, H extends Record<string, unknown>>(child: T, helpers: H): T & H {
  return Object.assign(child, helpers);
}

export const configLogger = createChildLogger('CONFIG');

const baseGitLogger = createChildLogger('GIT');
export const gitLogger = withHelpers(baseGitLogger, {
  command(command: string, args: readonly string[], exitCode: number, durationMs: number) {
    baseGitLogger.debug({ command, args, exitCode, durationMs }, `${command} exited with ${exitCode}`);
  },
});

const baseMcpLogger = createChildLogger('MCP');
export const mcpLogger = withHelpers(baseMcpLogger, {
  toolCall(toolName: string, params?: unknown) {
    baseMcpLogger.debug({ toolName, params }, 'Tool call executed');
  },
  toolError(toolName: string, error: string) {
    baseMcpLogger.error({ toolName, error }, 'Tool call failed');
  },
});

export function serializeError(err: Error | unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return {
      type: err.name,
      message: err.message,
      stack: err.stack,
    };
  }
  return { message: String(err) };
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = seconds / 60;
  return `${minutes.toFixed(1)}m`;
}
