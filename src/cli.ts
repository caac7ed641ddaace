#!/usr/bin/env node

import { loadEnvOnce } from './env/index.js';

async function main(): Promise<void> {
  // .env must be applied before the logger reads LOG_* at import time
  loadEnvOnce();
  const { startStdioServer } = await import('./mcp/server.js');
  const { flushLogger, mcpLogger, serializeError } = await import('./logging/index.js');

  const server = await startStdioServer();

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    mcpLogger.info({ signal }, 'Shutting down');
    await server.close();
    await flushLogger();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        mcpLogger.error({ error: serializeError(error) }, 'Error during shutdown');
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error('Error starting MCP server', error);
  process.exit(1);
});
