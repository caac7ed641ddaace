import pino from 'pino';

export type LoggingConfig = {
  level: pino.Level;
  destination: 'stdout' | 'stderr' | string;
  format: 'json' | 'pretty';
};

const VALID_LEVELS: pino.Level[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLevel(value: string): value is pino.Level {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

function resolveLogLevel(env: NodeJS.ProcessEnv): pino.Level {
  const level = env.LOG_LEVEL?.trim().toLowerCase();

  if (level && isLevel(level)) {
    return level;
  }

  return env.NODE_ENV === 'test' ? 'warn' : 'info';
}

function resolveFormat(env: NodeJS.ProcessEnv): 'json' | 'pretty' {
  const rawFormat = env.LOG_FORMAT?.trim().toLowerCase();
  const prettyFlag = (env.LOG_PRETTY || '').trim().toLowerCase();

  if (!rawFormat) {
    return prettyFlag === '1' || prettyFlag === 'true' ? 'pretty' : 'json';
  }

  if (rawFormat === 'json') return 'json';
  if (rawFormat === 'pretty') return 'pretty';

  throw new Error('LOG_FORMAT must be "json" or "pretty".');
}

// stdout belongs to the MCP JSON-RPC stream, so logs default to stderr
function resolveDestination(env: NodeJS.ProcessEnv): 'stdout' | 'stderr' | string {
  const destination = env.LOG_DESTINATION?.trim();
  if (!destination || destination === 'stderr') {
    return 'stderr';
  }

  if (destination === 'stdout') {
    return 'stdout';
  }

  return destination;
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  return {
    level: resolveLogLevel(env),
    destination: resolveDestination(env),
    format: resolveFormat(env),
  };
}
