import pino from 'pino';
import type { SonicBoom } from 'sonic-boom';
import { getLoggingConfig, type LoggingConfig } from './config.js';

export type LoggerBundle = {
  logger: pino.Logger;
  flush: () => Promise<void>;
  destination: SonicBoom | null;
};

function createDestination(destination: LoggingConfig['destination']): SonicBoom {
  if (destination === 'stdout') {
    return pino.destination({ dest: 1, sync: false });
  }

  if (destination === 'stderr') {
    return pino.destination({ dest: 2, sync: false });
  }

  return pino.destination({
    dest: destination,
    append: true,
    mkdir: true,
    sync: false,
  });
}

function flushDestination(destination: SonicBoom): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    destination.flush((err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

export function prettyDestination(destination: LoggingConfig['destination']): number | string {
  if (destination === 'stdout') return 1;
  if (destination === 'stderr') return 2;
  return destination;
}

export function buildLogger(config: LoggingConfig = getLoggingConfig()): LoggerBundle {
  const baseOptions = {
    name: 'gitlab-flow-mcp',
    level: config.level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.format === 'pretty') {
    const target = prettyDestination(config.destination);
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: typeof target === 'number',
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: target,
        mkdir: true,
        append: true,
      },
    });

    return {
      logger: pino(baseOptions, transport),
      destination: null,
      flush: async () => {},
    };
  }

  const destination = createDestination(config.destination);
  return {
    logger: pino(baseOptions, destination),
    destination,
    flush: () => flushDestination(destination),
  };
}
