import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Creates the root logger. JSON lines with ISO timestamps; pretty-printed when
 * NODE_ENV is "development".
 */
export function createLogger(level: string, service = 'permit-intake'): Logger {
  const isDevelopment = process.env.NODE_ENV === 'development';

  return pino({
    level,
    base: { service },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Logger that discards everything; used where no logger is injected.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
