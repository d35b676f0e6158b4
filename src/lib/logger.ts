import pino from 'pino';
import { env } from '../config/env.js';

export type Logger = pino.Logger;

/**
 * Creates the build logger.
 *
 * Interactive runs go through `pino-pretty` (colorized, no pid/hostname);
 * with `LOG_JSON` set, plain JSON lines are written to stdout instead.
 */
export function createLogger(level: pino.LevelWithSilent = env.LOG_LEVEL): Logger {
  if (env.LOG_JSON || level === 'silent') {
    return pino({ level, base: { service: 'postpress' } });
  }

  const transport = pino.transport({
    target: 'pino-pretty',
    options: {
      colorize: true,
      singleLine: true,
      translateTime: 'SYS:HH:MM:ss',
      ignore: 'pid,hostname,service',
    },
  });

  return pino({ level, base: { service: 'postpress' } }, transport);
}

/** Logger that discards everything; used by tests and library callers that bring no logger. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
