/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * Pino writes one JSON object per line, which is what the scheduler running the
 * transform ships to log storage. In development we pipe it through `pino-pretty`
 * for colors and readable timestamps.
 *
 * The exported `Logger` type lets other modules declare "I need a logger"
 * without coupling to the concrete instance, so tests can hand in a silent one.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
