/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; piped through `pino-pretty` in
 * development so it stays readable. Every log line carries the service name
 * so lines from several cluster workers can be told apart from other
 * services in the same aggregator.
 *
 * The exported `Logger` type lets classes ask for "a logger" through DI
 * without depending on Pino directly.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  name: 'collection-dispatch',
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
