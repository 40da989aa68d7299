/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per log line. In development the stream is piped through
 * `pino-pretty` for colours and readable timestamps. Every line carries
 * `app: food-truck-orm` in place of pino's default pid/hostname.
 *
 * The logger carries operational events only (pool opened, rows written,
 * commits). The demo's actual output, the formatted SQL and the report
 * lines, goes to stdout from the entry script.
 *
 * The exported `Logger` type lets classes declare "I need a logger" without
 * coupling to Pino directly.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  base: { app: 'food-truck-orm' },
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
