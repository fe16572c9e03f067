/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import { config } from '../config.js';

const pretty =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino({
  level: config.LOG_LEVEL.toLowerCase(),
  transport: pretty
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

/**
 * Options object handed to Fastify so request logs share the same settings.
 */
export const loggerConfig = {
  level: config.LOG_LEVEL.toLowerCase(),
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
};
