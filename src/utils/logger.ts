import pino from 'pino';
import type { Logger } from 'pino';
import { env } from '../env.js';

export const logger: Logger = pino({
  level: env.LOG_LEVEL,
  transport: env.LOG_PRETTY
    ? {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type { Logger };
