import pino from 'pino';
import { logLevelSchema } from '../config/validation.js';

const level = logLevelSchema.catch('info').parse(process.env.LOG_LEVEL?.toLowerCase());

export const logger = pino({
  level,
  transport:
    process.env.NODE_ENV === 'development'
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
