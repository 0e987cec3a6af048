import pino, { LoggerOptions } from 'pino';
import { config } from '../config/env';

// Shared by the standalone logger and Fastify's request logger.
export const loggerOptions: LoggerOptions = {
  level: config.LOG_LEVEL,
  base: { service: 'print-shop-erp' },
  redact: ['req.headers.authorization', '*.password', '*.token'],
  ...(config.NODE_ENV === 'development'
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
};

export const logger = pino(loggerOptions);

export function moduleLogger(module: string) {
  return logger.child({ module });
}
