import winston from 'winston';
import { env } from '../config/env';

export const logger = winston.createLogger({
  level: env.NODE_ENV === 'production' ? 'info' : 'debug',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    env.NODE_ENV === 'production'
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  defaultMeta: { service: 'studio-dm-assistant' },
  transports: [new winston.transports.Console({ silent: env.NODE_ENV === 'test' })],
});

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
