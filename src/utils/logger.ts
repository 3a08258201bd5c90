// utils/logger.ts
import winston from 'winston';
import { env } from '../config/env.js';

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const consoleFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(ts)} ${level} ${String(message)}${rest}`;
});

function buildTransports(): winston.transport[] {
  if (env.LOG_FILE) {
    return [new winston.transports.File({ filename: env.LOG_FILE, format: combine(timestamp(), errors({ stack: true }), json()) })];
  }
  // stdout belongs to the table display
  return [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: combine(colorize(), timestamp({ format: 'HH:mm:ss' }), consoleFormat),
    }),
  ];
}

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  silent: env.NODE_ENV === 'test',
  transports: buildTransports(),
});

export default logger;
