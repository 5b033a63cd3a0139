import winston from 'winston';
import { redactSensitive } from './safeLogger';

const { combine, timestamp, errors, splat, json, colorize, printf } = winston.format;

const isProduction = process.env.NODE_ENV === 'production';

const devLine = printf(
  (info) => `${info.timestamp} ${info.level} [${info.service}]: ${info.message}${info.stack ? '\n' + info.stack : ''}`
);

// Every entry passes redactSensitive before any transport serializes it.
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: { service: 'gigboard-auth' },
  format: combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    errors({ stack: true }),
    splat(),
    redactSensitive(),
    json()
  ),
  transports: [
    new winston.transports.Console({
      format: isProduction ? json() : combine(colorize(), devLine),
    }),
  ],
});

export default logger;
