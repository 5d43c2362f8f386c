import winston from 'winston';
import { config } from './index';

const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${rest}`;
  })
);

export const logger = winston.createLogger({
  level: config.logLevel,
  format:
    config.env === 'production'
      ? winston.format.combine(winston.format.timestamp(), winston.format.json())
      : devFormat,
  transports: [new winston.transports.Console({ silent: config.env === 'test' })],
});
