import winston from 'winston';
import path from 'path';

export type Logger = winston.Logger;

const logLevel = process.env.LOG_LEVEL || 'info';
const logFilePath = process.env.LOG_FILE_PATH || 'logs/app.log';
const isProduction = process.env.NODE_ENV === 'production';

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
    const serviceLabel = service ? `[${service}]` : '';
    const metaString = Object.keys(meta).length
      ? ` ${JSON.stringify(meta)}`
      : '';
    return `${timestamp} ${level} ${serviceLabel} ${message}${metaString}`;
  }),
);

const logger = winston.createLogger({
  level: logLevel,
  format: logFormat,
  defaultMeta: { service: 'post-scheduler-bot' },
  silent: process.env.NODE_ENV === 'test' && !process.env.VERBOSE_TESTS,
  transports: [
    new winston.transports.Console({
      format: isProduction ? logFormat : consoleFormat,
    }),
  ],
});

// Add file transport in production
if (isProduction) {
  logger.add(
    new winston.transports.File({
      filename: path.resolve(logFilePath),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      tailable: true,
    }),
  );

  logger.add(
    new winston.transports.File({
      filename: path.resolve('logs/error.log'),
      level: 'error',
      maxsize: 5242880,
      maxFiles: 5,
      tailable: true,
    }),
  );
}

export const createLogger = (service?: string): Logger => {
  return logger.child({ service });
};

export default logger;
