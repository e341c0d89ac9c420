/**
 * Structured Logger using Winston
 * Pretty console output in development, JSON plus rotated files in production
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const env = process.env.NODE_ENV ?? 'development';
const isDevelopment = env !== 'production';
const isTest = env === 'test' || process.env.VITEST === 'true';

const level = process.env.LOG_LEVEL ?? (isDevelopment ? 'debug' : 'info');

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.metadata(),
  isDevelopment
    ? winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, metadata }) => {
          const meta = typeof metadata === 'object' && metadata !== null ? metadata : {};
          const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
          return `[${timestamp}] ${level}: ${message}${metaStr}`;
        })
      )
    : winston.format.json()
);

const consoleTransport = new winston.transports.Console({ level });

const fileTransports: winston.transport[] = [];

if (!isDevelopment) {
  fileTransports.push(
    new DailyRotateFile({
      filename: 'logs/error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '14d',
      format: winston.format.json(),
    })
  );

  fileTransports.push(
    new DailyRotateFile({
      filename: 'logs/combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '7d',
      format: winston.format.json(),
    })
  );
}

const logger = winston.createLogger({
  level,
  format: logFormat,
  transports: [consoleTransport, ...fileTransports],
  silent: isTest,
  exitOnError: false,
});

export type LogContext = Record<string, unknown>;

// One child per workflow run so every line carries the run id
export function withCorrelationId(correlationId: string) {
  return logger.child({ correlationId });
}

export const logInfo = (message: string, context?: LogContext) => logger.info(message, context);

export const logWarn = (message: string, context?: LogContext) => logger.warn(message, context);

export const logError = (message: string, error?: unknown, context?: LogContext) => {
  logger.error(message, {
    ...context,
    error:
      error instanceof Error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
          }
        : error === undefined
          ? undefined
          : { message: String(error) },
  });
};

export const logDebug = (message: string, context?: LogContext) => logger.debug(message, context);

export default logger;
