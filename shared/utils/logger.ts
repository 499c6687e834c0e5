import winston from 'winston';
import Config from './config';
import type { AppConfig } from './config';

export type LoggerSettings = Pick<AppConfig, 'NODE_ENV' | 'LOG_LEVEL' | 'SERVICE_NAME'>;

// Pretty console output outside production
const developmentFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
    const serviceStr = service ? `[${String(service)}]` : '';
    return `${String(timestamp)} ${level} ${serviceStr}: ${String(message)} ${metaStr}`;
  })
);

// One JSON object per line for log shippers
const productionFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

/**
 * Builds the root logger from validated settings. Reports are returned over HTTP,
 * so everything goes to the console and nothing is written to disk.
 */
export const buildLogger = (settings: LoggerSettings): winston.Logger =>
  winston.createLogger({
    level: settings.LOG_LEVEL,
    format: settings.NODE_ENV === 'production' ? productionFormat : developmentFormat,
    defaultMeta: {
      service: settings.SERVICE_NAME,
      environment: settings.NODE_ENV,
    },
    transports: [new winston.transports.Console()],
    exitOnError: false,
  });

const logger = buildLogger(Config);

export const performanceLogger = {
  /**
   * Runs `fn` and logs its duration at debug level. Failures are logged and rethrown.
   */
  measure: <T>(label: string, fn: () => T): T => {
    const start = Date.now();
    try {
      const result = fn();
      logger.debug(`Performance: ${label}`, { duration: `${Date.now() - start}ms` });
      return result;
    } catch (error) {
      logger.error(`Performance: ${label} (failed)`, {
        duration: `${Date.now() - start}ms`,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  },
};

export const errorLogger = {
  logUnhandledRejection: (reason: unknown) => {
    logger.error('Unhandled Promise Rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
  },

  logUncaughtException: (error: Error) => {
    logger.error('Uncaught Exception', {
      message: error.message,
      stack: error.stack,
      name: error.name,
    });
  },
};

// Create child logger for specific services
export const createServiceLogger = (serviceName: string): winston.Logger => {
  return logger.child({ service: serviceName });
};

export default logger;
