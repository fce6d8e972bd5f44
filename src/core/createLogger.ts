import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { Logger } from '../types';

/**
 * Logger Configuration
 */
export interface LoggerConfig {
  appName: string;
  logDir?: string;
  logLevel?: string;
  logFile?: string;
  errorLogFile?: string;
  console?: boolean;
}

const MAX_LOG_SIZE = 10 * 1024 * 1024; // 10MB

/**
 * Create a Winston logger instance
 *
 * Writes every level to `<logDir>/<appName>.log` and errors to
 * `<logDir>/error-<appName>.log`. The console transport is optional because
 * the interactive menu owns stdout.
 *
 * @param config - Logger configuration
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    appName,
    logDir = path.join(process.cwd(), 'logs'),
    logLevel = process.env.LOG_LEVEL || 'info',
    logFile,
    errorLogFile,
    console: enableConsole = false,
  } = config;

  // Ensure logs directory exists
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  // Determine log file paths
  const mainLogFile = logFile || path.join(logDir, `${appName}.log`);
  const errLogFile = errorLogFile || path.join(logDir, `error-${appName}.log`);

  const transports: winston.transport[] = [];

  // Console output
  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message }) => {
            return `${timestamp} ${level}: ${message}`;
          })
        ),
      })
    );
  }

  // File output - all logs
  transports.push(
    new winston.transports.File({
      filename: mainLogFile,
      maxsize: MAX_LOG_SIZE,
      maxFiles: 5,
    })
  );

  // File output - errors only
  transports.push(
    new winston.transports.File({
      filename: errLogFile,
      level: 'error',
      maxsize: MAX_LOG_SIZE,
      maxFiles: 5,
    })
  );

  const winstonLogger = winston.createLogger({
    level: logLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        let log = `${timestamp} [${level.toUpperCase()}]: ${message}`;
        if (Object.keys(meta).length > 0) {
          log += ` ${JSON.stringify(meta)}`;
        }
        return log;
      })
    ),
    transports,
  });

  const write =
    (level: 'info' | 'warn' | 'error' | 'debug') =>
    (message: string, meta?: Record<string, unknown>): void => {
      if (meta) {
        winstonLogger.log(level, message, meta);
      } else {
        winstonLogger.log(level, message);
      }
    };

  return {
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    debug: write('debug'),
  };
}

/**
 * Create a null logger (for testing - does nothing)
 */
export function createNullLogger(): Logger {
  return {
    info(): void {},
    warn(): void {},
    error(): void {},
    debug(): void {},
  };
}
