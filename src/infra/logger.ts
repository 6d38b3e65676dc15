import winston from 'winston';
import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Find project root to place logs correctly
let currentDir = __dirname;
let projectRoot = currentDir;
while (currentDir !== path.dirname(currentDir)) {
  if (fs.existsSync(path.join(currentDir, 'package.json'))) {
    projectRoot = currentDir;
    break;
  }
  currentDir = path.dirname(currentDir);
}

const logsDir = path.join(projectRoot, 'logs');

export type LogContext = Record<string, unknown>;

export interface ILogger {
  info(message: string, context?: LogContext): void;
  error(message: string, error?: unknown): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export class WinstonLogger implements ILogger {
  private logger: winston.Logger;
  private static sharedLogger: winston.Logger | null = null;

  constructor() {
    // All workers share one logger so lines land in the same file
    if (!WinstonLogger.sharedLogger) {
      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }

      WinstonLogger.sharedLogger = winston.createLogger({
        level: process.env.LOG_LEVEL || 'info',
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json()
        ),
        transports: [
          new winston.transports.Console({
            format: winston.format.combine(
              winston.format.colorize(),
              winston.format.printf(({ timestamp, level, message, ...meta }) => {
                return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
              })
            ),
          }),
          new winston.transports.File({
            filename: path.join(logsDir, 'steprunner.log'),
            level: 'debug',
            options: { flags: 'a' }
          }),
        ],
      });

      WinstonLogger.sharedLogger.on('error', (err) => {
        console.error('Winston logger error:', err);
      });
    }

    this.logger = WinstonLogger.sharedLogger;
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, context);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, {
        errorMessage: error.message,
        errorName: error.name,
        stack: error.stack,
      });
    } else if (error !== undefined) {
      this.logger.error(message, { error });
    } else {
      this.logger.error(message);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }
}

export class LoggerStub implements ILogger {
  info(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: unknown): void {}
  warn(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
}
