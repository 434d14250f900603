import { ILogger } from '../interfaces/services';
import winston from 'winston';

// Logger implementation following Single Responsibility Principle
export class Logger implements ILogger {
  private logger: winston.Logger;

  constructor(serviceName: string = 'septic-lookup', level: string = process.env.LOG_LEVEL || 'info') {
    this.logger = winston.createLogger({
      level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.label({ label: serviceName }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
          )
        }),
        new winston.transports.File({
          filename: `logs/${serviceName}.log`,
          level: 'info'
        }),
        new winston.transports.File({
          filename: `logs/${serviceName}-error.log`,
          level: 'error'
        })
      ]
    });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.logger.error(message, { error: error.message, stack: error.stack });
      return;
    }
    this.logger.error(message, { error });
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  static create(serviceName: string, level?: string): Logger {
    return new Logger(serviceName, level);
  }
}
