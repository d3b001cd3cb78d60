import path from 'path';
import winston from 'winston';
import type { ILogger, LogMeta } from '../interfaces/IService';

export interface LoggerOptions {
  level?: string;
  directory?: string; // file transports are only added when set
  silent?: boolean;
  service?: string;
}

export class Logger implements ILogger {
  private logger: winston.Logger;

  constructor(options: LoggerOptions = {}) {
    const transports: Array<
      winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
    > = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      })
    ];

    if (options.directory) {
      transports.push(
        new winston.transports.File({
          filename: path.join(options.directory, 'error.log'),
          level: 'error'
        }),
        new winston.transports.File({
          filename: path.join(options.directory, 'combined.log')
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level ?? 'info',
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: options.service ?? 'flight-performance' },
      transports
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    const logData = {
      ...meta,
      error: error instanceof Error ? {
        message: error.message,
        stack: error.stack,
        name: error.name
      } : error
    };
    this.logger.error(message, logData);
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }
}
