// logger-service.ts
import { Logger, createLogger, transports, format } from 'winston';
import { ILogger, LogLevel } from '../../types/logger';

class LoggerService implements ILogger {
  private logger: ILogger;

  constructor(customLogger?: ILogger, level: LogLevel = 'info') {
    this.logger = customLogger || this.createDefaultLogger(level);
  }

  private createDefaultLogger(level: LogLevel): Logger {
    return createLogger({
      level,
      format: format.combine(
        format.colorize(),
        format.timestamp(),
        format.splat(),
        format.printf(({ timestamp, level, message, ...meta }) => {
          const context = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}]: ${message}${context}`;
        }),
      ),
      transports: [new transports.Console()],
    });
  }

  info(message: string, ...meta: unknown[]): void {
    this.logger.info(message, ...meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.logger.error(message, ...meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.logger.warn(message, ...meta);
  }

  debug(message: string, ...meta: unknown[]): void {
    this.logger.debug(message, ...meta);
  }
}

export { LoggerService, ILogger };
