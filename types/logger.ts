export interface ILogger {
  info(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  debug(message: string, ...meta: unknown[]): void;
}

export type LogLevel = 'silly' | 'debug' | 'info' | 'warn' | 'error';
