/**
 * Logger interface for the helpers that touch the filesystem
 */
export interface ILogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  error(message: string, error?: Error, data?: unknown): void;
}

/**
 * Default logger; discards everything.
 */
export class NoOpLogger implements ILogger {
  debug(_message: string, _data?: unknown): void {}

  info(_message: string, _data?: unknown): void {}

  error(_message: string, _error?: Error, _data?: unknown): void {}
}
