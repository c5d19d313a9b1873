/**
 * Defines the available logging levels.
 */
export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Service for handling application logging with context and severity levels.
 * Currently writes to the console.
 */
class LoggerService {
  private formatMessage(context: string, message: string): string {
    return `[${context}] ${message}`;
  }

  /**
   * Log an informational message.
   * @param context The context/component where the log originated.
   * @param message The message to log.
   * @param data Optional data to log.
   */
  info(context: string, message: string, data?: unknown): void {
    console.log(this.formatMessage(context, message), data !== undefined ? data : '');
  }

  /**
   * Log a warning message.
   * @param context The context/component where the log originated.
   * @param message The message to log.
   * @param data Optional data to log.
   */
  warn(context: string, message: string, data?: unknown): void {
    console.warn(this.formatMessage(context, message), data !== undefined ? data : '');
  }

  /**
   * Log an error message.
   * @param context The context/component where the log originated.
   * @param message The message to log.
   * @param error Optional error object or data.
   */
  error(context: string, message: string, error?: unknown): void {
    console.error(this.formatMessage(context, message), error !== undefined ? error : '');
  }

  /**
   * Log a debug message.
   * @param context The context/component where the log originated.
   * @param message The message to log.
   * @param data Optional data to log.
   */
  debug(context: string, message: string, data?: unknown): void {
    console.debug(this.formatMessage(context, message), data !== undefined ? data : '');
  }
}

export const Logger = new LoggerService();

/**
 * Logger bound to a single context tag.
 */
export interface ContextLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
  debug(message: string, data?: unknown): void;
}

/**
 * Creates a logger that prefixes every message with `context`.
 */
export const createLogger = (context: string): ContextLogger => ({
  info: (message, data) => Logger.info(context, message, data),
  warn: (message, data) => Logger.warn(context, message, data),
  error: (message, error) => Logger.error(context, message, error),
  debug: (message, data) => Logger.debug(context, message, data),
});

/**
 * Shortens an identifier for log output.
 */
export const redactId = (id: string): string =>
  id.length > 8 ? `${id.slice(0, 8)}...` : id;
