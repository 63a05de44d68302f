import logger from '../../../utils/logger';

/**
 * Log levels enum
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Logger bound to a single component tag
 */
export interface TaggedLogger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string | Error, context?: object): void;
}

/**
 * Utilities for logging in the crawler service.
 * Level filtering is left to the winston logger.
 */
export class LoggingUtils {
  /**
   * Log an error message
   * @param message The message or error to log
   * @param tag Optional component tag
   * @param context Optional context object
   */
  static error(message: string | Error, tag?: string, context?: object): void {
    if (message instanceof Error) {
      this.log(LogLevel.ERROR, message.message, tag, {
        ...context,
        stack: message.stack,
        name: message.name
      });
    } else {
      this.log(LogLevel.ERROR, message, tag, context);
    }
  }

  /**
   * Turn an unknown thrown value into a printable message
   */
  static describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  static log(level: LogLevel, message: string, tag?: string, context?: object): void {
    const formattedMessage = tag ? `[${tag}] ${message}` : message;

    switch (level) {
      case LogLevel.DEBUG:
        logger.debug(formattedMessage, context);
        break;
      case LogLevel.INFO:
        logger.info(formattedMessage, context);
        break;
      case LogLevel.WARN:
        logger.warn(formattedMessage, context);
        break;
      case LogLevel.ERROR:
        logger.error(formattedMessage, context);
        break;
    }
  }

  /**
   * Create a scoped logger with a fixed tag
   * @param tag The tag to scope the logger with
   */
  static createTaggedLogger(tag: string): TaggedLogger {
    return {
      debug: (message: string, context?: object) => this.log(LogLevel.DEBUG, message, tag, context),
      info: (message: string, context?: object) => this.log(LogLevel.INFO, message, tag, context),
      warn: (message: string, context?: object) => this.log(LogLevel.WARN, message, tag, context),
      error: (message: string | Error, context?: object) => this.error(message, tag, context)
    };
  }
}
