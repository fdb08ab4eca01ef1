// src/utils/logger.ts
import * as winston from 'winston';
import { createLogger } from './configurable-logger';
import { LoggingConfig } from '../types/config.types';

// Console only until a CLI command calls Logger.initialize with its settings
const logger: winston.Logger = createLogger({ profile: 'Default' }, false);

if (process.env.LOG_LEVEL) {
  logger.level = process.env.LOG_LEVEL;
}

export default logger;
export { logger };

// Wrapper class for consistent logging interface
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  /**
   * Rebuild the shared logger from a logging config.
   * File transports are only added when writeFiles is set.
   */
  static initialize(config: LoggingConfig, writeFiles: boolean): void {
    const newLogger = createLogger(config, writeFiles);

    // Swap transports on the shared instance so existing imports keep working
    const previous = [...logger.transports];
    logger.clear();
    previous.forEach(transport => transport.close?.());
    newLogger.transports.forEach(transport => {
      logger.add(transport);
    });

    logger.level = newLogger.level;
    logger.format = newLogger.format;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.error(`[${this.context}] ${message}: ${detail}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }
}
