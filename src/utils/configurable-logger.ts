// src/utils/configurable-logger.ts
import * as winston from 'winston';
import * as fs from 'fs';
import * as path from 'path';
import { LoggingConfig, LoggingProfile } from '../types/config.types';

const DEFAULT_PROFILES: { [key: string]: LoggingProfile } = {
  Default: {
    appendTimestamp: false,
    timestampFormat: '',
    logLevel: 'info',
    enableWarningLog: false,
    logDirectory: 'logs'
  },
  AppendDatetime: {
    appendTimestamp: true,
    timestampFormat: 'YYYY-MM-DD-HHmmss',
    logLevel: 'info',
    enableWarningLog: true,
    logDirectory: 'logs'
  }
};

export interface LogFilePaths {
  combined: string;
  error: string;
  warning?: string;
}

const linePrinter = winston.format.printf(({ level, message, timestamp }) => {
  return `${timestamp} [${level}]: ${message}`;
});

export class ConfigurableLogger {
  private static config: LoggingProfile | null = null;
  private static startedAt: Date = new Date();

  /**
   * Build a winston logger from a logging config (or the AppendDatetime profile)
   */
  static initialize(config: LoggingConfig | undefined, writeFiles: boolean): winston.Logger {
    const effectiveConfig = this.resolveConfig(config);
    this.config = effectiveConfig;
    this.startedAt = new Date();

    const logger = winston.createLogger({
      level: effectiveConfig.logLevel,
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss'
        }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          stderrLevels: ['error', 'warn', 'info', 'debug'],
          format: winston.format.combine(winston.format.colorize(), linePrinter)
        })
      ]
    });

    if (writeFiles && this.ensureLogDirectory(effectiveConfig)) {
      const files = this.getLogFilePaths();

      logger.add(new winston.transports.File({
        filename: files.combined,
        format: winston.format.combine(winston.format.timestamp(), linePrinter)
      }));

      logger.add(new winston.transports.File({
        filename: files.error,
        level: 'error',
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.printf(({ level, message, timestamp, stack }) => {
            return `${timestamp} [${level}]: ${message}${stack ? `\n${stack}` : ''}`;
          })
        )
      }));

      if (files.warning) {
        logger.add(new winston.transports.File({
          filename: files.warning,
          level: 'warn',
          format: winston.format.combine(winston.format.timestamp(), linePrinter)
        }));
      }
    }

    return logger;
  }

  static resolveConfig(config?: LoggingConfig): LoggingProfile {
    if (!config) {
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.profile) {
      // Custom profiles shadow the built-in ones
      const custom = config.profiles?.[config.profile];
      if (custom) {
        return custom;
      }
      const builtIn = DEFAULT_PROFILES[config.profile];
      if (builtIn) {
        return builtIn;
      }
      console.warn(`Logging profile '${config.profile}' not found, using AppendDatetime`);
      return DEFAULT_PROFILES.AppendDatetime;
    }

    if (config.appendTimestamp !== undefined) {
      return {
        appendTimestamp: config.appendTimestamp,
        timestampFormat: config.timestampFormat || 'YYYY-MM-DD-HHmmss',
        logLevel: config.logLevel || 'info',
        enableWarningLog: config.enableWarningLog !== false,
        logDirectory: config.logDirectory || 'logs'
      };
    }

    return DEFAULT_PROFILES.AppendDatetime;
  }

  static generateLogFilename(baseName: string, config: LoggingProfile, now: Date = new Date()): string {
    if (!config.appendTimestamp) {
      return baseName;
    }

    let timestamp: string;
    if (config.timestampFormat === 'YYYY-MM-DD-HHmmss') {
      const year = now.getFullYear();
      const month = String(now.getMonth() + 1).padStart(2, '0');
      const day = String(now.getDate()).padStart(2, '0');
      const hours = String(now.getHours()).padStart(2, '0');
      const minutes = String(now.getMinutes()).padStart(2, '0');
      const seconds = String(now.getSeconds()).padStart(2, '0');
      timestamp = `${year}-${month}-${day}-${hours}${minutes}${seconds}`;
    } else {
      timestamp = now.toISOString().replace(/[:.]/g, '-').slice(0, -5);
    }

    const ext = path.extname(baseName);
    const name = path.basename(baseName, ext);

    return `${name}-${timestamp}${ext}`;
  }

  /**
   * Full paths of the log files for the active profile
   */
  static getLogFilePaths(): LogFilePaths {
    const config = this.config ?? this.resolveConfig();
    const logsDir = path.resolve(process.cwd(), config.logDirectory);

    const result: LogFilePaths = {
      combined: path.join(logsDir, this.generateLogFilename('combined.log', config, this.startedAt)),
      error: path.join(logsDir, this.generateLogFilename('error.log', config, this.startedAt))
    };

    if (config.enableWarningLog) {
      result.warning = path.join(logsDir, this.generateLogFilename('warning.log', config, this.startedAt));
    }

    return result;
  }

  private static ensureLogDirectory(config: LoggingProfile): boolean {
    const logsDir = path.resolve(process.cwd(), config.logDirectory);
    try {
      fs.mkdirSync(logsDir, { recursive: true });
      return true;
    } catch (error) {
      console.warn(`Could not create logs directory ${logsDir}, using console only`);
      return false;
    }
  }
}

export function createLogger(config: LoggingConfig | undefined, writeFiles: boolean): winston.Logger {
  return ConfigurableLogger.initialize(config, writeFiles);
}
