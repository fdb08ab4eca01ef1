// src/utils/log-config-loader.ts
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { LoggingConfig } from '../types/config.types';
import { ConfigurationError, errorMessage } from './errors';
import { Logger } from './logger';

export const DEFAULT_LOG_CONFIG_PATH = path.join(process.cwd(), 'config', 'log-config.json');

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const LoggingProfileSchema = z.object({
  appendTimestamp: z.boolean(),
  timestampFormat: z.string(),
  logLevel: LogLevelSchema,
  enableWarningLog: z.boolean(),
  logDirectory: z.string().min(1)
});

const LoggingConfigSchema = z.object({
  profile: z.string().min(1).optional(),
  profiles: z.record(LoggingProfileSchema).optional(),
  appendTimestamp: z.boolean().optional(),
  timestampFormat: z.string().optional(),
  logLevel: LogLevelSchema.optional(),
  enableWarningLog: z.boolean().optional(),
  logDirectory: z.string().min(1).optional()
});

/**
 * Read and validate a log-config.json. Returns undefined when the file is absent.
 */
export function loadLoggingConfig(configPath: string = DEFAULT_LOG_CONFIG_PATH): LoggingConfig | undefined {
  if (!fs.existsSync(configPath)) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Invalid ${configPath}: ${errorMessage(error)}`);
  }

  const parsed = LoggingConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid ${configPath}: ${issue.path.join('.')}: ${issue.message}`);
  }

  return parsed.data;
}

/**
 * Initialize the shared logger from log-config.json, or the Default profile
 * when there is none. Call this at the start of any CLI command.
 */
export function initializeLogger(writeFiles: boolean, configPath: string = DEFAULT_LOG_CONFIG_PATH): LoggingConfig {
  const loggingConfig = loadLoggingConfig(configPath) ?? { profile: 'Default' };

  Logger.initialize(loggingConfig, writeFiles);

  const logger = new Logger('LogConfigLoader');
  logger.debug(`Initialized logger with profile: ${loggingConfig.profile || 'direct settings'}`);

  return loggingConfig;
}
