// src/cli/bootstrap.ts
import { loadConfig } from '../config/app-config';
import { FormatterConfig } from '../types/config.types';
import { DEFAULT_LOG_CONFIG_PATH, initializeLogger } from '../utils/log-config-loader';
import logger from '../utils/logger';

export interface BootstrapOptions {
  env?: NodeJS.ProcessEnv;
  logConfigPath?: string;
}

/**
 * Load settings (.env included) and set up logging for a CLI command
 */
export function bootstrap(options: BootstrapOptions = {}): FormatterConfig {
  const env = options.env ?? process.env;
  const config = loadConfig(env);

  initializeLogger(config.logFiles, options.logConfigPath ?? DEFAULT_LOG_CONFIG_PATH);

  // An explicit LOG_LEVEL wins over the log-config.json profile
  if (env.LOG_LEVEL) {
    logger.level = config.logLevel;
  }
  return config;
}
