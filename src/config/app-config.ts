// src/config/app-config.ts
import dotenv from 'dotenv';
import { z } from 'zod';
import { FormatterConfig } from '../types/config.types';
import { ConfigurationError } from '../utils/errors';

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILES: z.enum(['true', 'false']).default('true'),
  BATCH_INPUT_DIR: z.string().min(1).default('original'),
  BATCH_OUTPUT_DIR: z.string().min(1).default('stripped')
});

/**
 * Read formatter settings from the environment (and .env, when present)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FormatterConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid ${issue.path.join('.')}: ${issue.message}`);
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    logFiles: parsed.data.LOG_FILES === 'true',
    batchInputDir: parsed.data.BATCH_INPUT_DIR,
    batchOutputDir: parsed.data.BATCH_OUTPUT_DIR
  };
}
