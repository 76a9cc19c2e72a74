import { z } from 'zod';
import dotenv from 'dotenv';
import { logger } from './logger.config';
import { ConfigurationException } from '../utils/exceptions';

// Define the schema for environment variables
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Season label used when a command does not pass one
  DEFAULT_SEASON: z
    .string()
    .regex(/^\d{4}-\d{2}$/, 'DEFAULT_SEASON must look like 2024-25')
    .default('2024-25'),

  // Dataset the CLI loads when --data is not given
  FANTASY_DATA_FILE: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate an environment object. Every failing variable is logged before throwing.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    logger.error('Environment validation failed');
    result.error.issues.forEach((issue) => {
      logger.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    });
    throw new ConfigurationException('Invalid environment configuration');
  }
  return result.data;
}

/**
 * Load `.env` into process.env, then validate it.
 */
export function loadProcessEnv(): Env {
  dotenv.config();
  return loadEnv(process.env);
}
