import { z, ZodError } from 'zod';
import { ConfigError } from '../domain/errors.js';

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // MoneyMoney automation
  MONEYMONEY_APP_NAME: z.string().min(1).default('MoneyMoney'),
  MONEYMONEY_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1000, { message: 'MONEYMONEY_TIMEOUT_MS must be at least 1000' })
    .default(60000),
  OSASCRIPT_PATH: z.string().min(1).default('osascript'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates and parses environment variables.
 * Throws a ConfigError listing every invalid variable.
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Environment validation failed: ${issues.join('; ')}`, { issues });
    }
    throw error;
  }
}
