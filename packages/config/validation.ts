/**
 * Environment validation
 *
 * Runs the zod schema over process.env and reports every problem at once.
 */

import { getLogger } from '@kernel/logger';

import { envSchema, type EnvConfig } from './schema';

const logger = getLogger('config');

export interface ValidationResult {
  valid: boolean;
  /** One entry per offending variable */
  invalid: Array<{ key: string; reason: string }>;
  config?: EnvConfig | undefined;
}

/**
 * Validate environment without throwing
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return { valid: true, invalid: [], config: result.data };
  }

  const invalid: Array<{ key: string; reason: string }> = [];
  for (const issue of result.error.issues) {
    const key = String(issue.path[0] ?? '(root)');
    if (!invalid.some(i => i.key === key)) {
      invalid.push({ key, reason: issue.message });
    }
  }
  return { valid: false, invalid };
}

/**
 * Validate environment at startup
 * @throws Error listing every invalid variable
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = validateConfig(env);

  if (!result.valid || !result.config) {
    const lines = result.invalid.map(({ key, reason }) => `Invalid ${key}: ${reason}`);
    throw new Error(`INVALID_ENV_VARS:\n${lines.join('\n')}`);
  }

  logger.info('Environment validation passed');
  return result.config;
}
