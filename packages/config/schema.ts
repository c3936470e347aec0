/**
 * Environment Validation Schema
 *
 * Zod schema for the variables the export service reads. Used by
 * validateEnv() for fail-fast boot validation.
 *
 * @module @config/schema
 */

import { z } from 'zod';

const optionalPositiveInt = z.coerce.number().int().positive().optional();

export const envSchema = z.object({
  // -- Core --
  NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  SERVICE_NAME: z.string().min(2).regex(/^[a-zA-Z0-9_-]+$/, {
    message: 'SERVICE_NAME must contain only alphanumeric characters, hyphens, and underscores',
  }).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),

  // -- Database --
  CONTROL_PLANE_DB: z.string().regex(/^postgres(ql)?:\/\//, {
    message: 'CONTROL_PLANE_DB must be a postgres:// connection string',
  }),

  // -- Export --
  EXPORT_STORAGE_DIR: z.string().min(1).optional(),
  EXPORT_MAX_FILENAME_ATTEMPTS: optionalPositiveInt,
  PLUGIN_CACHE_PATH: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;
