/**
 * Shared Configuration Package
 *
 * @example
 * ```typescript
 * import { validateEnv, getExportConfig } from '@config';
 *
 * validateEnv();
 * const { storageDir } = getExportConfig();
 * ```
 *
 * @module @config
 */

// ============================================================================
// Environment Utilities
// ============================================================================
export {
  parseIntEnv,
  parseStringEnv,
} from './env';

// ============================================================================
// Validation
// ============================================================================
export {
  type ValidationResult,
  validateConfig,
  validateEnv,
} from './validation';
export { envSchema, type EnvConfig } from './schema';

// ============================================================================
// Export Configuration
// ============================================================================
export { getExportConfig, type ExportConfig } from './export';
