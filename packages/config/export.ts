/**
 * Export Configuration
 *
 * Where archives are staged and where the plugin cache lives.
 */

import path from 'path';

import { parseIntEnv, parseStringEnv } from './env';

export interface ExportConfig {
  /** Directory archives are written to before download */
  storageDir: string;
  /** How many suffixed filenames to try when the timestamped name is taken */
  maxFilenameAttempts: number;
  /** Precomputed list of enabled plugins */
  pluginCachePath: string;
}

/**
 * Resolve export configuration from the environment.
 * Relative paths are resolved against the given base directory.
 */
export function getExportConfig(baseDir: string = process.cwd()): ExportConfig {
  const storageDir = parseStringEnv('EXPORT_STORAGE_DIR', path.join('storage', 'app', 'tp-exports'));
  const pluginCachePath = parseStringEnv('PLUGIN_CACHE_PATH', path.join('bootstrap', 'cache', 'tp_plugins.json'));

  return {
    storageDir: path.resolve(baseDir, storageDir),
    maxFilenameAttempts: Math.max(1, parseIntEnv('EXPORT_MAX_FILENAME_ATTEMPTS', 20)),
    pluginCachePath: path.resolve(baseDir, pluginCachePath),
  };
}
