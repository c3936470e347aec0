import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { getLogger } from '@kernel/logger';

import type { PluginCacheReader } from '../application/ports/PluginCapabilities';

const logger = getLogger('plugins:cache-reader');

/**
* Shape of tp_plugins.json. Ids may be written as numbers by older tooling.
*/
export const PluginCacheSchema = z.object({
  enabled: z.array(z.union([z.string(), z.number(), z.boolean()])),
}).passthrough();

/**
* Reads the plugin cache written by the plugin manager on sync
*/
export class JsonPluginCacheReader implements PluginCacheReader {
  async readEnabled(cachePath: string): Promise<string[] | null> {
    let raw: string;
    try {
      raw = await readFile(cachePath, 'utf8');
    } catch (error: unknown) {
      if (isNotFound(error)) {
        logger.debug('Plugin cache not found', { cachePath });
      } else {
        logger.warn('Plugin cache unreadable', { cachePath, error: String(error) });
      }
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      logger.warn('Plugin cache is not valid JSON', { cachePath, error: String(error) });
      return null;
    }

    const result = PluginCacheSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn('Plugin cache has no enabled list', { cachePath });
      return null;
    }
    return result.data.enabled.map(id => String(id));
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
