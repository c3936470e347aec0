import { getLogger, toError } from '@kernel/logger';
import {
  type PluginCachePathResolver,
  type PluginCacheReader,
  isEnabledPluginLister,
} from '@domain/plugins/application/ports/PluginCapabilities';

import { type CollectorResult, type PluginsDocument, ok } from '../../domain/types';
import type { DomainCollector } from './DomainCollector';

const logger = getLogger('export:plugins');

export interface PluginsCollectorDeps {
  /** null when no cache location is known */
  cachePath: PluginCachePathResolver | null;
  cacheReader: PluginCacheReader;
  /** Objects registered by the plugin subsystem, probed for listing support */
  registry: readonly object[];
}

/**
* Exports enabled plugin ids. The plugin cache wins; the live registry is
* only asked when the cache yields nothing.
*/
export class PluginsCollector implements DomainCollector<PluginsDocument> {
  readonly domain = 'plugins';

  constructor(private readonly deps: PluginsCollectorDeps) {}

  async collect(): Promise<CollectorResult<PluginsDocument>> {
    const cachePath = this.resolveCachePath();

    if (cachePath !== null) {
      const cached = await this.deps.cacheReader.readEnabled(cachePath);
      if (cached !== null) {
        return ok({ enabled: cached, cache_path: cachePath });
      }
    }

    return ok({ enabled: await this.fromRegistry(), cache_path: cachePath });
  }

  /**
  * Plugins never degrade to an unavailable placeholder; an unexpected
  * failure still yields the empty document, with the cache path when it
  * resolves
  */
  fallback(reason: string): CollectorResult<PluginsDocument> {
    return ok({ enabled: [], cache_path: this.resolveCachePath(), error: reason });
  }

  private resolveCachePath(): string | null {
    if (!this.deps.cachePath) return null;
    try {
      return this.deps.cachePath.pluginCachePath();
    } catch (error: unknown) {
      logger.warn('Plugin cache path could not be resolved', { error: toError(error).message });
      return null;
    }
  }

  private async fromRegistry(): Promise<string[]> {
    for (const lister of this.deps.registry.filter(isEnabledPluginLister)) {
      try {
        const ids: unknown = await lister.listEnabledPluginIds();
        if (Array.isArray(ids)) {
          return ids.map(id => String(id));
        }
      } catch (error: unknown) {
        logger.warn('Plugin registry lookup failed', { error: toError(error).message });
      }
    }
    return [];
  }
}
