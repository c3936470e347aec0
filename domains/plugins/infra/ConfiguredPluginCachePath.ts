import type { PluginCachePathResolver } from '../application/ports/PluginCapabilities';

/**
* Resolves the plugin cache to a path fixed by configuration (PLUGIN_CACHE_PATH)
*/
export class ConfiguredPluginCachePath implements PluginCachePathResolver {
  constructor(private readonly path: string) {}

  pluginCachePath(): string {
    return this.path;
  }
}
