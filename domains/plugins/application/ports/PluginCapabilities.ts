/**
* Optional capabilities of the plugin subsystem
*/

/**
* Locates the precomputed plugin cache file
*/
export interface PluginCachePathResolver {
  pluginCachePath(): string;
}

/**
* Live registry query for enabled plugin ids
*/
export interface EnabledPluginLister {
  listEnabledPluginIds(): unknown;
}

export function isEnabledPluginLister(candidate: object): candidate is EnabledPluginLister {
  return 'listEnabledPluginIds' in candidate && typeof candidate.listEnabledPluginIds === 'function';
}

/**
* Reads the enabled ids out of the plugin cache.
* Resolves null when the file is missing, unreadable or malformed.
*/
export interface PluginCacheReader {
  readEnabled(cachePath: string): Promise<string[] | null>;
}
