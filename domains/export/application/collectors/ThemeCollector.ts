import { getLogger, toError } from '@kernel/logger';
import {
  isActiveThemeProvider,
  isLayoutLister,
} from '@domain/themes/application/ports/ThemeCapabilities';

import { type CollectorResult, type ThemeDocument, ok, unavailable } from '../../domain/types';
import type { DomainCollector } from './DomainCollector';

const logger = getLogger('export:theme');

export const THEME_UNAVAILABLE = 'Theme manager not available.';

function placeholder(reason: string): ThemeDocument {
  return { active_theme_id: null, layouts: [], error: reason };
}

/**
* Exports the active theme id and its layouts.
*
* `components` are the objects registered by the theme subsystem; null means
* no theme subsystem is installed. Each is probed for the capabilities it
* supports.
*/
export class ThemeCollector implements DomainCollector<ThemeDocument> {
  readonly domain = 'theme';

  constructor(private readonly components: readonly object[] | null) {}

  async collect(): Promise<CollectorResult<ThemeDocument>> {
    if (!this.components) {
      return unavailable(THEME_UNAVAILABLE, placeholder(THEME_UNAVAILABLE));
    }

    return ok({
      active_theme_id: await this.activeThemeId(this.components),
      layouts: await this.layouts(this.components),
    });
  }

  fallback(reason: string): CollectorResult<ThemeDocument> {
    return unavailable(reason, placeholder(reason));
  }

  private async activeThemeId(components: readonly object[]): Promise<string | null> {
    for (const provider of components.filter(isActiveThemeProvider)) {
      try {
        const id: unknown = await provider.getActiveThemeId();
        if (typeof id === 'string' && id !== '') {
          return id;
        }
      } catch (error: unknown) {
        logger.warn('Active theme lookup failed', { error: toError(error).message });
      }
    }
    return null;
  }

  private async layouts(components: readonly object[]): Promise<unknown[]> {
    for (const lister of components.filter(isLayoutLister)) {
      try {
        const layouts: unknown = await lister.listLayouts();
        if (Array.isArray(layouts)) {
          return layouts;
        }
      } catch (error: unknown) {
        logger.warn('Layout listing failed', { error: toError(error).message });
      }
    }
    return [];
  }
}
