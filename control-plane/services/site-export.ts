import type { Knex } from 'knex';
import type { Pool } from 'pg';

import type { ExportConfig } from '@config';
import { KnexSchemaInspector } from '@database/schema';

import { PostgresPageRepository } from '../../domains/content/infra/persistence/PostgresPageRepository';
import { PostgresSettingsRepository } from '../../domains/settings/infra/persistence/PostgresSettingsRepository';
import { PostgresSeoMetaRepository } from '../../domains/seo/infra/persistence/PostgresSeoMetaRepository';
import { ConfiguredPluginCachePath } from '../../domains/plugins/infra/ConfiguredPluginCachePath';
import { JsonPluginCacheReader } from '../../domains/plugins/infra/JsonPluginCacheReader';
import { PagesCollector } from '../../domains/export/application/collectors/PagesCollector';
import { SettingsCollector } from '../../domains/export/application/collectors/SettingsCollector';
import { ThemeCollector } from '../../domains/export/application/collectors/ThemeCollector';
import { PluginsCollector } from '../../domains/export/application/collectors/PluginsCollector';
import { SeoCollector } from '../../domains/export/application/collectors/SeoCollector';
import { SiteExportService } from '../../domains/export/application/SiteExportService';
import { ExportStorage } from '../../domains/export/infra/ExportStorage';
import { ZipArchiveFactory } from '../../domains/export/infra/ZipArchiveWriter';

/**
* Site Export wiring
* Builds the export service from the shared pool, Knex instance and config
*/

export interface SiteExportWiring {
  pool: Pool;
  knex: Knex;
  config: ExportConfig;
  /**
  * Objects registered by the theme subsystem; null when none is installed.
  * The server passes what was registered through `registerThemeComponent`.
  */
  themeComponents?: readonly object[] | null;
  /** Objects registered through `registerPluginComponent` */
  pluginRegistry?: readonly object[];
}

export function createSiteExportService(wiring: SiteExportWiring): SiteExportService {
  const inspector = new KnexSchemaInspector(wiring.knex);

  return new SiteExportService({
    collectors: {
      pages: new PagesCollector(new PostgresPageRepository(wiring.pool, inspector)),
      settings: new SettingsCollector(new PostgresSettingsRepository(wiring.pool, inspector)),
      theme: new ThemeCollector(wiring.themeComponents ?? null),
      plugins: new PluginsCollector({
        cachePath: new ConfiguredPluginCachePath(wiring.config.pluginCachePath),
        cacheReader: new JsonPluginCacheReader(),
        registry: wiring.pluginRegistry ?? [],
      }),
      seo: new SeoCollector(new PostgresSeoMetaRepository(wiring.pool, inspector)),
    },
    archives: new ZipArchiveFactory(new ExportStorage({
      directory: wiring.config.storageDir,
      maxFilenameAttempts: wiring.config.maxFilenameAttempts,
    })),
  });
}
