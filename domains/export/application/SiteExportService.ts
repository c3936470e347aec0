import { getLogger, toError, type Logger } from '@kernel/logger';

import { encodeDocument } from '../domain/encoding';
import { buildManifest } from '../domain/manifest';
import {
  type ArchiveResult,
  type CollectorResult,
  ENTRY_NAMES,
  type ExportDomain,
  type ExportOptions,
  MANIFEST_ENTRY_NAME,
  type PagesDocument,
  type PluginsDocument,
  type SeoDocument,
  type SettingsDocument,
  type ThemeDocument,
  resolveExportOptions,
} from '../domain/types';
import type { DomainCollector } from './collectors/DomainCollector';
import type { ArchiveFactory, ArchiveWriter } from './ports/ArchiveWriter';

const logger = getLogger('export:service');

export interface ExportCollectors {
  pages: DomainCollector<PagesDocument>;
  settings: DomainCollector<SettingsDocument>;
  theme: DomainCollector<ThemeDocument>;
  plugins: DomainCollector<PluginsDocument>;
  seo: DomainCollector<SeoDocument>;
}

export interface SiteExportServiceDeps {
  collectors: ExportCollectors;
  archives: ArchiveFactory;
  clock?: () => Date;
}

/**
* Assembles the site export archive.
*
* Pages are always written; the other domains follow their flags. The
* manifest is written last and reports only what the archive holds.
*/
export class SiteExportService {
  private readonly clock: () => Date;

  constructor(private readonly deps: SiteExportServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
  * Create a new export archive
  *
  * @throws {ExportInitError} The container could not be created; no file is left
  * @throws {ExportWriteError} The container could not be sealed; the partial file is removed
  */
  async createExport(options: Partial<ExportOptions> = {}): Promise<ArchiveResult> {
    const resolved = resolveExportOptions(options);
    const startedAt = Date.now();
    const { collectors } = this.deps;

    const archive = await this.deps.archives.create(this.clock());
    const log = logger.child({ filename: archive.filename });
    log.info('Export started', { options: resolved });

    const written = new Set<ExportDomain>();
    try {
      await this.write(log, archive, collectors.pages, written);
      if (resolved.includeSettings) await this.write(log, archive, collectors.settings, written);
      if (resolved.includeTheme) await this.write(log, archive, collectors.theme, written);
      if (resolved.includePlugins) await this.write(log, archive, collectors.plugins, written);
      if (resolved.includeSeo) await this.write(log, archive, collectors.seo, written);

      archive.addEntry(MANIFEST_ENTRY_NAME, encodeDocument(buildManifest(written, this.clock())));
    } catch (error: unknown) {
      // Encoding or buffering failed; nothing usable can be sealed
      await archive.abort();
      throw error;
    }

    await archive.finalize();

    log.info('Export completed', {
      entries: archive.entryNames(),
      duration: Date.now() - startedAt,
    });

    return { path: archive.path, filename: archive.filename };
  }

  /**
  * Run one collector and write its entry, unless the domain is absent
  */
  private async write<TDocument>(
    log: Logger,
    archive: ArchiveWriter,
    collector: DomainCollector<TDocument>,
    written: Set<ExportDomain>
  ): Promise<void> {
    const result = await this.run(log, collector);

    switch (result.kind) {
      case 'ok':
        archive.addEntry(ENTRY_NAMES[collector.domain], encodeDocument(result.document));
        written.add(collector.domain);
        return;
      case 'unavailable':
        log.warn('Export domain unavailable', { domain: collector.domain, reason: result.reason });
        archive.addEntry(ENTRY_NAMES[collector.domain], encodeDocument(result.placeholder));
        written.add(collector.domain);
        return;
      case 'absent':
        log.info('Export domain not applicable', { domain: collector.domain, reason: result.reason });
        return;
    }
  }

  private async run<TDocument>(log: Logger, collector: DomainCollector<TDocument>): Promise<CollectorResult<TDocument>> {
    try {
      return await collector.collect();
    } catch (error: unknown) {
      const err = toError(error);
      log.error('Export collector failed', err, { domain: collector.domain });
      return collector.fallback(err.message);
    }
  }
}
