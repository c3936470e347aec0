import type { SeoMetaRepository, SeoMetaRow } from '@domain/seo/application/ports/SeoMetaRepository';

import { toIdentifier, toNullableString } from '../../domain/encoding';
import {
  type CollectorResult,
  type ExportedSeoEntry,
  type SeoDocument,
  absent,
  ok,
} from '../../domain/types';
import type { DomainCollector } from './DomainCollector';

export const SEO_ABSENT = 'SEO table tp_seo_pages not found.';

export function mapSeoRow(row: SeoMetaRow): ExportedSeoEntry {
  return {
    page_id: toIdentifier(row.page_id),
    title: toNullableString(row.title),
    description: toNullableString(row.description),
    canonical_url: toNullableString(row.canonical_url),
    robots: toNullableString(row.robots),
    og_title: toNullableString(row.og_title),
    og_description: toNullableString(row.og_description),
    og_image: toNullableString(row.og_image),
    twitter_title: toNullableString(row.twitter_title),
    twitter_description: toNullableString(row.twitter_description),
    twitter_image: toNullableString(row.twitter_image),
  };
}

/**
* Exports per-page SEO metadata. Without the SEO table the domain does
* not apply and nothing is written.
*/
export class SeoCollector implements DomainCollector<SeoDocument> {
  readonly domain = 'seo';

  constructor(private readonly seo: SeoMetaRepository | null) {}

  async collect(): Promise<CollectorResult<SeoDocument>> {
    if (!this.seo || !(await this.seo.tableExists())) {
      return absent(SEO_ABSENT);
    }

    const rows = await this.seo.listAll();
    const items = rows.map(mapSeoRow);
    return ok({ count: items.length, items });
  }

  fallback(reason: string): CollectorResult<SeoDocument> {
    return absent(reason);
  }
}
