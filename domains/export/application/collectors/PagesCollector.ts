import type {
  OptionalPageColumn,
  PageRepository,
  PageRow,
  PageSchema,
} from '@domain/content/application/ports/PageRepository';

import { toIdentifier, toList, toText, toTimestamp } from '../../domain/encoding';
import {
  type CollectorResult,
  type ExportedPage,
  type PagesDocument,
  ok,
  unavailable,
} from '../../domain/types';
import type { DomainCollector } from './DomainCollector';

export const PAGES_UNAVAILABLE = 'Pages plugin not installed.';

/**
* Map one tp_pages row. Optional fields are emitted only when `schema`
* lists their column.
*/
export function mapPageRow(row: PageRow, schema: PageSchema): ExportedPage {
  const item: ExportedPage = {
    id: toIdentifier(row.id),
    title: toText(row.title),
    slug: toText(row.slug),
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };

  const has = (column: OptionalPageColumn): boolean => schema.optionalColumns.has(column);

  if (has('status')) {
    item.status = toText(row.status);
  }
  if (has('layout')) {
    item.layout = toText(row.layout);
  }
  if (has('blocks')) {
    item.blocks = toList(row.blocks);
  }
  return item;
}

/**
* Exports every page, ordered by id
*/
export class PagesCollector implements DomainCollector<PagesDocument> {
  readonly domain = 'pages';

  constructor(private readonly pages: PageRepository | null) {}

  async collect(): Promise<CollectorResult<PagesDocument>> {
    if (!this.pages || !(await this.pages.isAvailable())) {
      return unavailable(PAGES_UNAVAILABLE);
    }

    const schema = await this.pages.describeSchema();
    const rows = await this.pages.listAll(schema);
    const items = rows.map(row => mapPageRow(row, schema));
    return ok({ count: items.length, items });
  }

  fallback(reason: string): CollectorResult<PagesDocument> {
    return unavailable(reason);
  }
}
