import type { Pool, PoolClient } from 'pg';

import { getLogger } from '@kernel/logger';
import type { SchemaInspector } from '@database/schema';

import type { SeoMetaRepository, SeoMetaRow } from '../../application/ports/SeoMetaRepository';

const logger = getLogger('seo:meta-repository');

export const SEO_PAGES_TABLE = 'tp_seo_pages';

/**
* Repository implementation for tp_seo_pages using PostgreSQL
*/
export class PostgresSeoMetaRepository implements SeoMetaRepository {
  constructor(
    private readonly pool: Pool,
    private readonly inspector: SchemaInspector
  ) {}

  /**
  * Helper to get queryable (pool or client)
  */
  private getQueryable(client?: PoolClient): Pool | PoolClient {
    return client || this.pool;
  }

  async tableExists(): Promise<boolean> {
    return this.inspector.hasTable(SEO_PAGES_TABLE);
  }

  /**
  * Selects every column: the SEO plugin owns this table's shape
  */
  async listAll(client?: PoolClient): Promise<SeoMetaRow[]> {
    try {
      const { rows } = await this.getQueryable(client).query<SeoMetaRow>(
        `SELECT * FROM ${SEO_PAGES_TABLE} ORDER BY page_id ASC`
      );
      return rows;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Failed to list SEO metadata', err);
      throw error;
    }
  }
}
