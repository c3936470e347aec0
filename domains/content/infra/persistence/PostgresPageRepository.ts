import type { Pool, PoolClient } from 'pg';

import { getLogger } from '@kernel/logger';
import { type SchemaInspector, presentColumns } from '@database/schema';

import {
  OPTIONAL_PAGE_COLUMNS,
  type PageRepository,
  type PageRow,
  type PageSchema,
} from '../../application/ports/PageRepository';

const logger = getLogger('content:page-repository');

export const PAGES_TABLE = 'tp_pages';

// Timestamps are read as text: the driver would parse `timestamp` columns
// in the host's timezone and shift them on the way out
const BASE_COLUMNS = [
  'id',
  'title',
  'slug',
  'created_at::text AS created_at',
  'updated_at::text AS updated_at',
] as const;

/**
* Repository implementation for tp_pages using PostgreSQL
*/
export class PostgresPageRepository implements PageRepository {
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

  async isAvailable(): Promise<boolean> {
    return this.inspector.hasTable(PAGES_TABLE);
  }

  async describeSchema(): Promise<PageSchema> {
    const columns = await presentColumns(this.inspector, PAGES_TABLE, OPTIONAL_PAGE_COLUMNS);
    return { optionalColumns: new Set(columns) };
  }

  async listAll(schema: PageSchema, client?: PoolClient): Promise<PageRow[]> {
    // Column names come from fixed lists, never from input
    const optional = OPTIONAL_PAGE_COLUMNS.filter(column => schema.optionalColumns.has(column));
    const columns = [...BASE_COLUMNS, ...optional].join(', ');

    try {
      const { rows } = await this.getQueryable(client).query<PageRow>(
        `SELECT ${columns} FROM ${PAGES_TABLE} ORDER BY id ASC`
      );
      return rows;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Failed to list pages', err, { columns: optional });
      throw error;
    }
  }
}
