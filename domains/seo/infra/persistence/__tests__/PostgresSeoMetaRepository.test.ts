import { describe, it, expect, vi } from 'vitest';
import type { Pool } from 'pg';

import type { SchemaInspector } from '@database/schema';

import { PostgresSeoMetaRepository } from '../PostgresSeoMetaRepository';

function createInspector(hasTable: boolean): SchemaInspector {
  return {
    hasTable: vi.fn().mockResolvedValue(hasTable),
    hasColumn: vi.fn().mockResolvedValue(false),
  };
}

describe('PostgresSeoMetaRepository', () => {
  it('should check for tp_seo_pages', async () => {
    const inspector = createInspector(false);
    const repository = new PostgresSeoMetaRepository({ query: vi.fn() } as unknown as Pool, inspector);

    expect(await repository.tableExists()).toBe(false);
    expect(inspector.hasTable).toHaveBeenCalledWith('tp_seo_pages');
  });

  it('should read every row ordered by page id', async () => {
    const rows = [{ page_id: 1, title: 'Home' }, { page_id: 2, title: null }];
    const query = vi.fn().mockResolvedValue({ rows, rowCount: 2 });
    const repository = new PostgresSeoMetaRepository({ query } as unknown as Pool, createInspector(true));

    expect(await repository.listAll()).toEqual(rows);
    expect(query).toHaveBeenCalledWith('SELECT * FROM tp_seo_pages ORDER BY page_id ASC');
  });
});
