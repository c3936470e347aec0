import { describe, it, expect, vi } from 'vitest';
import type { Knex } from 'knex';

import { KnexSchemaInspector, presentColumns, type SchemaInspector } from '../schema';

describe('KnexSchemaInspector', () => {
  it('should delegate to the Knex schema builder', async () => {
    const schema = {
      hasTable: vi.fn().mockResolvedValue(true),
      hasColumn: vi.fn().mockResolvedValue(false),
    };
    const inspector = new KnexSchemaInspector({ schema } as unknown as Knex);

    expect(await inspector.hasTable('tp_pages')).toBe(true);
    expect(await inspector.hasColumn('tp_pages', 'layout')).toBe(false);
    expect(schema.hasTable).toHaveBeenCalledWith('tp_pages');
    expect(schema.hasColumn).toHaveBeenCalledWith('tp_pages', 'layout');
  });
});

describe('presentColumns', () => {
  it('should return the defined columns in input order', async () => {
    const inspector: SchemaInspector = {
      hasTable: vi.fn().mockResolvedValue(true),
      hasColumn: vi.fn(async (_table: string, column: string) => column !== 'layout'),
    };

    expect(await presentColumns(inspector, 'tp_pages', ['status', 'layout', 'blocks'])).toEqual(['status', 'blocks']);
  });

  it('should return nothing for an empty column list', async () => {
    const inspector: SchemaInspector = { hasTable: vi.fn(), hasColumn: vi.fn() };

    expect(await presentColumns(inspector, 'tp_pages', [])).toEqual([]);
    expect(inspector.hasColumn).not.toHaveBeenCalled();
  });
});
