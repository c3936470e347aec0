import type { Knex } from 'knex';

/**
 * Live schema introspection.
 *
 * Plugins create their own tables and add columns over time, so readers
 * check what exists before selecting it.
 */
export interface SchemaInspector {
  hasTable(table: string): Promise<boolean>;
  hasColumn(table: string, column: string): Promise<boolean>;
}

/**
 * SchemaInspector backed by Knex's schema builder
 */
export class KnexSchemaInspector implements SchemaInspector {
  constructor(private readonly db: Knex) {}

  async hasTable(table: string): Promise<boolean> {
    return this.db.schema.hasTable(table);
  }

  async hasColumn(table: string, column: string): Promise<boolean> {
    return this.db.schema.hasColumn(table, column);
  }
}

/**
 * Return the subset of `columns` that `table` currently defines, in input order
 */
export async function presentColumns<T extends string>(
  inspector: SchemaInspector,
  table: string,
  columns: readonly T[]
): Promise<T[]> {
  const checks = await Promise.all(columns.map(column => inspector.hasColumn(table, column)));
  return columns.filter((_, index) => checks[index] === true);
}
