/**
* Columns added to tp_pages by later plugin versions.
* Installations may define any subset of them.
*/
export const OPTIONAL_PAGE_COLUMNS = ['status', 'layout', 'blocks'] as const;

export type OptionalPageColumn = typeof OPTIONAL_PAGE_COLUMNS[number];

/**
* Snapshot of which optional columns the pages table currently defines
*/
export interface PageSchema {
  optionalColumns: ReadonlySet<OptionalPageColumn>;
}

/**
* Raw tp_pages row as returned by the driver
*/
export interface PageRow {
  id: number | string;
  title: string | null;
  slug: string | null;
  created_at: Date | string | null;
  updated_at: Date | string | null;
  status?: string | null;
  layout?: string | null;
  blocks?: unknown;
}

/**
* Read access to the pages store.
*
* @throws {Error} Implementations propagate query failures
*/
export interface PageRepository {
  /**
  * Whether the pages subsystem is installed
  */
  isAvailable(): Promise<boolean>;

  /**
  * Inspect which optional columns exist right now
  */
  describeSchema(): Promise<PageSchema>;

  /**
  * List every page ordered by id ascending, selecting only the optional
  * columns present in `schema`
  */
  listAll(schema: PageSchema): Promise<PageRow[]>;
}
