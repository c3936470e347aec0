/**
 * Export domain types.
 *
 * Document interfaces describe the JSON written into the archive, so their
 * field names are the wire names (snake_case).
 */

// ============================================================================
// Options and results
// ============================================================================

/**
 * Which optional domains to include. Pages are always exported.
 */
export interface ExportOptions {
  includeSettings: boolean;
  includeTheme: boolean;
  includePlugins: boolean;
  includeSeo: boolean;
}

export const DEFAULT_EXPORT_OPTIONS: Readonly<ExportOptions> = {
  includeSettings: true,
  includeTheme: true,
  includePlugins: true,
  includeSeo: true,
};

/**
 * Fill unspecified flags with their defaults (all true)
 */
export function resolveExportOptions(options: Partial<ExportOptions> = {}): ExportOptions {
  return {
    includeSettings: options.includeSettings ?? DEFAULT_EXPORT_OPTIONS.includeSettings,
    includeTheme: options.includeTheme ?? DEFAULT_EXPORT_OPTIONS.includeTheme,
    includePlugins: options.includePlugins ?? DEFAULT_EXPORT_OPTIONS.includePlugins,
    includeSeo: options.includeSeo ?? DEFAULT_EXPORT_OPTIONS.includeSeo,
  };
}

/**
 * A freshly created archive. The caller owns the file and deletes it.
 */
export interface ArchiveResult {
  path: string;
  filename: string;
}

/** Data domains, keyed as they appear in the manifest */
export type ExportDomain = 'pages' | 'settings' | 'theme' | 'plugins' | 'seo';

export const EXPORT_DOMAINS: readonly ExportDomain[] = ['pages', 'settings', 'theme', 'plugins', 'seo'];

/** Archive entry name per domain */
export const ENTRY_NAMES: Readonly<Record<ExportDomain, string>> = {
  pages: 'pages.json',
  settings: 'settings.json',
  theme: 'theme.json',
  plugins: 'plugins.json',
  seo: 'seo.json',
};

export const MANIFEST_ENTRY_NAME = 'manifest.json';

// ============================================================================
// Collector results
// ============================================================================

/**
 * Outcome of one collector run.
 *
 * - `ok`: the domain applies and produced its document
 * - `unavailable`: the domain applies but its backing subsystem is missing;
 *   `placeholder` (carrying an `error` field) is written in its place
 * - `absent`: the domain does not apply; nothing is written
 */
export type CollectorResult<TDocument> =
  | { kind: 'ok'; document: TDocument }
  | { kind: 'unavailable'; reason: string; placeholder: TDocument | UnavailableDocument }
  | { kind: 'absent'; reason: string };

export function ok<TDocument>(document: TDocument): CollectorResult<TDocument> {
  return { kind: 'ok', document };
}

export function unavailable<TDocument>(
  reason: string,
  placeholder: TDocument | UnavailableDocument = { error: reason, items: [] }
): CollectorResult<TDocument> {
  return { kind: 'unavailable', reason, placeholder };
}

export function absent<TDocument>(reason: string): CollectorResult<TDocument> {
  return { kind: 'absent', reason };
}

/**
 * Document written when a listing domain's storage is missing
 */
export interface UnavailableDocument {
  error: string;
  items: [];
}

// ============================================================================
// Documents
// ============================================================================

export interface ListDocument<TItem> {
  count: number;
  items: TItem[];
}

/** Row ids stay numbers; a bigint past 2^53 is written as its digit string */
export type ExportedId = number | string;

export interface ExportedPage {
  id: ExportedId;
  title: string;
  slug: string;
  created_at: string | null;
  updated_at: string | null;
  status?: string;
  layout?: string;
  blocks?: unknown[];
}

export type PagesDocument = ListDocument<ExportedPage>;

export interface ExportedSetting {
  key: string;
  value: string | null;
  autoload: boolean;
}

export type SettingsDocument = ListDocument<ExportedSetting>;

export interface ThemeDocument {
  active_theme_id: string | null;
  layouts: unknown[];
  error?: string;
}

export interface PluginsDocument {
  enabled: string[];
  cache_path: string | null;
  error?: string;
}

export interface ExportedSeoEntry {
  page_id: ExportedId;
  title: string | null;
  description: string | null;
  canonical_url: string | null;
  robots: string | null;
  og_title: string | null;
  og_description: string | null;
  og_image: string | null;
  twitter_title: string | null;
  twitter_description: string | null;
  twitter_image: string | null;
}

export type SeoDocument = ListDocument<ExportedSeoEntry>;

// ============================================================================
// Manifest
// ============================================================================

export const EXPORT_SCHEMA_VERSION = 1;
export const EXPORT_APP_NAME = 'TentaPress';

export interface ExportManifest {
  schema_version: number;
  generated_at_utc: string;
  app: { name: string };
  includes: Record<ExportDomain, boolean>;
}
