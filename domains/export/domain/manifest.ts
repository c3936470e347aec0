import {
  EXPORT_APP_NAME,
  EXPORT_SCHEMA_VERSION,
  type ExportDomain,
  type ExportManifest,
} from './types';

/**
* Format an instant as second-resolution ISO-8601 with an explicit UTC offset,
* e.g. 2026-03-04T05:06:07+00:00
*/
export function formatUtcIso(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, '+00:00');
}

/**
* Build the manifest from the domains that were actually written.
*
* Pages are always reported as included.
*/
export function buildManifest(written: ReadonlySet<ExportDomain>, generatedAt: Date): ExportManifest {
  return {
    schema_version: EXPORT_SCHEMA_VERSION,
    generated_at_utc: formatUtcIso(generatedAt),
    app: { name: EXPORT_APP_NAME },
    includes: {
      pages: true,
      settings: written.has('settings'),
      theme: written.has('theme'),
      plugins: written.has('plugins'),
      seo: written.has('seo'),
    },
  };
}
