/**
* Text columns of tp_seo_pages, in export order
*/
export const SEO_TEXT_FIELDS = [
  'title',
  'description',
  'canonical_url',
  'robots',
  'og_title',
  'og_description',
  'og_image',
  'twitter_title',
  'twitter_description',
  'twitter_image',
] as const;

export type SeoTextField = typeof SEO_TEXT_FIELDS[number];

/**
* Raw tp_seo_pages row. Every column may be unset.
*/
export type SeoMetaRow = { page_id?: number | string | null } & Partial<Record<SeoTextField, unknown>>;

/**
* Read access to per-page SEO metadata
*/
export interface SeoMetaRepository {
  /** Whether tp_seo_pages exists */
  tableExists(): Promise<boolean>;

  /** Every row ordered by page_id ascending */
  listAll(): Promise<SeoMetaRow[]>;
}
