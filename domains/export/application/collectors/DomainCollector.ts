import type { CollectorResult, ExportDomain } from '../../domain/types';

/**
* One exportable data domain.
*
* `collect` reports missing subsystems as data (`unavailable` or `absent`).
* `fallback` gives the result to record when `collect` throws anyway.
*/
export interface DomainCollector<TDocument> {
  readonly domain: ExportDomain;
  collect(): Promise<CollectorResult<TDocument>>;
  fallback(reason: string): CollectorResult<TDocument>;
}
