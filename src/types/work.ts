/**
 * Flat unit of download work.
 * One per unique source link; produced by the record deduplicator.
 */

export interface WorkItem {
  readonly title: string;
  /** Source URL. Unique across the items of one run. */
  readonly link: string;
  /** Primary topic of the owning top-level record. */
  readonly topic: string;
}
