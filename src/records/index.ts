/**
 * Record loading and deduplication.
 *
 *   import { loadRecordsFile, flattenRecords } from "./records/index.js";
 *
 *   const records = await loadRecordsFile("papers.yml");
 *   const items = flattenRecords(records);
 */

export {
  PaperRecordSchema,
  RelatedRecordSchema,
  RecordCollectionSchema,
  type PaperRecord,
  type RelatedRecord,
} from "./schema.js";

export {
  loadRecordsFile,
  parseRecords,
  parseRecordsText,
  validateRecords,
  RecordSourceError,
  type RecordIssue,
} from "./loader.js";

export {
  flattenRecords,
  flattenRecordsWithStats,
  type FlattenResult,
  type FlattenStats,
} from "./flatten.js";
