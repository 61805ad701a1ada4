export {
  FAILURE_INDEX_HEADING,
  SUCCESS_INDEX_HEADING,
  compareOutcomes,
  renderFailureIndex,
  renderSuccessIndex,
} from "./markdown.js";
export {
  REPORT_VERSION,
  buildJsonReport,
  serializeReport,
  type JsonReport,
  type ReportMeta,
  type ReportOutcomes,
  type ReportTotals,
} from "./json.js";
export {
  FAILURE_INDEX_FILE,
  JSON_REPORT_FILE,
  SUCCESS_INDEX_FILE,
  writeReports,
  type WrittenReports,
} from "./writer.js";
