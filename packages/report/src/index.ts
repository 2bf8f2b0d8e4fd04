// ---------- Ordering + summaries ----------
export { sortItems } from "./sort.js";
export {
  filterAlerts,
  countByUrgency,
  summarizeInventory,
  listCategories,
  filterByCategories,
  formatImportStats,
} from "./summary.js";
export type { UrgencyCounts, InventorySummary } from "./summary.js";

// ---------- Projections ----------
export { toDisplayRows, roundTo, DISPLAY_COLUMNS, UNBOUNDED_PLACEHOLDER } from "./display.js";
export type { DisplayRow } from "./display.js";

export { toCsv, toCsvRecords, CSV_COLUMNS, DEFAULT_CSV_FILENAME } from "./csv.js";

// ---------- Pipeline ----------
export { buildReorderReport, reportFromExtraction, FAILURE_MESSAGES } from "./pipeline.js";
export type { ReorderReport, ReportFailure, ReorderReportResult, ReportFailureCode } from "./pipeline.js";
