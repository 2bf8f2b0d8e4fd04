import type { ExtractionResult, InventoryItem, SheetStats, SkippedRow } from "../../model/src/schema.js";
import { extractInventory, type ExtractOptions } from "../../sheets/src/extract.js";
import { getParsingIssues } from "../../sheets/src/diagnostics.js";
import { WorkbookReadError, type WorkbookSource } from "../../sheets/src/workbook.js";
import { classifyRows } from "../../compute/src/classify.js";
import { sortItems } from "./sort.js";
import { countByUrgency, type UrgencyCounts } from "./summary.js";

export type ReportFailureCode = "WORKBOOK_UNREADABLE" | "NO_INVENTORY_DATA" | "NO_ACTIVE_DEMAND";

export type ReorderReport = {
  ok: true;
  items: InventoryItem[]; // sorted, all tiers
  counts: UrgencyCounts;
  total_skus: number;
  stats: SheetStats;
  issues: string[];
  skipped: SkippedRow[];
};

export type ReportFailure = {
  ok: false;
  code: ReportFailureCode;
  message: string;
  stats: SheetStats;
  issues: string[];
};

export type ReorderReportResult = ReorderReport | ReportFailure;

export const FAILURE_MESSAGES: Readonly<Record<Exclude<ReportFailureCode, "WORKBOOK_UNREADABLE">, string>> = {
  NO_INVENTORY_DATA: "Could not find any inventory data in the uploaded file.",
  NO_ACTIVE_DEMAND: "No items with active demand found in the inventory.",
};

/**
 * Extract -> diagnose -> classify -> sort -> count, for one workbook.
 * Each call is independent; nothing is kept between runs.
 */
export function buildReorderReport(source: WorkbookSource, options: ExtractOptions = {}): ReorderReportResult {
  let extraction: ExtractionResult;
  try {
    extraction = extractInventory(source, options);
  } catch (err) {
    if (err instanceof WorkbookReadError) {
      return {
        ok: false,
        code: "WORKBOOK_UNREADABLE",
        message: `Error processing file: ${err.message}`,
        stats: {},
        issues: [],
      };
    }
    throw err;
  }

  return reportFromExtraction(extraction);
}

export function reportFromExtraction(extraction: ExtractionResult): ReorderReportResult {
  const { rows, stats, sheet_errors } = extraction;

  const issues = [
    ...getParsingIssues(rows),
    ...sheet_errors.map((e) => `Sheet "${e.sheet}" was skipped: ${e.message}`),
  ];

  if (rows.length === 0) {
    return { ok: false, code: "NO_INVENTORY_DATA", message: FAILURE_MESSAGES.NO_INVENTORY_DATA, stats, issues };
  }

  const { items, skipped } = classifyRows(rows);
  if (items.length === 0) {
    return { ok: false, code: "NO_ACTIVE_DEMAND", message: FAILURE_MESSAGES.NO_ACTIVE_DEMAND, stats, issues };
  }

  const sorted = sortItems(items);

  return {
    ok: true,
    items: sorted,
    counts: countByUrgency(sorted),
    total_skus: sorted.length,
    stats,
    issues,
    skipped,
  };
}
