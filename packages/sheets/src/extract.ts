import * as XLSX from "xlsx";
import { IGNORED_SHEETS, KNOWN_SHEETS } from "../../model/src/constants.js";
import type { ExtractionResult, RawRow, SheetError, SheetStats } from "../../model/src/schema.js";
import { cellNumber, cellText, isCellObject, isEmptyCell } from "./cells.js";
import { layoutForSheet, requiredWidth } from "./layouts.js";
import { openWorkbook, type WorkbookSource } from "./workbook.js";

// Row 0 is a report title, row 1 the (unreliable) header.
export const DATA_START_ROW = 2;

export type ExtractOptions = {
  knownSheets?: readonly string[];
  ignoredSheets?: readonly string[];
};

export function extractInventory(source: WorkbookSource, options: ExtractOptions = {}): ExtractionResult {
  return extractFromWorkbook(openWorkbook(source), options);
}

export function extractFromWorkbook(wb: XLSX.WorkBook, options: ExtractOptions = {}): ExtractionResult {
  const known = new Set(options.knownSheets ?? KNOWN_SHEETS);
  const ignored = new Set(options.ignoredSheets ?? IGNORED_SHEETS);

  const rows: RawRow[] = [];
  const stats: SheetStats = {};
  const sheet_errors: SheetError[] = [];

  for (const sheet_name of wb.SheetNames) {
    if (ignored.has(sheet_name)) continue;
    if (!known.has(sheet_name)) continue;

    let sheetRows: RawRow[];
    try {
      sheetRows = parseSheet(wb, sheet_name);
    } catch (err) {
      sheet_errors.push({ sheet: sheet_name, message: err instanceof Error ? err.message : String(err) });
      continue;
    }

    if (sheetRows.length === 0) continue;

    stats[sheet_name] = sheetRows.length;
    rows.push(...sheetRows);
  }

  return { rows, stats, sheet_errors };
}

/**
 * Reads one inventory sheet by fixed column position. A sheet narrower than
 * its layout yields no rows.
 */
export function parseSheet(wb: XLSX.WorkBook, sheetName: string): RawRow[] {
  const ws = wb.Sheets[sheetName];
  if (!ws) throw new Error(`Sheet "${sheetName}" is listed in the workbook but could not be opened`);

  const ref = ws["!ref"];
  if (!ref) return [];

  const range = XLSX.utils.decode_range(ref);
  const columns = layoutForSheet(sheetName);
  if (range.e.c + 1 < requiredWidth(columns)) return [];

  const out: RawRow[] = [];

  for (let r = Math.max(DATA_START_ROW, range.s.r); r <= range.e.r; r++) {
    const at = (c: number) => {
      const cell: unknown = ws[XLSX.utils.encode_cell({ r, c })];
      return isCellObject(cell) ? cell : undefined;
    };

    let blank = true;
    for (let c = range.s.c; c <= range.e.c && blank; c++) {
      if (!isEmptyCell(at(c))) blank = false;
    }
    if (blank) continue;

    out.push({
      item_id: cellText(at(columns.item)),
      sku: cellText(at(columns.sku)),
      category: sheetName,
      display_name: cellText(at(columns.display)),
      qoh: cellNumber(at(columns.qoh)),
      monthly_average: cellNumber(at(columns.avg)),
    });
  }

  return out;
}
