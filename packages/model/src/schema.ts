// Inventory reorder model
// Types only. No functions.

/* ------------------------------ Urgency ----------------------------- */

export type Urgency = "CRITICAL" | "URGENT" | "WARNING" | "OK";

/* ------------------------------ Raw rows ---------------------------- */

// One spreadsheet row after extraction, before any validation.
// null = the cell was empty or could not be read as a number.
export interface RawRow {
  item_id: string;
  sku: string;
  category: string; // source sheet name
  display_name: string;
  qoh: number | null;
  monthly_average: number | null;
}

/* --------------------------- Classified items ------------------------ */

export interface InventoryItem {
  readonly item_id: string;
  readonly sku: string;
  readonly category: string;
  readonly display_name: string;

  readonly qoh: number; // integer, >= 0
  readonly monthly_average: number; // always > 0

  readonly months_of_stock: number;
  readonly urgency: Urgency;
  readonly suggested_order_qty: number; // integer, >= 0
}

/* ------------------------------ Extraction --------------------------- */

export type SheetStats = Record<string, number>;

export interface SheetError {
  sheet: string;
  message: string;
}

export interface ExtractionResult {
  rows: RawRow[];
  stats: SheetStats; // only sheets that yielded rows
  sheet_errors: SheetError[];
}

/* ------------------------------ Skipped rows ------------------------- */

export type SkipReasonCode =
  | "MISSING_QOH"
  | "MISSING_MONTHLY_AVERAGE"
  | "NEGATIVE_VALUE"
  | "FORMULA_ERROR_MARKER"
  | "NO_ACTIVE_DEMAND";

export interface SkippedRow {
  row_index: number; // position in the extracted row sequence
  item_id: string;
  category: string;
  reason_code: SkipReasonCode;
}
