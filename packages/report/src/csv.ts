import Papa from "papaparse";
import { UNBOUNDED_MONTHS_THRESHOLD, URGENCY_LABEL } from "../../model/src/constants.js";
import type { InventoryItem } from "../../model/src/schema.js";
import { roundTo } from "./display.js";

// Downstream automation keys on these; do not rename or reorder.
export const CSV_COLUMNS = [
  "Urgency",
  "Product",
  "SKU",
  "Category",
  "QOH",
  "Monthly Average",
  "Months of Stock",
  "Suggested Order Qty",
] as const;

export const DEFAULT_CSV_FILENAME = "reorder_alerts.csv";

type CsvCell = string | number;

export function toCsvRecords(items: readonly InventoryItem[]): CsvCell[][] {
  return items.map((item) => [
    URGENCY_LABEL[item.urgency],
    item.display_name,
    item.sku,
    item.category,
    item.qoh,
    item.monthly_average,
    item.months_of_stock < UNBOUNDED_MONTHS_THRESHOLD ? roundTo(item.months_of_stock, 2) : "",
    item.suggested_order_qty,
  ]);
}

export function toCsv(items: readonly InventoryItem[]): string {
  const records: CsvCell[][] = [[...CSV_COLUMNS], ...toCsvRecords(items)];
  return Papa.unparse(records, { newline: "\n" }) + "\n";
}
