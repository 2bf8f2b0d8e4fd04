import { checkRawRow } from "../../model/src/validate.js";
import type { InventoryItem, RawRow, SkippedRow } from "../../model/src/schema.js";
import { calculateSuggestedOrder, calculateUrgency } from "./urgency.js";

export type ClassificationResult = {
  items: InventoryItem[];
  skipped: SkippedRow[];
};

/**
 * Validates and classifies extracted rows. Output keeps input order.
 * Rows failing the validity gate, and rows with no demand, are recorded in
 * `skipped` and never become items.
 */
export function classifyRows(rows: RawRow[]): ClassificationResult {
  const items: InventoryItem[] = [];
  const skipped: SkippedRow[] = [];

  rows.forEach((raw, row_index) => {
    const check = checkRawRow(raw);
    if (!check.ok) {
      skipped.push({ row_index, item_id: raw.item_id, category: raw.category, reason_code: check.reason_code });
      return;
    }

    const { qoh, monthly_average } = check.row;
    const { urgency, months_of_stock } = calculateUrgency(qoh, monthly_average);

    if (urgency === null) {
      skipped.push({ row_index, item_id: raw.item_id, category: raw.category, reason_code: "NO_ACTIVE_DEMAND" });
      return;
    }

    items.push(
      Object.freeze({
        item_id: check.row.item_id,
        sku: check.row.sku,
        category: check.row.category,
        display_name: check.row.display_name,
        qoh: Math.trunc(qoh),
        monthly_average,
        months_of_stock,
        urgency,
        suggested_order_qty: calculateSuggestedOrder(qoh, monthly_average),
      })
    );
  });

  return { items, skipped };
}

export function processInventory(rows: RawRow[]): InventoryItem[] {
  return classifyRows(rows).items;
}
