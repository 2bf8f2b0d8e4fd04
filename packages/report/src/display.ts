import { UNBOUNDED_MONTHS_THRESHOLD, URGENCY_GLYPH } from "../../model/src/constants.js";
import type { InventoryItem } from "../../model/src/schema.js";

export const UNBOUNDED_PLACEHOLDER = "-";

export type DisplayRow = {
  status: string; // tier glyph
  product: string;
  sku: string;
  category: string;
  on_hand: number;
  monthly_use: number; // 1 decimal
  months_left: number | typeof UNBOUNDED_PLACEHOLDER; // 1 decimal
  suggested_order: number;
};

// Column headings in display order.
export const DISPLAY_COLUMNS: ReadonlyArray<{ key: keyof DisplayRow; label: string }> = [
  { key: "status", label: "" },
  { key: "product", label: "Product" },
  { key: "sku", label: "SKU" },
  { key: "category", label: "Category" },
  { key: "on_hand", label: "QOH" },
  { key: "monthly_use", label: "Monthly Use" },
  { key: "months_left", label: "Months Left" },
  { key: "suggested_order", label: "Order Qty" },
];

export function toDisplayRows(items: readonly InventoryItem[]): DisplayRow[] {
  return items.map((item) => ({
    status: URGENCY_GLYPH[item.urgency],
    product: item.display_name,
    sku: item.sku,
    category: item.category,
    on_hand: item.qoh,
    monthly_use: roundTo(item.monthly_average, 1),
    months_left:
      item.months_of_stock < UNBOUNDED_MONTHS_THRESHOLD
        ? roundTo(item.months_of_stock, 1)
        : UNBOUNDED_PLACEHOLDER,
    suggested_order: item.suggested_order_qty,
  }));
}

export function roundTo(x: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(x * f) / f;
}
