// Fixed column positions per sheet layout (0-indexed, column A = 0).
// Headers differ between sheets, so fields are located by position only.

export type ColumnMap = {
  item: number;
  sku: number;
  display: number;
  qoh: number;
  avg: number;
};

export type LayoutName = "standard" | "Wood";

export const COLUMN_LAYOUTS: Readonly<Record<LayoutName, ColumnMap>> = {
  // B item, C sku, D type, E display, F qoh, G avg
  standard: { item: 1, sku: 2, display: 4, qoh: 5, avg: 6 },
  // Wood carries a lead-time column in F, so avg moves to G and qoh to H
  Wood: { item: 1, sku: 2, display: 4, avg: 6, qoh: 7 },
};

export function layoutForSheet(sheetName: string): ColumnMap {
  return isLayoutName(sheetName) ? COLUMN_LAYOUTS[sheetName] : COLUMN_LAYOUTS.standard;
}

// Number of columns a sheet must have for every mapped position to exist.
export function requiredWidth(map: ColumnMap): number {
  return Math.max(map.item, map.sku, map.display, map.qoh, map.avg) + 1;
}

function isLayoutName(x: string): x is LayoutName {
  return Object.prototype.hasOwnProperty.call(COLUMN_LAYOUTS, x);
}
