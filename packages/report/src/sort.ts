import { URGENCY_SEVERITY } from "../../model/src/constants.js";
import type { InventoryItem } from "../../model/src/schema.js";

/**
 * Most severe tier first; within a tier, highest monthly usage first so the
 * items that hurt most surface at the top. Stable for equal keys.
 */
export function sortItems(items: readonly InventoryItem[]): InventoryItem[] {
  return [...items].sort(
    (a, b) =>
      URGENCY_SEVERITY[a.urgency] - URGENCY_SEVERITY[b.urgency] ||
      b.monthly_average - a.monthly_average
  );
}
