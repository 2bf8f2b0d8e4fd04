import { URGENCY_LEVELS } from "../../model/src/constants.js";
import type { InventoryItem, SheetStats, Urgency } from "../../model/src/schema.js";

export type UrgencyCounts = Record<Urgency, number>;

export type InventorySummary = {
  counts: UrgencyCounts;
  total_skus: number; // active items (with demand)
  alerts: number; // CRITICAL + URGENT + WARNING
};

export function filterAlerts(items: readonly InventoryItem[], includeOk = false): InventoryItem[] {
  if (includeOk) return [...items];
  return items.filter((i) => i.urgency !== "OK");
}

export function countByUrgency(items: readonly InventoryItem[]): UrgencyCounts {
  const counts: UrgencyCounts = { CRITICAL: 0, URGENT: 0, WARNING: 0, OK: 0 };
  for (const item of items) counts[item.urgency] += 1;
  return counts;
}

export function summarizeInventory(items: readonly InventoryItem[]): InventorySummary {
  const counts = countByUrgency(items);
  const alerts = URGENCY_LEVELS.filter((u) => u !== "OK").reduce((s, u) => s + counts[u], 0);
  return { counts, total_skus: items.length, alerts };
}

export function listCategories(items: readonly InventoryItem[]): string[] {
  return [...new Set(items.map((i) => i.category))].sort((a, b) => a.localeCompare(b));
}

export function filterByCategories(
  items: readonly InventoryItem[],
  categories: readonly string[]
): InventoryItem[] {
  const wanted = new Set(categories);
  return items.filter((i) => wanted.has(i.category));
}

// "<sheet>: <n> items", by sheet name
export function formatImportStats(stats: SheetStats): string[] {
  return Object.keys(stats)
    .sort()
    .map((sheet) => `${sheet}: ${stats[sheet]} items`);
}
