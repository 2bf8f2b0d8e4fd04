import { describe, it, expect } from "vitest";
import { sortItems } from "../src/sort.js";
import {
  countByUrgency,
  filterAlerts,
  filterByCategories,
  formatImportStats,
  listCategories,
  summarizeInventory,
} from "../src/summary.js";
import { URGENCY_SEVERITY } from "../../model/src/constants.js";
import { item } from "./_helpers/items.js";

describe("sortItems", () => {
  it("puts the most severe tier first, then the highest usage", () => {
    const items = [
      item("ok-big", "OK", 100),
      item("warn-small", "WARNING", 1),
      item("crit-small", "CRITICAL", 2),
      item("warn-big", "WARNING", 30),
      item("urgent", "URGENT", 5),
      item("crit-big", "CRITICAL", 9),
    ];

    expect(sortItems(items).map((i) => i.item_id)).toEqual([
      "crit-big",
      "crit-small",
      "urgent",
      "warn-big",
      "warn-small",
      "ok-big",
    ]);
  });

  it("keeps the original order for equal keys and does not mutate its input", () => {
    const items = [item("a", "WARNING", 3), item("b", "URGENT", 3), item("c", "WARNING", 3), item("d", "WARNING", 3)];

    expect(sortItems(items).map((i) => i.item_id)).toEqual(["b", "a", "c", "d"]);
    expect(items.map((i) => i.item_id)).toEqual(["a", "b", "c", "d"]);
  });

  it("satisfies the ordering for every adjacent pair", () => {
    const tiers = ["OK", "CRITICAL", "WARNING", "URGENT"] as const;
    const items = Array.from({ length: 24 }, (_, n) => item(String(n), tiers[n % 4], (n * 7) % 11));
    const sorted = sortItems(items);

    for (let k = 1; k < sorted.length; k++) {
      const prev = sorted[k - 1];
      const cur = sorted[k];
      const sp = URGENCY_SEVERITY[prev.urgency];
      const sc = URGENCY_SEVERITY[cur.urgency];
      expect(sp).toBeLessThanOrEqual(sc);
      if (sp === sc) expect(prev.monthly_average).toBeGreaterThanOrEqual(cur.monthly_average);
    }
  });
});

describe("alerts and counts", () => {
  const items = [
    item("1", "CRITICAL", 1),
    item("2", "OK", 1),
    item("3", "WARNING", 1, { category: "Wood" }),
    item("4", "OK", 1, { category: "Metal" }),
  ];

  it("filters out OK items unless asked to keep them", () => {
    expect(filterAlerts(items).map((i) => i.item_id)).toEqual(["1", "3"]);
    expect(filterAlerts(items, true).map((i) => i.item_id)).toEqual(["1", "2", "3", "4"]);
  });

  it("counts all four tiers, zero-filled", () => {
    expect(countByUrgency(items)).toEqual({ CRITICAL: 1, URGENT: 0, WARNING: 1, OK: 2 });
    expect(countByUrgency([])).toEqual({ CRITICAL: 0, URGENT: 0, WARNING: 0, OK: 0 });
  });

  it("tier counts add up to the item count", () => {
    const counts = countByUrgency(items);
    expect(Object.values(counts).reduce((a, b) => a + b, 0)).toBe(items.length);
  });

  it("summarizes the metric row", () => {
    expect(summarizeInventory(items)).toEqual({
      counts: { CRITICAL: 1, URGENT: 0, WARNING: 1, OK: 2 },
      total_skus: 4,
      alerts: 2,
    });
  });

  it("lists and filters categories", () => {
    expect(listCategories(items)).toEqual(["Metal", "Tiles", "Wood"]);
    expect(filterByCategories(items, ["Wood", "Metal"]).map((i) => i.item_id)).toEqual(["3", "4"]);
    expect(filterByCategories(items, [])).toEqual([]);
  });
});

describe("formatImportStats", () => {
  it("lists sheets alphabetically", () => {
    expect(formatImportStats({ Wood: 2, Kits: 5, Metal: 1 })).toEqual([
      "Kits: 5 items",
      "Metal: 1 items",
      "Wood: 2 items",
    ]);
  });
});
