import { describe, it, expect } from "vitest";
import { buildReorderReport, reportFromExtraction } from "../src/pipeline.js";
import {
  STANDARD_HEADER,
  inventorySheet,
  sampleInventory,
  standardRow,
  workbookBytes,
} from "../../sheets/__tests__/_helpers/workbook.js";

describe("buildReorderReport", () => {
  it("extracts, classifies, sorts and counts a workbook", () => {
    const report = buildReorderReport(workbookBytes(sampleInventory()));

    expect(report.ok).toBe(true);
    if (!report.ok) return;

    expect(report.items.map((i) => [i.sku, i.urgency, i.suggested_order_qty])).toEqual([
      ["T-1", "CRITICAL", 15],
      ["T-2", "URGENT", 50],
      ["W-1", "WARNING", 30],
      ["T-3", "OK", 20],
    ]);
    expect(report.counts).toEqual({ CRITICAL: 1, URGENT: 1, WARNING: 1, OK: 1 });
    expect(report.total_skus).toBe(4);
    expect(report.stats).toEqual({ Tiles: 4, Wood: 2 });
    expect(report.issues).toEqual(["1 cells contain Excel formula errors (#N/A, #REF!, etc.)"]);
    expect(report.skipped).toEqual([
      { row_index: 3, item_id: "1004", category: "Tiles", reason_code: "NO_ACTIVE_DEMAND" },
      { row_index: 5, item_id: "2002", category: "Wood", reason_code: "FORMULA_ERROR_MARKER" },
    ]);
  });

  it("reports a workbook without inventory sheets as no inventory data", () => {
    const report = buildReorderReport(
      workbookBytes([inventorySheet("Summary", STANDARD_HEADER, [standardRow("1", "X", "Other", 1, 1)])])
    );

    expect(report).toEqual({
      ok: false,
      code: "NO_INVENTORY_DATA",
      message: "Could not find any inventory data in the uploaded file.",
      stats: {},
      issues: [],
    });
  });

  it("reports rows without demand as a separate empty state", () => {
    const report = buildReorderReport(
      workbookBytes([
        inventorySheet("Tiles", STANDARD_HEADER, [
          standardRow("1", "T-1", "Tile", 5, 0),
          standardRow("2", "T-2", "Tile", null, 4),
        ]),
      ])
    );

    expect(report).toEqual({
      ok: false,
      code: "NO_ACTIVE_DEMAND",
      message: "No items with active demand found in the inventory.",
      stats: { Tiles: 2 },
      issues: ["1 items have missing QOH values"],
    });
  });

  it("turns an unreadable workbook into a single failure", () => {
    const report = buildReorderReport("/nonexistent/reorder/inventory.xlsx");

    expect(report.ok).toBe(false);
    if (report.ok) return;
    expect(report.code).toBe("WORKBOOK_UNREADABLE");
    expect(report.message.startsWith('Error processing file: Unable to read workbook "/nonexistent/reorder/inventory.xlsx"')).toBe(true);
    expect(report.stats).toEqual({});
  });

  it("reports bytes that are not a workbook as unreadable", () => {
    const report = buildReorderReport(Buffer.from("just some text\n1,2,3\n"));

    expect(report.ok).toBe(false);
    if (report.ok) return;
    expect(report.code).toBe("WORKBOOK_UNREADABLE");
    expect(report.message).toBe(
      "Error processing file: Unable to read workbook <21 bytes>: not an Excel workbook"
    );
    expect(report.issues).toEqual([]);
  });

  it("is independent between runs", () => {
    const bytes = workbookBytes(sampleInventory());
    expect(buildReorderReport(bytes)).toEqual(buildReorderReport(bytes));
  });
});

describe("reportFromExtraction", () => {
  it("surfaces skipped sheets as data-quality notes", () => {
    const report = reportFromExtraction({
      rows: [{ item_id: "1", sku: "T-1", category: "Tiles", display_name: "Tile", qoh: 1, monthly_average: 4 }],
      stats: { Tiles: 1 },
      sheet_errors: [{ sheet: "Metal", message: "bad range" }],
    });

    expect(report.ok).toBe(true);
    expect(report.issues).toEqual(['Sheet "Metal" was skipped: bad range']);
  });
});
