import { readFileSync } from "node:fs";
import * as XLSX from "xlsx";
import { z } from "zod";
import { URGENCY_LABEL, URGENCY_LEVELS } from "../packages/model/src/index.js";
import { extractFromWorkbook } from "../packages/sheets/src/index.js";
import { formatImportStats, reportFromExtraction, toCsv, toDisplayRows } from "../packages/report/src/index.js";

// Sheets as arrays of rows, so the sample stays readable in review.
const SampleSchema = z.object({
  sheets: z.array(
    z.object({
      name: z.string(),
      rows: z.array(z.array(z.union([z.string(), z.number(), z.null()]))),
    })
  ),
});

const sample = SampleSchema.parse(
  JSON.parse(readFileSync(process.argv[2] ?? "examples/inventory/sample-workbook.json", "utf-8"))
);

const wb = XLSX.utils.book_new();
for (const s of sample.sheets) XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(s.rows), s.name);

const report = reportFromExtraction(extractFromWorkbook(wb));

if (!report.ok) {
  console.error(`${report.code}: ${report.message}`);
  for (const issue of report.issues) console.error(`- ${issue}`);
  process.exitCode = 1;
} else {
  console.log(URGENCY_LEVELS.map((u) => `${URGENCY_LABEL[u]}: ${report.counts[u]}`).join("  "));
  for (const issue of report.issues) console.warn(`note: ${issue}`);
  console.table(toDisplayRows(report.items));
  console.log(formatImportStats(report.stats).join("\n"));
  console.log();
  process.stdout.write(toCsv(report.items));
}
