#!/usr/bin/env node
// packages/report/src/cli/reorder-alerts.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { URGENCY_GLYPH, URGENCY_LABEL, URGENCY_LEVELS } from "../../../model/src/constants.js";
import { DEFAULT_CSV_FILENAME, toCsv } from "../csv.js";
import { DISPLAY_COLUMNS, toDisplayRows, type DisplayRow } from "../display.js";
import { buildReorderReport, type ReorderReport } from "../pipeline.js";
import {
  filterAlerts,
  filterByCategories,
  formatImportStats,
  listCategories,
  summarizeInventory,
} from "../summary.js";

const TAG = "[reorder-alerts]";

function usage(): string {
  return `reorder-alerts - inventory coverage and reorder suggestions

Usage:
  reorder-alerts --help
  reorder-alerts version

  reorder-alerts <workbook.xlsx> [--include-ok] [--category <name>]... [--csv [<out.csv>]] [--json]

Options:
  --include-ok         also list items with 2+ months of stock
  --category <name>    only list items from this sheet (repeatable)
  --csv [<out.csv>]    write the listed items as CSV (default ${DEFAULT_CSV_FILENAME})
  --json               print the full report as JSON

Examples:
  reorder-alerts weekly-inventory.xlsx
  reorder-alerts weekly-inventory.xlsx --category Tiles --category Metal --csv
  reorder-alerts weekly-inventory.xlsx --include-ok --json
`;
}

export type CliIO = {
  out: (text: string) => void;
  err: (text: string) => void;
};

const processIO: CliIO = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => console.error(text),
};

// -------------------- argv parsing --------------------

const VALUE_FLAGS = new Set(["--category", "--csv"]);

const CliOptionsSchema = z.object({
  file: z.string({ error: "Missing workbook file." }).min(1, "Missing workbook file."),
  include_ok: z.boolean(),
  categories: z.array(z.string().min(1)),
  csv_out: z.string().min(1).nullable(),
  json: z.boolean(),
});

type CliOptions = z.infer<typeof CliOptionsSchema>;

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function getFlagValues(args: string[], flag: string): string[] {
  const out: string[] = [];
  args.forEach((a, i) => {
    const v = args[i + 1];
    if (a === flag && v && !v.startsWith("--")) out.push(v);
  });
  return out;
}

function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a.startsWith("--")) {
      const next = args[i + 1];
      if (VALUE_FLAGS.has(a) && next && !next.startsWith("--")) i++;
      continue;
    }
    out.push(a);
  }
  return out;
}

function readOptions(args: string[]) {
  const csvRequested = args.includes("--csv");
  return CliOptionsSchema.safeParse({
    file: positionals(args)[0],
    include_ok: args.includes("--include-ok"),
    categories: getFlagValues(args, "--category"),
    csv_out: csvRequested ? getFlagValue(args, "--csv") ?? DEFAULT_CSV_FILENAME : null,
    json: args.includes("--json"),
  });
}

// -------------------- rendering --------------------

export function renderMetrics(report: ReorderReport): string {
  const summary = summarizeInventory(report.items);
  const tiers = URGENCY_LEVELS.map(
    (u) => `${URGENCY_GLYPH[u]} ${URGENCY_LABEL[u]}: ${summary.counts[u]}`
  );
  return [...tiers, `Total SKUs: ${summary.total_skus}`].join("   ");
}

export function renderTable(rows: DisplayRow[]): string {
  const cells = [
    DISPLAY_COLUMNS.map((c) => c.label),
    ...rows.map((r) => DISPLAY_COLUMNS.map((c) => String(r[c.key]))),
  ];
  const widths = DISPLAY_COLUMNS.map((_, i) => Math.max(...cells.map((line) => line[i].length)));

  return cells
    .map((line) => line.map((v, i) => v.padEnd(widths[i])).join("  ").trimEnd())
    .join("\n");
}

function printReport(report: ReorderReport, opts: CliOptions, io: CliIO): number {
  io.out(renderMetrics(report) + "\n\n");

  if (report.issues.length) {
    io.out("Data quality notes:\n");
    for (const issue of report.issues) io.out(`- ${issue}\n`);
    io.out("\n");
  }

  const selected = opts.categories.length ? opts.categories : listCategories(report.items);
  const view = filterAlerts(filterByCategories(report.items, selected), opts.include_ok);

  io.out(`Items Requiring Attention (${filterAlerts(report.items).length})\n`);

  if (view.length === 0) {
    io.out("No items match the current filters.\n");
  } else {
    io.out(renderTable(toDisplayRows(view)) + "\n");
  }

  io.out("\nItems imported by category:\n");
  for (const line of formatImportStats(report.stats)) io.out(`- ${line}\n`);

  if (opts.csv_out) {
    if (view.length === 0) {
      io.err(`${TAG} nothing to export; ${opts.csv_out} not written.`);
      return 0;
    }
    const out = path.resolve(process.cwd(), opts.csv_out);
    try {
      fs.writeFileSync(out, toCsv(view), "utf8");
    } catch (err) {
      io.err(`${TAG} failed to write ${opts.csv_out}: ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }
    io.out(`\nWrote ${view.length} rows to ${opts.csv_out}\n`);
  }

  return 0;
}

// -------------------- entry --------------------

export function run(argv: string[] = process.argv, io: CliIO = processIO): number {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.out(usage());
    return 0;
  }

  if (args[0] === "version") {
    io.out("reorder-alerts cli v1\n");
    return 0;
  }

  const parsed = readOptions(args);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) io.err(`${TAG} ${issue.message}`);
    io.err(usage());
    return 1;
  }

  const opts = parsed.data;
  const report = buildReorderReport(path.resolve(process.cwd(), opts.file));

  if (opts.json) {
    io.out(JSON.stringify(report, null, 2) + "\n");
    return report.ok ? 0 : 1;
  }

  if (!report.ok) {
    io.err(`${TAG} ${report.message}`);
    for (const issue of report.issues) io.err(`${TAG} ${issue}`);
    if (report.code !== "NO_ACTIVE_DEMAND") {
      io.err(`${TAG} Make sure the file is the weekly inventory report workbook.`);
    }
    return 1;
  }

  return printReport(report, opts, io);
}

function isEntrypoint(): boolean {
  const argv1 = process.argv[1];
  if (!argv1 || !fs.existsSync(argv1)) return false;
  return fs.realpathSync(argv1) === fileURLToPath(import.meta.url);
}

if (isEntrypoint()) {
  process.exitCode = run(process.argv);
}
