import type { Urgency } from "./schema.js";

/* ------------------------------ Sheets ------------------------------ */

// Workbook sheets holding inventory rows.
export const KNOWN_SHEETS: readonly string[] = [
  "Kits",
  "kit Components",
  "ColorChip",
  "Fleece",
  "Tiles",
  "Metal",
  "Wood",
  "Marketing",
];

// Lookup and helper sheets. Never parsed, even if listed above.
export const IGNORED_SHEETS: readonly string[] = ["FULL 4 LOOK UP KEEP", "Componet Averages"];

/* ----------------------------- Thresholds --------------------------- */

export const TARGET_MONTHS = 3;
export const URGENT_BELOW_MONTHS = 1;
export const WARNING_BELOW_MONTHS = 2;

// Coverage at or above this is shown as unbounded ("-" / blank).
export const UNBOUNDED_MONTHS_THRESHOLD = 100;

/* ----------------------------- Cell markers ------------------------- */

export const FORMULA_ERROR_PREFIX = "#";
export const FORMULA_ERROR_TOKENS: readonly string[] = ["#N/A", "#REF!", "#VALUE!"];

/* ------------------------------ Urgency ----------------------------- */

export const URGENCY_LEVELS = ["CRITICAL", "URGENT", "WARNING", "OK"] as const satisfies readonly Urgency[];

// Lower = more severe. Primary sort key.
export const URGENCY_SEVERITY: Readonly<Record<Urgency, number>> = {
  CRITICAL: 1,
  URGENT: 2,
  WARNING: 3,
  OK: 4,
};

export const URGENCY_LABEL: Readonly<Record<Urgency, string>> = {
  CRITICAL: "Critical",
  URGENT: "Urgent",
  WARNING: "Warning",
  OK: "OK",
};

export const URGENCY_GLYPH: Readonly<Record<Urgency, string>> = {
  CRITICAL: "\u{1F534}", // red circle
  URGENT: "\u{1F7E0}", // orange circle
  WARNING: "\u{1F7E1}", // yellow circle
  OK: "\u{1F7E2}", // green circle
};
