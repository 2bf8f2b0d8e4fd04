import { FORMULA_ERROR_TOKENS } from "../../model/src/constants.js";
import type { RawRow } from "../../model/src/schema.js";

/**
 * Advisory data-quality notes over extracted (not yet validated) rows.
 * Never blocks processing.
 */
export function getParsingIssues(rows: RawRow[]): string[] {
  const issues: string[] = [];
  const tokens = new Set(FORMULA_ERROR_TOKENS);

  let errorCells = 0;
  let missingQoh = 0;
  let missingAvg = 0;

  for (const r of rows) {
    for (const text of [r.item_id, r.sku, r.category, r.display_name]) {
      if (tokens.has(text)) errorCells++;
    }
    if (r.qoh == null) missingQoh++;
    if (r.monthly_average == null) missingAvg++;
  }

  if (errorCells > 0) {
    issues.push(`${errorCells} cells contain Excel formula errors (#N/A, #REF!, etc.)`);
  }
  if (missingQoh > 0) {
    issues.push(`${missingQoh} items have missing QOH values`);
  }
  if (missingAvg > 0) {
    issues.push(`${missingAvg} items have missing Monthly Average values`);
  }

  return issues;
}
