import { z } from "zod";
import { FORMULA_ERROR_PREFIX } from "./constants.js";
import type { RawRow, SkipReasonCode } from "./schema.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

// Issue messages double as skip reason codes.
const Quantity = (missing: SkipReasonCode) =>
  z
    .number({ error: missing })
    .refine(Number.isFinite, missing)
    .refine((v) => v >= 0, "NEGATIVE_VALUE");

// Broken formulas surface as text like "#N/A" or "#REF!".
const CellText = z
  .string()
  .refine((v) => !v.startsWith(FORMULA_ERROR_PREFIX), "FORMULA_ERROR_MARKER");

/* ------------------------------------------------------------------ */
/*                               Row gate                             */
/* ------------------------------------------------------------------ */

export const ValidRawRowSchema = z.object({
  item_id: CellText,
  sku: CellText,
  category: z.string(),
  display_name: CellText,
  qoh: Quantity("MISSING_QOH"),
  monthly_average: Quantity("MISSING_MONTHLY_AVERAGE"),
});

export type ValidRawRow = z.infer<typeof ValidRawRowSchema>;

export type RowCheck =
  | { ok: true; row: ValidRawRow }
  | { ok: false; reason_code: SkipReasonCode };

// When a row fails several checks, the first code in this list wins.
const REASON_PRECEDENCE: readonly SkipReasonCode[] = [
  "MISSING_QOH",
  "MISSING_MONTHLY_AVERAGE",
  "NEGATIVE_VALUE",
  "FORMULA_ERROR_MARKER",
];

export function checkRawRow(row: RawRow): RowCheck {
  const parsed = ValidRawRowSchema.safeParse(row);
  if (parsed.success) return { ok: true, row: parsed.data };

  const messages = new Set(parsed.error.issues.map((i) => i.message));
  const reason_code = REASON_PRECEDENCE.find((code) => messages.has(code)) ?? "FORMULA_ERROR_MARKER";
  return { ok: false, reason_code };
}

export function isValidRow(row: RawRow): boolean {
  return ValidRawRowSchema.safeParse(row).success;
}
