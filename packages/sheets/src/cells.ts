import type { CellObject } from "xlsx";

// SheetJS keeps error cells as numeric codes; `w` usually carries the text.
const ERROR_TEXT: Readonly<Record<number, string>> = {
  0x00: "#NULL!",
  0x07: "#DIV/0!",
  0x0f: "#VALUE!",
  0x17: "#REF!",
  0x1d: "#NAME?",
  0x24: "#NUM!",
  0x2a: "#N/A",
  0x2b: "#GETTING_DATA",
};

export function isCellObject(x: unknown): x is CellObject {
  return typeof x === "object" && x !== null && "t" in x && typeof x.t === "string";
}

export function isEmptyCell(cell: CellObject | undefined): boolean {
  if (!cell || cell.t === "z" || cell.v == null) return true;
  return cell.t === "s" && String(cell.v).trim() === "";
}

export function cellText(cell: CellObject | undefined): string {
  if (!cell || cell.v == null) return "";

  switch (cell.t) {
    case "e":
      return cell.w ?? (typeof cell.v === "number" ? ERROR_TEXT[cell.v] : undefined) ?? "#ERROR";
    case "d":
      return cell.v instanceof Date ? cell.v.toISOString() : String(cell.v);
    case "z":
      return "";
    default:
      return String(cell.v);
  }
}

// Plain decimal or exponent notation; no separators, no hex or binary.
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Numeric coercion for quantity cells. Anything that is not a finite number
 * (text, error, boolean, empty) comes back as null instead of throwing.
 */
export function cellNumber(cell: CellObject | undefined): number | null {
  if (!cell || cell.v == null) return null;

  if (cell.t === "n") {
    return typeof cell.v === "number" && Number.isFinite(cell.v) ? cell.v : null;
  }

  if (cell.t === "s" && typeof cell.v === "string") {
    const text = cell.v.trim();
    if (!DECIMAL_TEXT.test(text)) return null;
    const n = Number(text);
    return Number.isFinite(n) ? n : null;
  }

  return null;
}
