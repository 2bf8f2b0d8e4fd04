// ---------- Types ----------
export type {
  Urgency,
  RawRow,
  InventoryItem,
  SheetStats,
  SheetError,
  ExtractionResult,
  SkipReasonCode,
  SkippedRow,
} from "./schema.js";

// ---------- Constants ----------
export * from "./constants.js";

// ---------- Row gate ----------
export { ValidRawRowSchema, checkRawRow, isValidRow } from "./validate.js";
export type { ValidRawRow, RowCheck } from "./validate.js";
