export { extractInventory, extractFromWorkbook, parseSheet, DATA_START_ROW } from "./extract.js";
export type { ExtractOptions } from "./extract.js";

export { openWorkbook, describeSource, hasWorkbookSignature, WorkbookReadError } from "./workbook.js";
export type { WorkbookSource } from "./workbook.js";

export { COLUMN_LAYOUTS, layoutForSheet, requiredWidth } from "./layouts.js";
export type { ColumnMap, LayoutName } from "./layouts.js";

export { cellText, cellNumber } from "./cells.js";

export { getParsingIssues } from "./diagnostics.js";
