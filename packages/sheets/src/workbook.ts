import { readFileSync } from "node:fs";
import * as XLSX from "xlsx";

export type WorkbookSource = string | Buffer | Uint8Array | ArrayBuffer;

/**
 * The workbook as a whole could not be read (missing file, corrupt archive,
 * unsupported format). Per-sheet problems never raise this.
 */
export class WorkbookReadError extends Error {
  readonly source_label: string;

  constructor(source_label: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to read workbook ${source_label}: ${reason}`, { cause });
    this.name = "WorkbookReadError";
    this.source_label = source_label;
  }
}

// .xlsx is a zip archive, legacy .xls an OLE compound file.
const WORKBOOK_SIGNATURES: readonly Buffer[] = [
  Buffer.from([0x50, 0x4b, 0x03, 0x04]),
  Buffer.from([0xd0, 0xcf, 0x11, 0xe0]),
];

export function hasWorkbookSignature(bytes: Uint8Array): boolean {
  return WORKBOOK_SIGNATURES.some(
    (sig) => bytes.length >= sig.length && sig.every((b, i) => bytes[i] === b)
  );
}

export function describeSource(source: WorkbookSource): string {
  return typeof source === "string" ? `"${source}"` : `<${source.byteLength} bytes>`;
}

export function openWorkbook(source: WorkbookSource): XLSX.WorkBook {
  const label = describeSource(source);

  let bytes: Buffer;
  try {
    bytes = toBuffer(source);
  } catch (err) {
    throw new WorkbookReadError(label, err);
  }

  if (!hasWorkbookSignature(bytes)) {
    throw new WorkbookReadError(label, "not an Excel workbook");
  }

  try {
    return XLSX.read(bytes, { type: "buffer", cellDates: false });
  } catch (err) {
    throw new WorkbookReadError(label, err);
  }
}

function toBuffer(source: WorkbookSource): Buffer {
  if (typeof source === "string") return readFileSync(source);
  if (Buffer.isBuffer(source)) return source;
  if (ArrayBuffer.isView(source)) return Buffer.from(source.buffer, source.byteOffset, source.byteLength);
  return Buffer.from(new Uint8Array(source));
}
