import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { coerceText, isBlank } from "@dispatch/allocation-engine";
import type { ColumnProfile, SheetProfile } from "@dispatch/contracts";
import type { SheetCell, SheetRow, SheetSuggestion, WorkbookSource } from "./types.js";

export class SheetNotFoundError extends Error {
  readonly code = "SHEET_NOT_FOUND";
  readonly sheetName: string;
  readonly availableSheets: string[];

  constructor(sheetName: string, availableSheets: string[]) {
    super(`Sheet "${sheetName}" not found. Available sheets: ${availableSheets.join(", ") || "(none)"}`);
    this.name = "SheetNotFoundError";
    this.sheetName = sheetName;
    this.availableSheets = availableSheets;
  }
}

export class WorkbookReadError extends Error {
  readonly code = "WORKBOOK_UNREADABLE";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WorkbookReadError";
  }
}

export function readWorkbook(source: WorkbookSource): XLSX.WorkBook {
  let workbook: XLSX.WorkBook;
  try {
    const bytes = typeof source === "string" ? fs.readFileSync(path.resolve(source)) : source;
    workbook = XLSX.read(bytes, { type: "buffer", cellDates: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new WorkbookReadError(`Workbook could not be read: ${reason}`, { cause: error });
  }
  if (workbook.SheetNames.length === 0) {
    throw new WorkbookReadError("Workbook has no sheets");
  }
  return workbook;
}

export function listSheets(workbook: XLSX.WorkBook): string[] {
  return [...workbook.SheetNames];
}

/**
 * Requests default to the sheet named like "material por descargar", else the
 * first sheet. Stock defaults to the "existencia" sheet, else the second, else
 * the first.
 */
export function suggestSheets(sheetNames: readonly string[]): SheetSuggestion {
  const first = sheetNames[0] ?? "";
  const requestSheet = sheetNames.find((name) => name.toLowerCase().includes("material por descargar")) ?? first;
  const stockSheet =
    sheetNames.find((name) => name.toLowerCase().includes("existencia")) ?? sheetNames[1] ?? first;
  return { requestSheet, stockSheet };
}

function toCell(value: unknown): SheetCell {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Date) return value;
  return null;
}

function readMatrix(workbook: XLSX.WorkBook, sheetName: string): unknown[][] {
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new SheetNotFoundError(sheetName, listSheets(workbook));
  }
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: "", blankrows: false, raw: true });
}

// Blank headers become __EMPTY, repeats get a numeric suffix: "Qty", "Qty_1".
function normalizeHeaders(raw: readonly unknown[]): string[] {
  const seen = new Map<string, number>();
  return raw.map((cell) => {
    const base = coerceText(cell) || "__EMPTY";
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}_${count}`;
  });
}

export function readSheetHeaders(workbook: XLSX.WorkBook, sheetName: string): string[] {
  const [headerRow] = readMatrix(workbook, sheetName);
  return headerRow ? normalizeHeaders(headerRow) : [];
}

/** Data rows keyed by header. Rows with every cell blank are dropped. */
export function readSheetRows(workbook: XLSX.WorkBook, sheetName: string): SheetRow[] {
  const [headerRow, ...dataRows] = readMatrix(workbook, sheetName);
  if (!headerRow) return [];
  const headers = normalizeHeaders(headerRow);

  const rows: SheetRow[] = [];
  for (const values of dataRows) {
    const cells = headers.map((_, index) => toCell(values[index] ?? ""));
    if (cells.every((cell) => isBlank(cell))) continue;
    const row: SheetRow = {};
    headers.forEach((header, index) => {
      row[header] = cells[index] ?? "";
    });
    rows.push(row);
  }
  return rows;
}

function cellKind(cell: SheetCell): ColumnProfile["inferredType"] {
  if (cell instanceof Date) return "date";
  if (typeof cell === "number") return "number";
  if (typeof cell === "boolean") return "boolean";
  return "text";
}

function exampleValue(cell: SheetCell | undefined): ColumnProfile["example"] {
  if (cell === undefined || cell === null) return null;
  if (cell instanceof Date) return coerceText(cell);
  return cell;
}

/** Column-level profile of a sheet, typed from the first `sampleSize` data rows. */
export function describeSheet(workbook: XLSX.WorkBook, sheetName: string, sampleSize = 10): SheetProfile {
  const headers = readSheetHeaders(workbook, sheetName);
  const rows = readSheetRows(workbook, sheetName);
  const sample = rows.slice(0, sampleSize);

  const columns = headers.map((name): ColumnProfile => {
    const values = rows.map((row) => row[name] ?? null);
    const nonBlank = values.filter((value) => !isBlank(value));
    const sampled = sample.map((row) => row[name] ?? null).filter((value) => !isBlank(value));
    const kinds = new Set(sampled.map(cellKind));
    const [onlyKind] = [...kinds];

    let inferredType: ColumnProfile["inferredType"] = "mixed";
    if (kinds.size === 0) inferredType = "empty";
    else if (kinds.size === 1 && onlyKind) inferredType = onlyKind;

    return {
      name,
      inferredType,
      nonBlankCount: nonBlank.length,
      blankCount: values.length - nonBlank.length,
      example: exampleValue(nonBlank[0])
    };
  });

  return {
    sheetName,
    totalRows: rows.length,
    totalColumns: headers.length,
    columns,
    availableSheets: listSheets(workbook)
  };
}

/** One sheet per entry, each written from an array of arrays. */
export function buildWorkbook(sheets: ReadonlyArray<{ name: string; rows: unknown[][] }>): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  for (const { name, rows } of sheets) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  return workbook;
}

export function workbookToBuffer(workbook: XLSX.WorkBook): Buffer {
  const data: unknown = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(data)) {
    throw new WorkbookReadError("xlsx writer did not return a buffer");
  }
  return data;
}
