import type * as XLSX from "xlsx";
import { coerceText, isBlank } from "@dispatch/allocation-engine";
import type { SheetRow } from "./types.js";
import { buildWorkbook, listSheets, readSheetHeaders, readSheetRows, workbookToBuffer } from "./workbook.js";

export const WAREHOUSE_COLUMN = "ALMACÉN";
export const DOCUMENT_TEXT_COLUMN = "TEXTO CAB.DOCUMENTO";
export const ITEM_COLUMN = "ITEM";
export const WORK_AND_JOB_COLUMN = "OBRA Y TRABAJO";
export const SITE_ITEM_COLUMN = "Obra-item";
export const WAREHOUSE_EXPORT_SHEET = "Sheet1";
export const WAREHOUSE_EXPORT_FILE = "exportado_almacen.xlsx";

const WORK_ORDER_PATTERN = /\d{15,17}/;

export interface WarehouseTable {
  sheetName: string;
  headers: string[];
  rows: SheetRow[];
}

/** First run of 15 to 17 digits in a document header text, or null. */
export function extractWorkOrderNumber(raw: unknown): string | null {
  return WORK_ORDER_PATTERN.exec(coerceText(raw))?.[0] ?? null;
}

/** "20701202210000220" → "207012022100002-20": the last two digits are the job. */
export function formatWorkAndJob(workOrderNumber: string): string {
  return `${workOrderNumber.slice(0, -2)}-${workOrderNumber.slice(-2)}`;
}

// Upper-casing can fold two headers together; the later one gets a suffix.
export function upperCaseHeaders(table: WarehouseTable): WarehouseTable {
  const seen = new Map<string, number>();
  const renamed = table.headers.map((header) => {
    const base = header.toUpperCase();
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}_${count}`;
  });

  const rows = table.rows.map((row) => {
    const next: SheetRow = {};
    table.headers.forEach((header, index) => {
      const target = renamed[index];
      if (target !== undefined) next[target] = row[header] ?? "";
    });
    return next;
  });
  return { ...table, headers: renamed, rows };
}

function withColumn(headers: readonly string[], column: string): string[] {
  return headers.includes(column) ? [...headers] : [...headers, column];
}

/**
 * Derive "OBRA Y TRABAJO" from the work order number in the document text and,
 * when the sheet has an item column, "Obra-item" as number-item. Rows without a
 * number (or item) get blanks. Sheets without the document text column are
 * returned as they are.
 */
export function addSiteItemColumns(table: WarehouseTable): WarehouseTable {
  if (!table.headers.includes(DOCUMENT_TEXT_COLUMN)) return table;
  const hasItem = table.headers.includes(ITEM_COLUMN);

  let headers = withColumn(table.headers, WORK_AND_JOB_COLUMN);
  if (hasItem) headers = withColumn(headers, SITE_ITEM_COLUMN);

  const rows = table.rows.map((row) => {
    const workOrder = extractWorkOrderNumber(row[DOCUMENT_TEXT_COLUMN]);
    const next: SheetRow = { ...row, [WORK_AND_JOB_COLUMN]: workOrder === null ? "" : formatWorkAndJob(workOrder) };
    if (hasItem) {
      const item = row[ITEM_COLUMN];
      next[SITE_ITEM_COLUMN] = workOrder === null || isBlank(item) ? "" : `${workOrder}-${coerceText(item)}`;
    }
    return next;
  });
  return { ...table, headers, rows };
}

/** Distinct non-blank warehouses, sorted. */
export function listWarehouses(table: WarehouseTable): string[] {
  if (!table.headers.includes(WAREHOUSE_COLUMN)) return [];
  const values = new Set<string>();
  for (const row of table.rows) {
    const value = coerceText(row[WAREHOUSE_COLUMN]);
    if (value !== "") values.add(value);
  }
  return [...values].sort((a, b) => a.localeCompare(b));
}

/** Rows of one warehouse. A blank selection, or a sheet without the column, keeps every row. */
export function filterByWarehouse(table: WarehouseTable, warehouse: string | undefined): WarehouseTable {
  const selected = coerceText(warehouse);
  if (selected === "" || !table.headers.includes(WAREHOUSE_COLUMN)) return table;
  return { ...table, rows: table.rows.filter((row) => coerceText(row[WAREHOUSE_COLUMN]) === selected) };
}

/** Read one sheet (the first by default) with upper-cased headers and the derived site-item columns. */
export function loadWarehouseTable(workbook: XLSX.WorkBook, sheetName?: string): WarehouseTable {
  const sheet = sheetName ?? listSheets(workbook)[0] ?? "";
  const table: WarehouseTable = {
    sheetName: sheet,
    headers: readSheetHeaders(workbook, sheet),
    rows: readSheetRows(workbook, sheet)
  };
  return addSiteItemColumns(upperCaseHeaders(table));
}

export function writeWarehouseWorkbook(table: WarehouseTable): Buffer {
  const matrix: unknown[][] = [
    table.headers,
    ...table.rows.map((row) => table.headers.map((header) => row[header] ?? ""))
  ];
  return workbookToBuffer(buildWorkbook([{ name: WAREHOUSE_EXPORT_SHEET, rows: matrix }]));
}
