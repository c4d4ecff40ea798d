import type * as XLSX from "xlsx";
import type { OutputLine, SheetSelection } from "@dispatch/contracts";
import type { RequestRecordInput, StockRecordInput } from "@dispatch/allocation-engine";
import { assertCompleteMapping, fieldLabel, mapHeaders, suggestColumnMapping } from "./column-mapper.js";
import { buildWorkbook, listSheets, readSheetHeaders, readSheetRows, suggestSheets, workbookToBuffer } from "./workbook.js";
import type { ColumnMapping } from "./types.js";

export const DISPATCH_SHEET_NAME = "CruceMaterialSAP_Split";

type OutputColumn = {
  label: string;
  value: (line: OutputLine) => string | number;
};

const OUTPUT_COLUMNS: readonly OutputColumn[] = [
  { label: fieldLabel("requests", "itemId"), value: (line) => line.itemId },
  { label: fieldLabel("requests", "materialCode"), value: (line) => line.materialCode },
  { label: fieldLabel("requests", "materialDescription"), value: (line) => line.materialDescription },
  { label: fieldLabel("requests", "siteCode"), value: (line) => line.siteCode },
  { label: fieldLabel("requests", "planName"), value: (line) => line.planName },
  { label: fieldLabel("requests", "requestedQty"), value: (line) => line.requestedQty },
  { label: fieldLabel("stock", "stockDescription"), value: (line) => line.stockDescription },
  { label: "Cantidad Asignada", value: (line) => line.allocatedQty },
  { label: "Diferencia", value: (line) => line.unmetQty },
  { label: "Descargable", value: (line) => (line.dispatchable ? "Si" : "No") }
];

const AUDIT_COLUMNS: readonly OutputColumn[] = [
  { label: "SAP Antes", value: (line) => line.stockBefore },
  { label: "SAP Restante", value: (line) => line.stockAfter }
];

export const OUTPUT_LABELS: readonly string[] = OUTPUT_COLUMNS.map((column) => column.label);

export type DispatchInputs = {
  requestSheet: string;
  stockSheet: string;
  requestMapping: ColumnMapping<"requests">;
  stockMapping: ColumnMapping<"stock">;
  requests: RequestRecordInput[];
  stock: StockRecordInput[];
};

/**
 * Resolve sheets and column mappings (explicit choices win over suggestions)
 * and return both tables renamed to canonical fields, ready for `reconcile`.
 */
export function loadDispatchInputs(workbook: XLSX.WorkBook, selection: SheetSelection = {}): DispatchInputs {
  const suggested = suggestSheets(listSheets(workbook));
  const requestSheet = selection.requestSheet ?? suggested.requestSheet;
  const stockSheet = selection.stockSheet ?? suggested.stockSheet;

  const requestHeaders = readSheetHeaders(workbook, requestSheet);
  const stockHeaders = readSheetHeaders(workbook, stockSheet);

  const requestMapping = selection.requestMapping ?? suggestColumnMapping("requests", requestHeaders);
  const stockMapping = selection.stockMapping ?? suggestColumnMapping("stock", stockHeaders);
  assertCompleteMapping("requests", requestMapping, requestHeaders);
  assertCompleteMapping("stock", stockMapping, stockHeaders);

  return {
    requestSheet,
    stockSheet,
    requestMapping,
    stockMapping,
    requests: readSheetRows(workbook, requestSheet).map((row) => mapHeaders("requests", requestMapping, row)),
    stock: readSheetRows(workbook, stockSheet).map((row) => mapHeaders("stock", stockMapping, row))
  };
}

export type DispatchExportOptions = {
  /** Append "SAP Antes" / "SAP Restante" after the standard columns. */
  includeAuditColumns?: boolean;
};

export function dispatchRows(lines: readonly OutputLine[], options: DispatchExportOptions = {}): (string | number)[][] {
  const columns = options.includeAuditColumns ? [...OUTPUT_COLUMNS, ...AUDIT_COLUMNS] : OUTPUT_COLUMNS;
  return [columns.map((column) => column.label), ...lines.map((line) => columns.map((column) => column.value(line)))];
}

export function writeDispatchWorkbook(lines: readonly OutputLine[], options: DispatchExportOptions = {}): Buffer {
  return workbookToBuffer(buildWorkbook([{ name: DISPATCH_SHEET_NAME, rows: dispatchRows(lines, options) }]));
}
