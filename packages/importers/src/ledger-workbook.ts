import { isValid, parse } from "date-fns";
import {
  MissingFieldsError,
  coerceNonNegativeNumber,
  coerceNumber,
  coerceText,
  type CrossedLedgerEntry,
  type DispatchPlanRow,
  type LedgerEntry
} from "@dispatch/allocation-engine";
import { DISPATCH_SHEET_NAME } from "./dispatch-workbook.js";
import { buildWorkbook, listSheets, readSheetHeaders, readSheetRows, readWorkbook, workbookToBuffer } from "./workbook.js";
import type { SheetCell, WorkbookSource } from "./types.js";

export const LEDGER_COLUMNS = {
  siteCode: "CODIGO OBRA SGT",
  itemId: "Item",
  balance: "SALDO",
  dispatchDate: "FECHA DESCAR SGT"
} as const;

export const STAMP_COLUMNS = {
  dispatchedQty: "Cant Desc.",
  crossed: "CRUZADO",
  observation: "OBSERVACION",
  newWorkOrder: "NUEVA OBRA",
  newJobNumber: "NUEVO TRABAJO",
  compositeCode: "OBRA - TRAB - ITEM"
} as const;

const PLAN_COLUMNS = {
  siteCode: "CODIGO OBRA SGT",
  itemId: "Item",
  dispatchable: "Descargable",
  quantity: ["Cantidad Asignada", "Planilla Cantidad"]
} as const;

const DATE_FORMATS = ["dd/MM/yyyy", "d/M/yyyy", "yyyy-MM-dd"];

export type LedgerWorkbook = {
  sheetName: string;
  headers: string[];
  entries: LedgerEntry[];
};

export function parseLedgerDate(cell: SheetCell | undefined): Date | null {
  if (cell instanceof Date) return isValid(cell) ? cell : null;
  if (typeof cell !== "string" || cell.trim() === "") return null;
  for (const pattern of DATE_FORMATS) {
    const parsed = parse(cell.trim(), pattern, new Date());
    if (isValid(parsed)) return parsed;
  }
  return null;
}

function requireHeaders(table: "ledger" | "dispatch-plan", headers: readonly string[], required: readonly string[]): void {
  const missing = required.filter((header) => !headers.includes(header));
  if (missing.length > 0) {
    throw new MissingFieldsError(table, missing);
  }
}

const KNOWN_LEDGER_HEADERS = new Set<string>(Object.values(LEDGER_COLUMNS));

/** Master ledger from the given sheet, or the first one. */
export function readLedgerWorkbook(source: WorkbookSource, sheetName?: string): LedgerWorkbook {
  const workbook = readWorkbook(source);
  const sheet = sheetName ?? listSheets(workbook)[0] ?? "";
  const headers = readSheetHeaders(workbook, sheet);
  requireHeaders("ledger", headers, [LEDGER_COLUMNS.siteCode, LEDGER_COLUMNS.itemId, LEDGER_COLUMNS.balance]);

  const entries = readSheetRows(workbook, sheet).map((row): LedgerEntry => {
    const extra: Record<string, SheetCell> = {};
    for (const header of headers) {
      if (!KNOWN_LEDGER_HEADERS.has(header)) extra[header] = row[header] ?? "";
    }
    return {
      siteCode: coerceText(row[LEDGER_COLUMNS.siteCode]),
      itemId: coerceText(row[LEDGER_COLUMNS.itemId]),
      balance: coerceNumber(row[LEDGER_COLUMNS.balance]),
      dispatchDate: parseLedgerDate(row[LEDGER_COLUMNS.dispatchDate]),
      extra
    };
  });

  return { sheetName: sheet, headers, entries };
}

/**
 * Reads an exported dispatch workbook. Quantity comes from "Cantidad Asignada"
 * when present, else from "Planilla Cantidad".
 */
export function readDispatchPlanWorkbook(source: WorkbookSource, sheetName?: string): DispatchPlanRow[] {
  const workbook = readWorkbook(source);
  const sheets = listSheets(workbook);
  const sheet = sheetName ?? (sheets.includes(DISPATCH_SHEET_NAME) ? DISPATCH_SHEET_NAME : (sheets[0] ?? ""));
  const headers = readSheetHeaders(workbook, sheet);

  const quantityHeader = PLAN_COLUMNS.quantity.find((header) => headers.includes(header));
  requireHeaders("dispatch-plan", headers, [PLAN_COLUMNS.siteCode, PLAN_COLUMNS.itemId, PLAN_COLUMNS.dispatchable]);
  if (quantityHeader === undefined) {
    throw new MissingFieldsError("dispatch-plan", [PLAN_COLUMNS.quantity.join(" | ")]);
  }

  return readSheetRows(workbook, sheet).map((row) => ({
    siteCode: coerceText(row[PLAN_COLUMNS.siteCode]),
    itemId: coerceText(row[PLAN_COLUMNS.itemId]),
    quantity: coerceNonNegativeNumber(row[quantityHeader]),
    dispatchable: coerceText(row[PLAN_COLUMNS.dispatchable])
  }));
}

function ledgerCell(entry: CrossedLedgerEntry, header: string): SheetCell {
  const { crossing } = entry;
  switch (header) {
    case LEDGER_COLUMNS.siteCode:
      return entry.siteCode;
    case LEDGER_COLUMNS.itemId:
      return entry.itemId;
    case LEDGER_COLUMNS.balance:
      return entry.balance;
    case LEDGER_COLUMNS.dispatchDate:
      if (crossing) return crossing.dispatchDateText;
      return entry.dispatchDate ?? "";
  }
  if (crossing) {
    switch (header) {
      case STAMP_COLUMNS.dispatchedQty:
        return crossing.dispatchedQty;
      case STAMP_COLUMNS.crossed:
        return crossing.crossed ? "SI" : "NO";
      case STAMP_COLUMNS.observation:
        return crossing.observation;
      case STAMP_COLUMNS.newWorkOrder:
        return crossing.newWorkOrder;
      case STAMP_COLUMNS.newJobNumber:
        return crossing.newJobNumber;
      case STAMP_COLUMNS.compositeCode:
        return crossing.compositeCode;
    }
  }
  return entry.extra[header] ?? "";
}

/** Header row plus one row per entry; stamp columns missing from the master are appended. */
export function ledgerRows(headers: readonly string[], entries: readonly CrossedLedgerEntry[]): SheetCell[][] {
  const columns = [...headers, ...Object.values(STAMP_COLUMNS).filter((column) => !headers.includes(column))];
  return [columns, ...entries.map((entry) => columns.map((header) => ledgerCell(entry, header)))];
}

export function writeLedgerWorkbook(headers: readonly string[], entries: readonly CrossedLedgerEntry[]): Buffer {
  return workbookToBuffer(buildWorkbook([{ name: "Sheet1", rows: ledgerRows(headers, entries) }]));
}
