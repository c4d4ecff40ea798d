/**
 * Allocation Engine
 *
 * Reconciles requested material quantities against on-hand stock. Requests
 * draw from a shared pool in priority order; a request that outruns the pool
 * is split into a dispatchable part and an unmet remainder.
 * Pure math, no I/O.
 */

import {
  requiredRequestFields,
  requiredStockFields,
  type DataQualityIssue,
  type OutputLine,
  type PriorityMode,
  type ReconcileOptions,
  type ReconciliationResult,
  type RequestField,
  type RequestLine,
  type StockEntry,
  type StockField,
  type TableKind
} from "@dispatch/contracts";
import { coerceNonNegativeNumber, coerceText, isCoercionLossy } from "./coerce.js";
import { MissingFieldsError } from "./errors.js";
import { summarizeLines } from "./metrics.js";
import { StockPool } from "./stock-pool.js";

export type RequestRecordInput = Partial<Record<RequestField, unknown>>;
export type StockRecordInput = Partial<Record<StockField, unknown>>;

export interface QueuedRequest {
  line: RequestLine;
  sourceRow: number;
}

// Plan names without a leading number go after every numbered plan.
const UNNUMBERED_PLAN = Number.POSITIVE_INFINITY;

/**
 * Throws when any record lacks one of the required keys. A blank value is
 * data, an absent key is a mapping mistake.
 */
export function assertRequiredFields(
  table: TableKind,
  records: readonly object[],
  required: readonly string[]
): void {
  const missing = required.filter((field) => records.some((record) => !(field in record)));
  if (missing.length > 0) {
    throw new MissingFieldsError(table, missing);
  }
}

function normalizeQty(
  table: DataQualityIssue["table"],
  row: number,
  field: "requestedQty" | "availableQty",
  raw: unknown,
  issues: DataQualityIssue[]
): number {
  if (isCoercionLossy(raw)) {
    issues.push({
      table,
      row,
      field,
      code: "QTY_COERCED",
      message: `Value "${coerceText(raw)}" is not a non-negative number; treated as 0`
    });
  }
  return coerceNonNegativeNumber(raw);
}

export function normalizeStockEntry(record: StockRecordInput, row: number, issues: DataQualityIssue[]): StockEntry {
  return {
    itemId: coerceText(record.itemId),
    stockDescription: coerceText(record.stockDescription),
    materialCode: coerceText(record.materialCode),
    availableQty: normalizeQty("stock", row, "availableQty", record.availableQty, issues)
  };
}

export function normalizeRequestLine(record: RequestRecordInput, row: number, issues: DataQualityIssue[]): RequestLine {
  return {
    itemId: coerceText(record.itemId),
    materialCode: coerceText(record.materialCode),
    materialDescription: coerceText(record.materialDescription),
    siteCode: coerceText(record.siteCode),
    planName: coerceText(record.planName),
    requestedQty: normalizeQty("requests", row, "requestedQty", record.requestedQty, issues)
  };
}

/**
 * First-seen description per code. A later, different, non-empty description
 * is reported rather than used.
 */
export function indexDescriptions(entries: readonly StockEntry[], issues: DataQualityIssue[]): Map<string, string> {
  const descriptions = new Map<string, string>();
  entries.forEach((entry, row) => {
    if (entry.materialCode === "") return;
    const seen = descriptions.get(entry.materialCode);
    if (seen === undefined) {
      descriptions.set(entry.materialCode, entry.stockDescription);
      return;
    }
    if (entry.stockDescription !== "" && seen !== "" && entry.stockDescription !== seen) {
      issues.push({
        table: "stock",
        row,
        field: "stockDescription",
        code: "CONFLICTING_DESCRIPTION",
        message: `Material ${entry.materialCode} is also described as "${entry.stockDescription}"; keeping "${seen}"`
      });
    }
  });
  return descriptions;
}

export function leadingPlanNumber(planName: string): number {
  const digits = /^(\d+)/.exec(planName)?.[1];
  return digits === undefined ? UNNUMBERED_PLAN : Number.parseInt(digits, 10);
}

function compareValues<T extends string | number>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Array#sort is stable, so input order breaks every tie. */
export function orderRequests(queue: readonly QueuedRequest[], priority: PriorityMode): QueuedRequest[] {
  if (priority === "input-order") return [...queue];
  return [...queue].sort(
    (a, b) =>
      compareValues(a.line.materialCode, b.line.materialCode) ||
      compareValues(leadingPlanNumber(a.line.planName), leadingPlanNumber(b.line.planName))
  );
}

function allocateRequest(
  request: QueuedRequest,
  pool: StockPool,
  descriptions: ReadonlyMap<string, string>,
  issues: DataQualityIssue[]
): OutputLine[] {
  const { line, sourceRow } = request;
  const code = line.materialCode;

  if (!pool.has(code)) {
    issues.push({
      table: "requests",
      row: sourceRow,
      field: "materialCode",
      code: "UNMATCHED_MATERIAL",
      message: code === "" ? "Material code is blank" : `Material ${code} has no stock entry`
    });
  }

  const base = { ...line, stockDescription: descriptions.get(code) ?? "", sourceRow };
  const requested = line.requestedQty;
  const before = pool.remaining(code);

  if (requested === 0) {
    return [{ ...base, allocatedQty: 0, unmetQty: 0, dispatchable: false, stockBefore: before, stockAfter: before }];
  }

  const taken = pool.take(code, requested);
  const after = pool.remaining(code);

  if (taken === requested) {
    return [{ ...base, allocatedQty: taken, unmetQty: 0, dispatchable: true, stockBefore: before, stockAfter: after }];
  }

  const lines: OutputLine[] = [];
  if (taken > 0) {
    lines.push({ ...base, allocatedQty: taken, unmetQty: 0, dispatchable: true, stockBefore: before, stockAfter: after });
  }
  // The remainder is terminal: it is never retried against other codes.
  lines.push({
    ...base,
    allocatedQty: 0,
    unmetQty: requested - taken,
    dispatchable: false,
    stockBefore: 0,
    stockAfter: 0
  });
  return lines;
}

export function reconcile(
  requests: readonly RequestRecordInput[],
  stock: readonly StockRecordInput[],
  options: ReconcileOptions = {}
): ReconciliationResult {
  assertRequiredFields("requests", requests, requiredRequestFields);
  assertRequiredFields("stock", stock, requiredStockFields);

  const issues: DataQualityIssue[] = [];
  const stockEntries = stock.map((record, row) => normalizeStockEntry(record, row, issues));
  const pool = StockPool.fromEntries(stockEntries);
  const descriptions = indexDescriptions(stockEntries, issues);

  const queue = requests.map((record, row) => ({ line: normalizeRequestLine(record, row, issues), sourceRow: row }));

  const lines: OutputLine[] = [];
  for (const request of orderRequests(queue, options.priority ?? "input-order")) {
    lines.push(...allocateRequest(request, pool, descriptions, issues));
  }

  return { lines, metrics: summarizeLines(lines), issues };
}
