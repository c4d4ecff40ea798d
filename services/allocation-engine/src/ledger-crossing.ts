/**
 * Ledger Crossing
 *
 * Applies a finished dispatch plan to a master ledger keyed by site and item.
 * Each dispatchable plan row draws down the matching ledger balance; a row
 * that overdraws it is split into a crossed part and a negative-balance
 * deficit part. Ledger rows the plan never touches are carried through.
 */

import { format } from "date-fns";
import { ledgerCrossingOptionsSchema, type LedgerCrossingOptions } from "@dispatch/contracts";

export type LedgerCell = string | number | boolean | Date | null;

export interface LedgerEntry {
  siteCode: string;
  itemId: string;
  balance: number;
  dispatchDate: Date | null;
  /** Every other master column, keyed by header, carried through untouched. */
  extra: Record<string, LedgerCell>;
}

export interface DispatchPlanRow {
  siteCode: string;
  itemId: string;
  quantity: number;
  /** Raw "Descargable" label as exported ("Si" / "No"). */
  dispatchable: string;
}

export interface LedgerCrossingStamp {
  dispatchedQty: number;
  crossed: boolean;
  observation: string;
  newWorkOrder: string;
  newJobNumber: string;
  compositeCode: string;
  dispatchDateText: string;
}

export interface CrossedLedgerEntry extends LedgerEntry {
  crossing: LedgerCrossingStamp | null;
}

export interface LedgerCrossingResult {
  entries: CrossedLedgerEntry[];
  crossedRows: number;
  skippedPlanRows: number;
}

const DISPATCHABLE_LABELS = new Set(["si", "sí"]);

export function isDispatchableLabel(label: string): boolean {
  return DISPATCHABLE_LABELS.has(label.trim().toLowerCase());
}

function ledgerKey(siteCode: string, itemId: string): string {
  return JSON.stringify([siteCode, itemId]);
}

export function crossLedger(
  master: readonly LedgerEntry[],
  plan: readonly DispatchPlanRow[],
  rawOptions: LedgerCrossingOptions
): LedgerCrossingResult {
  const options = ledgerCrossingOptionsSchema.parse(rawOptions);
  const newJobNumber = options.newJobNumber.padStart(2, "0");

  // Later rows for the same key replace earlier ones but keep the first position.
  const index = new Map<string, LedgerEntry>();
  for (const entry of master) {
    if (entry.siteCode === "") continue;
    index.set(ledgerKey(entry.siteCode, entry.itemId), entry);
  }

  const stamp = (entry: LedgerEntry, dispatchedQty: number, balance: number, crossed: boolean): CrossedLedgerEntry => ({
    ...entry,
    balance,
    crossing: {
      dispatchedQty,
      crossed,
      observation: options.observation,
      newWorkOrder: options.newWorkOrder,
      newJobNumber,
      compositeCode: `${options.newWorkOrder}${newJobNumber}-${entry.itemId}`,
      dispatchDateText: entry.dispatchDate ? format(entry.dispatchDate, "dd/MM/yyyy") : ""
    }
  });

  const rows: CrossedLedgerEntry[] = [];
  let skippedPlanRows = 0;
  let crossedRows = 0;

  for (const planRow of plan) {
    const key = ledgerKey(planRow.siteCode, planRow.itemId);
    const entry = index.get(key);
    if (!entry) {
      skippedPlanRows += 1;
      continue;
    }
    index.delete(key);

    if (!isDispatchableLabel(planRow.dispatchable)) {
      rows.push({ ...entry, crossing: null });
      continue;
    }

    const qty = planRow.quantity;
    if (entry.balance >= qty) {
      const balance = entry.balance - qty;
      rows.push(stamp(entry, qty, balance, balance === 0));
    } else {
      const used = Math.max(entry.balance, 0);
      const deficit = qty - used;
      rows.push(stamp(entry, used, 0, true));
      rows.push(stamp(entry, deficit, -deficit, false));
    }
    crossedRows += 1;
  }

  for (const entry of index.values()) {
    rows.push({ ...entry, crossing: null });
  }

  return { entries: rows, crossedRows, skippedPlanRows };
}
