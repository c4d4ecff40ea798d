/**
 * Stock Pool
 *
 * Running on-hand balance per material code for a single reconciliation
 * run. Balances only go down and never below zero. Build a new pool for
 * every run; never share one between runs.
 */

export interface PoolSeed {
  materialCode: string;
  availableQty: number;
}

export class StockPool {
  private readonly balances = new Map<string, number>();

  /** Sums quantities of repeated codes. Blank codes cannot be joined and are skipped. */
  static fromEntries(entries: Iterable<PoolSeed>): StockPool {
    const pool = new StockPool();
    for (const entry of entries) {
      if (entry.materialCode === "") continue;
      const qty = Math.max(entry.availableQty, 0);
      pool.balances.set(entry.materialCode, (pool.balances.get(entry.materialCode) ?? 0) + qty);
    }
    return pool;
  }

  get size(): number {
    return this.balances.size;
  }

  has(materialCode: string): boolean {
    return this.balances.has(materialCode);
  }

  remaining(materialCode: string): number {
    return this.balances.get(materialCode) ?? 0;
  }

  /**
   * Take up to `qty` for a code and return what was actually taken.
   */
  take(materialCode: string, qty: number): number {
    const available = this.remaining(materialCode);
    if (qty <= 0 || available <= 0) return 0;

    const taken = Math.min(qty, available);
    this.balances.set(materialCode, taken === available ? 0 : available - taken);
    return taken;
  }

  snapshot(): Map<string, number> {
    return new Map(this.balances);
  }
}
