import { describe, it, expect } from "vitest";
import { StockPool } from "./stock-pool.js";

describe("StockPool", () => {
  it("sums repeated codes and skips blank ones", () => {
    const pool = StockPool.fromEntries([
      { materialCode: "A", availableQty: 4 },
      { materialCode: "A", availableQty: 6 },
      { materialCode: "", availableQty: 9 },
    ]);

    expect(pool.size).toBe(1);
    expect(pool.remaining("A")).toBe(10);
    expect(pool.has("")).toBe(false);
  });

  it("takes no more than what remains", () => {
    const pool = StockPool.fromEntries([{ materialCode: "A", availableQty: 5 }]);

    expect(pool.take("A", 3)).toBe(3);
    expect(pool.take("A", 3)).toBe(2);
    expect(pool.take("A", 3)).toBe(0);
    expect(pool.remaining("A")).toBe(0);
  });

  it("treats unknown codes as empty", () => {
    const pool = StockPool.fromEntries([]);

    expect(pool.has("X")).toBe(false);
    expect(pool.remaining("X")).toBe(0);
    expect(pool.take("X", 1)).toBe(0);
  });

  it("ignores non-positive takes", () => {
    const pool = StockPool.fromEntries([{ materialCode: "A", availableQty: 5 }]);

    expect(pool.take("A", 0)).toBe(0);
    expect(pool.take("A", -2)).toBe(0);
    expect(pool.remaining("A")).toBe(5);
  });

  it("drains fractional balances to exactly zero", () => {
    const pool = StockPool.fromEntries([{ materialCode: "A", availableQty: 0.3 }]);

    expect(pool.take("A", 0.1)).toBe(0.1);
    pool.take("A", 1);
    expect(pool.remaining("A")).toBe(0);
  });

  it("hands out snapshots that do not alias the pool", () => {
    const pool = StockPool.fromEntries([{ materialCode: "A", availableQty: 5 }]);
    const snapshot = pool.snapshot();
    pool.take("A", 5);

    expect(snapshot.get("A")).toBe(5);
    expect(pool.snapshot().get("A")).toBe(0);
  });
});
