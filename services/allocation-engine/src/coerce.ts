/**
 * Input Coercion
 *
 * Lenient normalization applied to every raw cell at ingestion. Dirty
 * quantities become 0 instead of failing the run; the shortfall then shows
 * up in the output lines.
 */

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isBlank(raw: unknown): boolean {
  if (raw === null || raw === undefined) return true;
  return typeof raw === "string" && raw.trim() === "";
}

/**
 * Parse a raw cell as a finite decimal, or null when it is not one.
 * Commas are not separators of any kind: "2,5" and "1,234" are not numbers.
 */
export function parseDecimal(raw: unknown): number | null {
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : null;
  if (typeof raw !== "string") return null;

  const text = raw.trim();
  if (text === "" || !DECIMAL_PATTERN.test(text)) return null;

  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function coerceNonNegativeNumber(raw: unknown): number {
  const value = parseDecimal(raw);
  if (value === null || value <= 0) return 0;
  return value;
}

/** Signed variant, for ledger balances that may already be negative. */
export function coerceNumber(raw: unknown): number {
  const value = parseDecimal(raw);
  return value === null || Object.is(value, -0) ? 0 : value;
}

/** True when a non-blank raw quantity could not be kept as-is. */
export function isCoercionLossy(raw: unknown): boolean {
  if (isBlank(raw)) return false;
  const value = parseDecimal(raw);
  return value === null || value < 0;
}

export function coerceText(raw: unknown): string {
  if (raw === null || raw === undefined) return "";
  if (typeof raw === "string") return raw.trim();
  if (typeof raw === "number") return Number.isFinite(raw) ? String(raw) : "";
  if (typeof raw === "boolean") return String(raw);
  if (raw instanceof Date) return Number.isNaN(raw.getTime()) ? "" : raw.toISOString().slice(0, 10);
  return "";
}
