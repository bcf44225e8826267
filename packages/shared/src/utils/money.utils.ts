// ============================================================================
// Money Utilities
// Amounts travel as two-decimal strings ("500.00") and are summed in cents.
// ============================================================================

/**
 * Convert a decimal amount ("12.5", "12.50", 12.5) to integer cents.
 * Returns 0 for null, undefined or unparseable input.
 */
export function toCents(value: string | number | null | undefined): number {
  if (value === null || value === undefined) return 0;
  const n = typeof value === 'number' ? value : parseFloat(value);
  if (Number.isNaN(n)) return 0;
  return Math.round(n * 100);
}

/** Format integer cents as a 2-decimal-place string (e.g. 50000 -> "500.00"). */
export function fromCents(cents: number): string {
  return (cents / 100).toFixed(2);
}

/** Normalise any decimal amount to its 2-decimal-place string form. */
export function formatAmount(value: string | number): string {
  return fromCents(toCents(value));
}

/**
 * Sum amounts exactly. Null or absent values count as zero.
 */
export function sumAmounts(
  values: ReadonlyArray<string | number | null | undefined>,
): string {
  let total = 0;
  for (const value of values) {
    total += toCents(value);
  }
  return fromCents(total);
}

/** True when `a` is greater than `b`, compared in cents. */
export function amountExceeds(
  a: string | number | null | undefined,
  b: string | number | null | undefined,
): boolean {
  return toCents(a) > toCents(b);
}
