/**
 * Canonical Ordering
 *
 * Every sorted list in a plan is ordered by UTF-16 code unit. The result
 * does not depend on the host locale, and two strings compare equal only
 * when they are identical, so output order never follows input order.
 */

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Compares field by field, stopping at the first difference */
export function compareTuples(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const order = compareStrings(a[i] ?? "", b[i] ?? "");
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

/**
 * Map key for a tuple of strings. JSON encoding keeps the fields apart
 * whatever characters they contain.
 */
export function tupleKey(fields: readonly string[]): string {
  return JSON.stringify(fields);
}
