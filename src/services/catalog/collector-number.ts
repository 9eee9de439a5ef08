/**
 * Leading run of digits as an integer: "12a" → 12, "4★" → 4, "S7" → null.
 */
export function leadingNumber(collectorNumber: string): number | null {
  const match = /^\d+/.exec(collectorNumber);
  return match ? parseInt(match[0], 10) : null;
}

/**
 * Total order over collector numbers. Numbers with a numeric prefix come
 * first, by that prefix; everything else follows. Ties ("12" / "12a", or two
 * non-numeric values) fall back to plain string comparison.
 */
export function compareCollectorNumbers(a: string, b: string): number {
  const na = leadingNumber(a);
  const nb = leadingNumber(b);

  if (na !== null && nb !== null && na !== nb) return na - nb;
  if (na !== null && nb === null) return -1;
  if (na === null && nb !== null) return 1;

  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
