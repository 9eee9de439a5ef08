/**
 * 1-based page number from a query value; anything unusable is page 1.
 * Capped so that the row offset stays a safe integer.
 */
export function parsePage(raw: unknown, pageSize: number): number {
  const page = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (!Number.isFinite(page) || page < 1) return 1;
  return Math.min(page, Math.floor(Number.MAX_SAFE_INTEGER / pageSize));
}
