export const CHUNK_SIZE = 100;

/** Deduplicate an array by a key function. Last occurrence wins. */
export function dedup<T>(arr: T[], keyFn: (item: T) => string): T[] {
  const map = new Map<string, T>();
  for (const item of arr) {
    map.set(keyFn(item), item);
  }
  return Array.from(map.values());
}

export function chunk<T>(arr: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < arr.length; i += size) {
    chunks.push(arr.slice(i, i + size));
  }
  return chunks;
}

/**
 * `($1, $2), ($3, $4)` for a multi-row VALUES list of `rows` tuples of
 * `width` parameters each.
 */
export function valuesClause(rows: number, width: number): string {
  const tuples: string[] = [];
  for (let i = 0; i < rows; i++) {
    const offset = i * width;
    const params: string[] = [];
    for (let j = 1; j <= width; j++) {
      params.push(`$${offset + j}`);
    }
    tuples.push(`(${params.join(', ')})`);
  }
  return tuples.join(', ');
}
