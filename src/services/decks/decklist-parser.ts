import { ValidationError } from '../../utils/errors.js';
import { MAX_QUANTITY } from '../collection/collection-ledger.js';

export interface DecklistEntry {
  name: string;
  quantity: number;
}

const COUNT_PATTERN = /^[0-9]+$/;

/**
 * One entry per non-blank line: `"4 Lightning Bolt"` → 4 × Lightning Bolt.
 * A line whose first token is not a plain digit run (or that has nothing
 * after it) is taken whole as a name with quantity 1. A count above
 * MAX_QUANTITY rejects the whole list.
 */
export function parseDecklist(text: string): DecklistEntry[] {
  const entries: DecklistEntry[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const match = /^(\S+)\s+(.+)$/.exec(line);
    if (match && COUNT_PATTERN.test(match[1])) {
      const quantity = Number(match[1]);
      if (quantity > MAX_QUANTITY) {
        throw new ValidationError(`Quantity too large: ${line}`, { line, max: MAX_QUANTITY });
      }
      entries.push({ name: match[2].trim(), quantity });
    } else {
      entries.push({ name: line, quantity: 1 });
    }
  }

  return entries;
}

export function formatDecklist(entries: DecklistEntry[]): string {
  return entries.map((e) => `${e.quantity} ${e.name}`).join('\n');
}
