import { isRecord } from '../../utils/guards.js';

export type Currency = 'USD' | 'EUR' | 'TIX' | 'Unknown';

export interface LegalityHistoryRow {
  card_id: string;
  format_name: string;
  legality_status: string;
}

export interface PriceHistoryRow {
  card_id: string;
  price_type: string;
  price_value: string;
  currency: Currency;
}

export interface CardHistory {
  legalities: LegalityHistoryRow[];
  prices: PriceHistoryRow[];
}

// Substring match on the price kind: usd, usd_foil, usd_etched → USD, etc.
// A future kind that merely contains "usd" would be misfiled.
export function inferCurrency(priceType: string): Currency {
  const kind = priceType.toLowerCase();
  if (kind.includes('usd')) return 'USD';
  if (kind.includes('eur')) return 'EUR';
  if (kind.includes('tix')) return 'TIX';
  return 'Unknown';
}

function scalarText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

/**
 * One snapshot row per format. No dedup against earlier snapshots: every
 * ingestion records the full map again.
 */
export function buildLegalityHistory(cardId: string, legalities: unknown): LegalityHistoryRow[] {
  if (!isRecord(legalities)) return [];

  const rows: LegalityHistoryRow[] = [];
  for (const [formatName, status] of Object.entries(legalities)) {
    const text = scalarText(status);
    if (text === null) continue;
    rows.push({ card_id: cardId, format_name: formatName, legality_status: text });
  }
  return rows;
}

/** One snapshot row per price kind that has a value; null prices are skipped. */
export function buildPriceHistory(cardId: string, prices: unknown): PriceHistoryRow[] {
  if (!isRecord(prices)) return [];

  const rows: PriceHistoryRow[] = [];
  for (const [priceType, value] of Object.entries(prices)) {
    const text = scalarText(value);
    if (text === null) continue;
    rows.push({
      card_id: cardId,
      price_type: priceType,
      price_value: text,
      currency: inferCurrency(priceType),
    });
  }
  return rows;
}

export function buildCardHistory(card: { id: string; legalities: unknown; prices: unknown }): CardHistory {
  return {
    legalities: buildLegalityHistory(card.id, card.legalities),
    prices: buildPriceHistory(card.id, card.prices),
  };
}
