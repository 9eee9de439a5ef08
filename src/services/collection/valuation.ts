import type { CardPrices } from '../catalog/normalizer.js';

/**
 * USD unit price for a finish. Foils fall back to the regular price when no
 * foil price is listed. Unparseable or missing prices yield null.
 */
export function unitPrice(prices: CardPrices, isFoil: boolean): number | null {
  const raw = isFoil ? (prices.usd_foil ?? prices.usd) : prices.usd;
  if (raw === null || raw === undefined || raw === '') return null;

  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export function roundCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}
