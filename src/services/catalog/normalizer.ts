import { createLogger } from '../logger/index.js';
import { MissingIdentifierError } from '../../utils/errors.js';
import { isRecord } from '../../utils/guards.js';
import { rawCardSchema, rawSetSchema, type RawCard } from '../scryfall/schemas.js';
import { FACE_SEPARATOR, encodeFaces } from './face-encoding.js';

const logger = createLogger('normalizer');

const ORACLE_SEPARATOR = ' \n//\n ';

// --- Row types for database writes ---

export type CardPrices = Record<string, string | null>;

export interface SetRow {
  id: string;
  code: string;
  name: string;
  set_type: string;
  released_at: string | null;
  block_code: string;
  block: string;
  parent_set_code: string;
  card_count: number;
  digital: boolean;
  foil_only: boolean;
  nonfoil_only: boolean;
  scryfall_uri: string;
  uri: string;
  icon_svg_uri: string;
  search_uri: string;
  printed_size: number | null;
}

export interface CardRow {
  id: string;
  name: string;
  mana_cost: string;
  cmc: number;
  type_line: string;
  oracle_text: string;
  power: string;
  toughness: string;
  colors: string[];
  color_identity: string[];
  legalities: Record<string, string>;
  games: string[];
  reserved: boolean;
  foil: boolean;
  nonfoil: boolean;
  finishes: string[];
  oversized: boolean;
  promo: boolean;
  reprint: boolean;
  variation: boolean;
  set_id: string;
  set_code: string;
  set_name: string;
  collector_number: string;
  rarity: string;
  artist: string;
  border_color: string;
  frame: string;
  full_art: boolean;
  textless: boolean;
  booster: boolean;
  story_spotlight: boolean;
  edhrec_rank: number | null;
  penny_rank: number | null;
  prices: CardPrices;
  related_uris: Record<string, string>;
  purchase_uris: Record<string, string>;
  image_uris: Record<string, string>;
  card_faces: string;
}

// --- Helpers ---

interface CompositeFields {
  name: string;
  oracle_text: string;
  mana_cost: string;
  type_line: string;
}

/**
 * Merge the first two faces of a multi-faced card into single display fields.
 * Faces beyond the second are not reflected here (they are still encoded in
 * `card_faces`).
 */
export function compositeFields(card: RawCard): CompositeFields {
  const [front, back] = card.card_faces;
  if (!front || !back) {
    return {
      name: card.name,
      oracle_text: card.oracle_text,
      mana_cost: card.mana_cost,
      type_line: card.type_line,
    };
  }

  return {
    name: `${front.name}${FACE_SEPARATOR}${back.name}`,
    oracle_text: `${front.oracle_text}${ORACLE_SEPARATOR}${back.oracle_text}`,
    mana_cost: `${front.mana_cost}${FACE_SEPARATOR}${back.mana_cost}`,
    type_line: `${front.type_line}${FACE_SEPARATOR}${back.type_line}`,
  };
}

export function normalizePrices(prices: RawCard['prices']): CardPrices {
  const result: CardPrices = {};
  for (const [kind, value] of Object.entries(prices)) {
    result[kind] = value === null ? null : String(value);
  }
  return result;
}

// --- Main normalizers ---

/**
 * Flatten one raw catalog card into a storage row. Optional fields default to
 * empty values; only a missing `id` rejects the record.
 *
 * @param fallbackSetCode - used when the record itself carries no `set`
 */
export function normalizeCard(raw: unknown, fallbackSetCode = ''): CardRow {
  const card = rawCardSchema.parse(isRecord(raw) ? raw : {});
  if (!card.id) {
    throw new MissingIdentifierError('card', {
      name: card.name || undefined,
      set: card.set || fallbackSetCode || undefined,
    });
  }

  if (card.card_faces.length > 2) {
    logger.debug({ cardId: card.id, faces: card.card_faces.length }, 'Composite fields use the first two faces');
  }

  return {
    id: card.id,
    ...compositeFields(card),
    cmc: card.cmc,
    power: card.power,
    toughness: card.toughness,
    colors: card.colors,
    color_identity: card.color_identity,
    legalities: card.legalities,
    games: card.games,
    reserved: card.reserved,
    foil: card.foil,
    nonfoil: card.nonfoil,
    finishes: card.finishes,
    oversized: card.oversized,
    promo: card.promo,
    reprint: card.reprint,
    variation: card.variation,
    set_id: card.set_id,
    set_code: card.set || fallbackSetCode,
    set_name: card.set_name,
    collector_number: card.collector_number,
    rarity: card.rarity,
    artist: card.artist,
    border_color: card.border_color,
    frame: card.frame,
    full_art: card.full_art,
    textless: card.textless,
    booster: card.booster,
    story_spotlight: card.story_spotlight,
    edhrec_rank: card.edhrec_rank,
    penny_rank: card.penny_rank,
    prices: normalizePrices(card.prices),
    related_uris: card.related_uris,
    purchase_uris: card.purchase_uris,
    image_uris: card.image_uris,
    card_faces: card.card_faces.length > 0 ? encodeFaces(card.card_faces) : '',
  };
}

export function normalizeSet(raw: unknown): SetRow {
  const set = rawSetSchema.parse(isRecord(raw) ? raw : {});
  if (!set.id) {
    throw new MissingIdentifierError('set', { code: set.code || undefined });
  }

  return {
    id: set.id,
    code: set.code,
    name: set.name || set.code,
    set_type: set.set_type,
    released_at: set.released_at || null,
    block_code: set.block_code,
    block: set.block,
    parent_set_code: set.parent_set_code,
    card_count: set.card_count,
    digital: set.digital,
    foil_only: set.foil_only,
    nonfoil_only: set.nonfoil_only,
    scryfall_uri: set.scryfall_uri,
    uri: set.uri,
    icon_svg_uri: set.icon_svg_uri,
    search_uri: set.search_uri,
    printed_size: set.printed_size,
  };
}
