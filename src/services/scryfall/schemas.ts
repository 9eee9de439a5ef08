import { z } from 'zod';

// Lenient readers: a field with the wrong type falls back to its empty value
// instead of failing the record, so the batch keeps going on odd payloads.
const text = z.string().catch('');
const flag = z.boolean().catch(false);
const count = z.number().catch(0);
const rank = z.number().int().nullable().catch(null);
const stringList = z.array(z.string()).catch([]);
const stringMap = z.record(z.string()).catch({});
const identifier = z.string().trim().min(1).optional().catch(undefined);

export const priceValueSchema = z.union([z.string(), z.number(), z.null()]).catch(null);

const EMPTY_FACE = {
  name: '',
  mana_cost: '',
  type_line: '',
  oracle_text: '',
  image_uris: {},
};

export const rawCardFaceSchema = z
  .object({
    name: text,
    mana_cost: text,
    type_line: text,
    oracle_text: text,
    image_uris: stringMap,
  })
  .catch(EMPTY_FACE);

export const rawCardSchema = z.object({
  id: identifier,
  name: text,
  mana_cost: text,
  cmc: count,
  type_line: text,
  oracle_text: text,
  power: text,
  toughness: text,
  colors: stringList,
  color_identity: stringList,
  legalities: stringMap,
  games: stringList,
  reserved: flag,
  foil: flag,
  nonfoil: flag,
  finishes: stringList,
  oversized: flag,
  promo: flag,
  reprint: flag,
  variation: flag,
  set_id: text,
  set: text,
  set_name: text,
  collector_number: text,
  rarity: text,
  artist: text,
  border_color: text,
  frame: text,
  full_art: flag,
  textless: flag,
  booster: flag,
  story_spotlight: flag,
  edhrec_rank: rank,
  penny_rank: rank,
  prices: z.record(priceValueSchema).catch({}),
  related_uris: stringMap,
  purchase_uris: stringMap,
  image_uris: stringMap,
  card_faces: z.array(rawCardFaceSchema).catch([]),
});

export type RawCard = z.infer<typeof rawCardSchema>;
export type RawCardFace = z.infer<typeof rawCardFaceSchema>;

export const rawSetSchema = z.object({
  id: identifier,
  code: text,
  name: text,
  set_type: text,
  released_at: text,
  block_code: text,
  block: text,
  parent_set_code: text,
  card_count: count,
  digital: flag,
  foil_only: flag,
  nonfoil_only: flag,
  scryfall_uri: text,
  uri: text,
  icon_svg_uri: text,
  search_uri: text,
  printed_size: rank,
});

// --- Response envelopes ---

export const listEnvelopeSchema = z.object({
  object: z.literal('list').optional(),
  data: z.array(z.unknown()),
  has_more: z.boolean().optional(),
  next_page: z.string().optional(),
  total_cards: z.number().optional(),
});

export const bulkDataListSchema = z.object({
  data: z.array(
    z.object({
      type: z.string(),
      download_uri: z.string(),
      updated_at: z.string().optional(),
      size: z.number().optional(),
    }),
  ),
});

export const errorBodySchema = z.object({
  details: z.string(),
});
