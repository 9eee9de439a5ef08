import { z } from 'zod';
import type { CardRow, SetRow } from './normalizer.js';

// jsonb columns come back from pg already parsed; these schemas pin them to
// the types the rest of the code expects.
const jsonList = z.array(z.string()).catch([]);
const jsonMap = z.record(z.string()).catch({});
const nullableInt = z.number().int().nullable();

export const storedCardSchema: z.ZodType<CardRow, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  name: z.string(),
  mana_cost: z.string(),
  cmc: z.coerce.number(),
  type_line: z.string(),
  oracle_text: z.string(),
  power: z.string(),
  toughness: z.string(),
  colors: jsonList,
  color_identity: jsonList,
  legalities: jsonMap,
  games: jsonList,
  reserved: z.boolean(),
  foil: z.boolean(),
  nonfoil: z.boolean(),
  finishes: jsonList,
  oversized: z.boolean(),
  promo: z.boolean(),
  reprint: z.boolean(),
  variation: z.boolean(),
  set_id: z.string(),
  set_code: z.string(),
  set_name: z.string(),
  collector_number: z.string(),
  rarity: z.string(),
  artist: z.string(),
  border_color: z.string(),
  frame: z.string(),
  full_art: z.boolean(),
  textless: z.boolean(),
  booster: z.boolean(),
  story_spotlight: z.boolean(),
  edhrec_rank: nullableInt,
  penny_rank: nullableInt,
  prices: z.record(z.string().nullable()).catch({}),
  related_uris: jsonMap,
  purchase_uris: jsonMap,
  image_uris: jsonMap,
  card_faces: z.string(),
});

export const storedSetSchema: z.ZodType<SetRow, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  code: z.string(),
  name: z.string(),
  set_type: z.string(),
  released_at: z.string().nullable(),
  block_code: z.string(),
  block: z.string(),
  parent_set_code: z.string(),
  card_count: z.number(),
  digital: z.boolean(),
  foil_only: z.boolean(),
  nonfoil_only: z.boolean(),
  scryfall_uri: z.string(),
  uri: z.string(),
  icon_svg_uri: z.string(),
  search_uri: z.string(),
  printed_size: nullableInt,
});
