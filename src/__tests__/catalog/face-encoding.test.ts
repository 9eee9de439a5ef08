import { describe, expect, it } from 'vitest';
import { decodeFaces, encodeFaces } from '../../services/catalog/face-encoding.js';
import type { RawCardFace } from '../../services/scryfall/schemas.js';

const face = (name: string, typeLine: string, image?: string): RawCardFace => ({
  name,
  type_line: typeLine,
  mana_cost: '',
  oracle_text: '',
  image_uris: image ? { normal: image } : {},
});

describe('encodeFaces', () => {
  it('appends the image marker only when a normal image exists', () => {
    expect(
      encodeFaces([
        face('Delver of Secrets', 'Creature — Human Wizard', 'https://img.example/front.jpg'),
        face('Insectile Aberration', 'Creature — Human Insect'),
      ]),
    ).toBe(
      'Delver of Secrets (Creature — Human Wizard) |IMG:https://img.example/front.jpg // Insectile Aberration (Creature — Human Insect)',
    );
  });
});

describe('decodeFaces', () => {
  it('recovers name, type line and image of every face', () => {
    const encoded = encodeFaces([
      face('Front', 'Creature — Werewolf', 'https://img.example/a.jpg'),
      face('Back', 'Creature — Werewolf', 'https://img.example/b.jpg'),
    ]);

    expect(decodeFaces(encoded)).toEqual([
      { name: 'Front', typeLine: 'Creature — Werewolf', imageUrl: 'https://img.example/a.jpg' },
      { name: 'Back', typeLine: 'Creature — Werewolf', imageUrl: 'https://img.example/b.jpg' },
    ]);
  });

  it('returns no faces for an empty encoding', () => {
    expect(decodeFaces('')).toEqual([]);
  });

  it('decodes a segment without a type as a bare name', () => {
    expect(decodeFaces('Plain Name')).toEqual([{ name: 'Plain Name', typeLine: '', imageUrl: null }]);
  });

  it('decodes an empty type line', () => {
    expect(decodeFaces('Fire () // Ice ()')).toEqual([
      { name: 'Fire', typeLine: '', imageUrl: null },
      { name: 'Ice', typeLine: '', imageUrl: null },
    ]);
  });
});
