import type { RawCardFace } from '../scryfall/schemas.js';

/** Joins composite fields and face summaries. */
export const FACE_SEPARATOR = ' // ';
const IMAGE_MARKER = ' |IMG:';
const TYPE_OPEN = ' (';

export interface CardFace {
  name: string;
  typeLine: string;
  imageUrl: string | null;
}

/**
 * Compact per-face summary stored on the card row:
 * `Name (Type Line) |IMG:https://... // Other Name (Type)`.
 * Every face is encoded, not only the two used for the composite fields.
 */
export function encodeFaces(faces: RawCardFace[]): string {
  return faces
    .map((face) => {
      let summary = `${face.name}${TYPE_OPEN}${face.type_line})`;
      const image = face.image_uris.normal;
      if (image) {
        summary += `${IMAGE_MARKER}${image}`;
      }
      return summary;
    })
    .join(FACE_SEPARATOR);
}

/**
 * Inverse of {@link encodeFaces}. A segment without a trailing
 * parenthesized type decodes with an empty type line.
 */
export function decodeFaces(encoded: string): CardFace[] {
  if (!encoded) return [];

  return encoded.split(FACE_SEPARATOR).map((segment) => {
    let nameType = segment;
    let imageUrl: string | null = null;

    const marker = segment.indexOf(IMAGE_MARKER);
    if (marker !== -1) {
      nameType = segment.slice(0, marker);
      imageUrl = segment.slice(marker + IMAGE_MARKER.length) || null;
    }

    const open = nameType.indexOf(TYPE_OPEN);
    if (open !== -1 && nameType.endsWith(')')) {
      return {
        name: nameType.slice(0, open),
        typeLine: nameType.slice(open + TYPE_OPEN.length, -1),
        imageUrl,
      };
    }

    return { name: nameType, typeLine: '', imageUrl };
  });
}
