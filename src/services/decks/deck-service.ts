import type { UnitOfWork } from '../../db/unit-of-work.js';
import { CardNotFoundError, NotFoundError, ValidationError } from '../../utils/errors.js';
import { createLogger } from '../logger/index.js';
import type { DeckLine, DeckRecord, DeckWithLines } from './deck-repository.js';
import { formatDecklist, parseDecklist, type DecklistEntry } from './decklist-parser.js';

const logger = createLogger('decks');

export interface SaveDeckInput {
  /** Present when editing an existing deck. */
  deckId?: number;
  name: string;
  description?: string;
  format?: string;
  mainDeck: string;
  sideboard?: string;
}

export interface OwnedDeckLine extends DecklistEntry {
  in_collection: number;
}

export interface DeckView extends DeckRecord {
  main_deck: OwnedDeckLine[];
  sideboard: OwnedDeckLine[];
}

export interface DeckEditView extends DeckRecord {
  main_deck_text: string;
  sideboard_text: string;
}

function toLines(entries: DecklistEntry[], isSideboard: boolean): DeckLine[] {
  return entries.map((e) => ({ card_name: e.name, quantity: e.quantity, is_sideboard: isSideboard }));
}

function section(deck: DeckWithLines, isSideboard: boolean): DecklistEntry[] {
  return deck.lines
    .filter((l) => l.is_sideboard === isSideboard)
    .map((l) => ({ name: l.card_name, quantity: l.quantity }));
}

export class DeckService {
  constructor(private readonly uow: UnitOfWork) {}

  /**
   * Create or replace a deck from decklist text. Every card name must exist
   * in the catalog; otherwise nothing is written.
   */
  async save(input: SaveDeckInput): Promise<DeckRecord> {
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError('Deck name is required');
    }

    const mainDeck = parseDecklist(input.mainDeck);
    const sideboard = parseDecklist(input.sideboard ?? '');
    const fields = {
      name,
      description: input.description?.trim() ?? '',
      format: input.format?.trim() ?? '',
    };

    const deck = await this.uow.transaction(async (repos) => {
      const missing = await repos.cards.findMissingNames([...mainDeck, ...sideboard].map((e) => e.name));
      if (missing.length > 0) {
        throw CardNotFoundError.byNames(missing);
      }

      let saved: DeckRecord | null;
      if (input.deckId === undefined) {
        saved = await repos.decks.insert(fields);
      } else {
        saved = await repos.decks.update(input.deckId, fields);
        if (!saved) throw new NotFoundError('Deck', input.deckId);
      }

      await repos.decks.replaceLines(saved.id, [...toLines(mainDeck, false), ...toLines(sideboard, true)]);
      return saved;
    });

    logger.info(
      { deckId: deck.id, mainDeck: mainDeck.length, sideboard: sideboard.length, created: input.deckId === undefined },
      'Deck saved',
    );
    return deck;
  }

  async delete(deckId: number): Promise<void> {
    const removed = await this.uow.transaction((repos) => repos.decks.remove(deckId));
    if (!removed) {
      throw new NotFoundError('Deck', deckId);
    }
  }

  async deleteAll(): Promise<number> {
    const removed = await this.uow.transaction((repos) => repos.decks.clear());
    logger.warn({ removed }, 'All decks deleted');
    return removed;
  }

  async list(): Promise<DeckWithLines[]> {
    return this.uow.read((repos) => repos.decks.list());
  }

  /** A deck with, per line, how many copies of that name are owned. */
  async get(deckId: number): Promise<DeckView> {
    return this.uow.read(async (repos) => {
      const deck = await repos.decks.findById(deckId);
      if (!deck) throw new NotFoundError('Deck', deckId);

      const owned = await repos.collection.ownedByName(deck.lines.map((l) => l.card_name));
      const withOwned = (entries: DecklistEntry[]): OwnedDeckLine[] =>
        entries.map((e) => ({ ...e, in_collection: owned.get(e.name) ?? 0 }));

      const { lines: _lines, ...record } = deck;
      return {
        ...record,
        main_deck: withOwned(section(deck, false)),
        sideboard: withOwned(section(deck, true)),
      };
    });
  }

  /** The deck as editable decklist text. */
  async getForEdit(deckId: number): Promise<DeckEditView> {
    const deck = await this.uow.read((repos) => repos.decks.findById(deckId));
    if (!deck) throw new NotFoundError('Deck', deckId);

    const { lines: _lines, ...record } = deck;
    return {
      ...record,
      main_deck_text: formatDecklist(section(deck, false)),
      sideboard_text: formatDecklist(section(deck, true)),
    };
  }
}
