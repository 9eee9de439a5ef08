import { Router } from 'express';
import { z } from 'zod';
import { validateBody, validateParams } from '../middleware/validation.js';
import type { DeckService } from '../services/decks/deck-service.js';

const deckSchema = z.object({
  name: z.string().default(''),
  description: z.string().default(''),
  format: z.string().default(''),
  main_deck: z.string().default(''),
  sideboard: z.string().default(''),
});

const idParams = z.object({ id: z.coerce.number().int().positive() });

export function createDecksRouter(decks: DeckService): Router {
  const router = Router();

  router.get('/', async (_req, res) => {
    res.json({ success: true, decks: await decks.list() });
  });

  /**
   * GET /api/decks/:id — Deck lines with owned quantities.
   */
  router.get('/:id', async (req, res) => {
    const { id } = validateParams(idParams, req);
    res.json({ success: true, deck: await decks.get(id) });
  });

  /**
   * GET /api/decks/:id/edit — The deck as editable decklist text.
   */
  router.get('/:id/edit', async (req, res) => {
    const { id } = validateParams(idParams, req);
    res.json({ success: true, deck: await decks.getForEdit(id) });
  });

  router.post('/clear', async (_req, res) => {
    const removed = await decks.deleteAll();
    res.json({ success: true, message: `Successfully deleted ${removed} decks`, removed });
  });

  router.post('/', async (req, res) => {
    const body = validateBody(deckSchema, req);
    const deck = await decks.save({
      name: body.name,
      description: body.description,
      format: body.format,
      mainDeck: body.main_deck,
      sideboard: body.sideboard,
    });
    res.status(201).json({ success: true, message: 'Deck created successfully', deck_id: deck.id });
  });

  router.put('/:id', async (req, res) => {
    const { id } = validateParams(idParams, req);
    const body = validateBody(deckSchema, req);
    const deck = await decks.save({
      deckId: id,
      name: body.name,
      description: body.description,
      format: body.format,
      mainDeck: body.main_deck,
      sideboard: body.sideboard,
    });
    res.json({ success: true, message: 'Deck updated successfully', deck_id: deck.id });
  });

  router.delete('/:id', async (req, res) => {
    const { id } = validateParams(idParams, req);
    await decks.delete(id);
    res.json({ success: true, message: 'Deck deleted successfully' });
  });

  return router;
}
