import { once } from 'node:events';
import type { Server } from 'node:http';
import express from 'express';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { errorHandler, notFoundHandler } from '../../middleware/error-handler.js';
import { createDecksRouter } from '../../routes/decks.js';
import { createTradesRouter } from '../../routes/trades.js';
import { DeckService } from '../../services/decks/deck-service.js';
import { TradeLedger } from '../../services/trades/trade-ledger.js';
import { MemoryUnitOfWork, makeCard } from '../helpers/memory-unit-of-work.js';

describe('HTTP routes', () => {
  let uow: MemoryUnitOfWork;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    uow = new MemoryUnitOfWork();
    uow.addCard(makeCard({ id: 'x', name: 'Card X', set: 'neo', collector_number: '12' }));

    const app = express();
    app.use(express.json());
    app.use('/api/trades', createTradesRouter(new TradeLedger(uow)));
    app.use('/api/decks', createDecksRouter(new DeckService(uow)));
    app.use(notFoundHandler);
    app.use(errorHandler);

    server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.close();
    await once(server, 'close');
  });

  const send = (method: string, path: string, body?: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  const buy = { set_code: 'neo', collector_number: '12', direction: 'Buy', quantity: 4, price: 1 };

  it('records a trade', async () => {
    const res = await send('POST', '/api/trades', buy);

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      success: true,
      holding: 4,
      message: 'Successfully added Buy trade for 4 regular cards. Added 4 regular cards to collection',
    });
  });

  it('maps a rejected sell to 409', async () => {
    await send('POST', '/api/trades', buy);

    const res = await send('POST', '/api/trades', { ...buy, direction: 'Sell', quantity: 5 });

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      success: false,
      code: 'INSUFFICIENT_HOLDINGS',
      message: 'Cannot sell 5 cards. Only 4 regular cards in collection',
    });
    expect(uow.quantity('x')).toBe(4);
  });

  it('rejects a malformed body with field details', async () => {
    const res = await send('POST', '/api/trades', { ...buy, direction: 'Hold' });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      success: false,
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: { fieldErrors: { direction: [expect.any(String)] } },
    });
  });

  it('rejects a quantity beyond the INTEGER range', async () => {
    const res = await send('POST', '/api/trades', { ...buy, quantity: 3000000000 });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: 'VALIDATION_ERROR',
      details: { fieldErrors: { quantity: [expect.any(String)] } },
    });
    expect(uow.state.trades.size).toBe(0);
  });

  it('rejects an oversized decklist count as bad input', async () => {
    const res = await send('POST', '/api/decks', { name: 'Test', main_deck: '99999999999999999999 Card X' });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Quantity too large: 99999999999999999999 Card X',
    });
    expect(uow.state.decks.size).toBe(0);
  });

  it('clamps a huge page number', async () => {
    const res = await send('GET', `/api/trades?page=${'9'.repeat(30)}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ success: true, page: Math.floor(Number.MAX_SAFE_INTEGER / 50) });
  });

  it('reports deleting a trade that does not exist', async () => {
    const res = await send('DELETE', '/api/trades/99');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, code: 'NOT_FOUND', message: "Trade '99' not found" });
  });

  it('rejects a non-numeric trade id', async () => {
    const res = await send('DELETE', '/api/trades/abc');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Invalid path parameters' });
  });

  it('lists unknown deck cards by name', async () => {
    const res = await send('POST', '/api/decks', { name: 'Test', main_deck: '4 Card X\n1 Card Y\n2 Card Z' });

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({
      code: 'CARD_NOT_FOUND',
      message: 'Cards not found in database: Card Y, Card Z',
    });
    expect(uow.state.decks.size).toBe(0);
  });

  it('creates a deck', async () => {
    const res = await send('POST', '/api/decks', { name: 'Test', main_deck: '4 Card X' });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ success: true, message: 'Deck created successfully', deck_id: 1 });
  });

  it('answers unknown routes with 404', async () => {
    const res = await send('GET', '/api/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, code: 'NOT_FOUND', message: 'No route for GET /api/nope' });
  });
});
