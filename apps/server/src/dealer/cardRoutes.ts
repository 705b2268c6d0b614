/**
 * Card UID training
 *
 *   GET  /api/cards/mappings           – how much of the deck is trained
 *   POST /api/cards/mappings { uid, card } – map one physical card
 *
 * Any table's host may train; the map is shared by every SCANNED table.
 */

import { Router } from 'express';
import { z } from 'zod';
import { requireHost } from '../auth/jwtMiddleware';
import { parseCard } from '../engine/Deck';
import { DECK_SIZE, normalizeUid, type CardMapStore } from '../redis/CardMapStore';

const trainSchema = z.object({
  uid: z.string().min(1),
  card: z.string().min(2).max(3),
});

export function createCardRouter(cardMap: CardMapStore): Router {
  const router = Router();

  router.get('/mappings', requireHost, async (_req, res, next) => {
    try {
      const count = await cardMap.count();
      res.json({ count, complete: count >= DECK_SIZE, backend: cardMap.backend });
    } catch (err) {
      next(err);
    }
  });

  router.post('/mappings', requireHost, async (req, res, next) => {
    const parsed = trainSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'INVALID_BODY', details: parsed.error.flatten() });
      return;
    }

    try {
      const uid = normalizeUid(parsed.data.uid);
      const card = parseCard(parsed.data.card);
      await cardMap.train(uid, card);
      const count = await cardMap.count();
      console.log(`[cards] trained ${uid} → ${card} (${count}/${DECK_SIZE})`);
      res.status(201).json({ uid, card, count });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
