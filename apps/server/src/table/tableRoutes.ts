/**
 * Table routes
 *
 *   GET    /api/tables                    – lobby listing
 *   POST   /api/tables                    – create a table, returns its host code
 *   GET    /api/tables/:id/state          – public view
 *   GET    /api/tables/:id/version        – version only, for cheap polling
 *   GET    /api/tables/:id/host-state     – everything (host)
 *   POST   /api/tables/:id/advance        – next phase (host)
 *   POST   /api/tables/:id/force-button   – misdeal, new hand with a given button (host)
 *   PUT    /api/tables/:id/config         – new players / button / mode (host)
 *   POST   /api/tables/:id/scans          – stage a scanned card (host, SCANNED tables)
 *   DELETE /api/tables/:id                – close the table (host)
 */

import { Router, type Response } from 'express';
import { z } from 'zod';
import { requireTableHost } from '../auth/jwtMiddleware';
import { parseCard } from '../engine/Deck';
import type { CardMapStore } from '../redis/CardMapStore';
import type { TableManager } from './TableManager';
import type { TableSession } from './TableSession';

// ─── Body schemas ─────────────────────────────────────────────────────────────
// Shape only. Seat ranges, table size and blank names are the engine's call.

const setupSchema = z.object({
  players: z.array(z.string()),
  buttonSeat: z.number().int(),
  infoMode: z.enum(['FULL', 'DELAYED']).default('DELAYED'),
});

const createSchema = setupSchema.extend({
  dealer: z.enum(['SIMULATED', 'SCANNED']).default('SIMULATED'),
});

const forceButtonSchema = z.object({
  seat: z.number().int(),
});

const scanSchema = z.union([
  z.object({ uid: z.string().min(1) }),
  z.object({ card: z.string().min(2).max(3) }),
]);

// ─── Helpers ──────────────────────────────────────────────────────────────────

function invalidBody(res: Response, error: z.ZodError): void {
  res.status(400).json({ error: 'INVALID_BODY', details: error.flatten() });
}

export function findTable(tables: TableManager, id: string, res: Response): TableSession | null {
  const table = tables.getTable(id);
  if (!table) {
    res.status(404).json({ error: 'TABLE_NOT_FOUND', message: `No table ${id}` });
    return null;
  }
  return table;
}

// ─── Router ───────────────────────────────────────────────────────────────────

export function createTableRouter(tables: TableManager, cardMap: CardMapStore): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ tables: tables.listTables() });
  });

  router.post('/', (req, res) => {
    const parsed = createSchema.safeParse(req.body);
    if (!parsed.success) return invalidBody(res, parsed.error);

    const { players, buttonSeat, infoMode, dealer } = parsed.data;
    const table = tables.createTable({ players, buttonIndex: buttonSeat, infoMode }, { dealer });
    res.status(201).json({ tableId: table.id, hostCode: table.hostCode, state: table.view() });
  });

  router.get('/:id/state', (req, res) => {
    const table = findTable(tables, req.params.id, res);
    if (!table) return;
    res.json(table.view());
  });

  router.get('/:id/version', (req, res) => {
    const table = findTable(tables, req.params.id, res);
    if (!table) return;
    res.json({ version: table.version });
  });

  // ── Host only ────────────────────────────────────────────────────────────

  router.get('/:id/host-state', requireTableHost, (req, res) => {
    const table = findTable(tables, req.params.id, res);
    if (!table) return;
    res.json(table.hostView());
  });

  router.post('/:id/advance', requireTableHost, (req, res) => {
    const table = findTable(tables, req.params.id, res);
    if (!table) return;
    res.json(table.advance());
  });

  router.post('/:id/force-button', requireTableHost, (req, res) => {
    const table = findTable(tables, req.params.id, res);
    if (!table) return;
    const parsed = forceButtonSchema.safeParse(req.body);
    if (!parsed.success) return invalidBody(res, parsed.error);
    res.json(table.forceButton(parsed.data.seat));
  });

  router.put('/:id/config', requireTableHost, (req, res) => {
    const table = findTable(tables, req.params.id, res);
    if (!table) return;
    const parsed = setupSchema.safeParse(req.body);
    if (!parsed.success) return invalidBody(res, parsed.error);
    const { players, buttonSeat, infoMode } = parsed.data;
    res.json(table.reconfigure({ players, buttonIndex: buttonSeat, infoMode }));
  });

  router.post('/:id/scans', requireTableHost, async (req, res, next) => {
    const table = findTable(tables, req.params.id, res);
    if (!table) return;
    const parsed = scanSchema.safeParse(req.body);
    if (!parsed.success) return invalidBody(res, parsed.error);

    try {
      const card = 'uid' in parsed.data
        ? await cardMap.lookup(parsed.data.uid)
        : parseCard(parsed.data.card);
      const staged = table.stageCard(card);
      res.json({ card, staged });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', requireTableHost, (req, res) => {
    const table = findTable(tables, req.params.id, res);
    if (!table) return;
    tables.deleteTable(table.id);
    console.log(`[table] closed ${table.id}`);
    res.status(204).end();
  });

  return router;
}
