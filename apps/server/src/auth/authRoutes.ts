/**
 * Host sign-in
 *
 *   POST /api/tables/:id/host-token  { hostCode } → { token, expiresIn }
 *
 * The host code is the 4-letter code returned when the table was created.
 * It stays the same across hands and reconfiguration.
 */

import { Router } from 'express';
import { z } from 'zod';
import type { RateLimiters } from '../middleware/rateLimiter';
import type { TableManager } from '../table/TableManager';
import { findTable } from '../table/tableRoutes';
import { HOST_TOKEN_TTL, signHostToken } from './jwtMiddleware';

const hostCodeSchema = z.object({
  hostCode: z.string().min(1).max(16),
});

export function createAuthRouter(tables: TableManager, limiters: RateLimiters): Router {
  const router = Router();

  router.post('/tables/:id/host-token', limiters.auth, (req, res) => {
    const parsed = hostCodeSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'INVALID_BODY', details: parsed.error.flatten() });
      return;
    }

    const table = findTable(tables, req.params.id, res);
    if (!table) return;

    if (parsed.data.hostCode.trim().toUpperCase() !== table.hostCode) {
      console.warn(`[auth] wrong host code for table ${table.id}`);
      res.status(401).json({ error: 'INVALID_HOST_CODE', message: 'Host code does not match' });
      return;
    }

    res.json({ token: signHostToken(table.id), expiresIn: HOST_TOKEN_TTL });
  });

  return router;
}
