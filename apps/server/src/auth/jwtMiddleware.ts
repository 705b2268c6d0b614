/**
 * Host tokens: issued for a table's host code, checked on every host route.
 */

import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';

export const HOST_TOKEN_TTL = '12h';

// ─── Types ────────────────────────────────────────────────────────────────────

const hostTokenSchema = z.object({
  tableId: z.string().min(1),
  role: z.literal('host'),
  iat: z.number(),
  exp: z.number(),
});

export type HostTokenPayload = z.infer<typeof hostTokenSchema>;

function getSecret(): string {
  const secret = process.env.JWT_SECRET;
  if (!secret) throw new Error('JWT_SECRET is not configured');
  return secret;
}

// ─── Core signer / verifier ───────────────────────────────────────────────────

export function signHostToken(tableId: string): string {
  return jwt.sign({ tableId, role: 'host' }, getSecret(), { expiresIn: HOST_TOKEN_TTL });
}

export function verifyHostToken(token: string): HostTokenPayload | null {
  const secret = getSecret();
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, secret);
  } catch {
    return null;
  }
  const parsed = hostTokenSchema.safeParse(decoded);
  return parsed.success ? parsed.data : null;
}

// ─── Express middleware ───────────────────────────────────────────────────────

function authenticate(req: Request, res: Response): HostTokenPayload | null {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) {
    res.status(401).json({ error: 'UNAUTHORIZED', message: 'Authorization header missing' });
    return null;
  }

  const payload = verifyHostToken(authHeader.slice(7));
  if (!payload) {
    res.status(401).json({ error: 'UNAUTHORIZED', message: 'Invalid or expired token' });
    return null;
  }
  return payload;
}

/** Any table's host. Used for the shared card map. */
export function requireHost(req: Request, res: Response, next: NextFunction): void {
  if (authenticate(req, res)) next();
}

/** The host of the table named by `:id`. */
export function requireTableHost(req: Request, res: Response, next: NextFunction): void {
  const payload = authenticate(req, res);
  if (!payload) return;

  if (payload.tableId !== req.params.id) {
    res.status(403).json({ error: 'FORBIDDEN', message: 'Token belongs to another table' });
    return;
  }
  next();
}
