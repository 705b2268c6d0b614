import type { ErrorRequestHandler } from 'express';
import { GameError, type GameErrorCode } from '../engine/errors';
import { CardMapError, type CardMapErrorCode } from '../redis/CardMapStore';

const GAME_ERROR_STATUS: Record<GameErrorCode, number> = {
  INVALID_CONFIG: 400,
  UNSUPPORTED_TABLE_SIZE: 400,
  INVALID_SEAT: 400,
  INVALID_CARD: 400,
  INVALID_PHASE: 409,
  DECK_EXHAUSTED: 409,
  DUPLICATE_CARD: 409,
};

const CARD_MAP_ERROR_STATUS: Record<CardMapErrorCode, number> = {
  INVALID_UID: 400,
  UID_ALREADY_MAPPED: 409,
  UNKNOWN_CARD_UID: 422,
};

/** Last middleware in the chain: typed errors become `{ error, message }`. */
export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof GameError) {
    console.warn(`[http] ${req.method} ${req.path} → ${err.code}: ${err.message}`);
    res.status(GAME_ERROR_STATUS[err.code]).json({ error: err.code, message: err.message });
    return;
  }
  if (err instanceof CardMapError) {
    res.status(CARD_MAP_ERROR_STATUS[err.code]).json({ error: err.code, message: err.message });
    return;
  }
  // express.json() rejects malformed bodies with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'INVALID_BODY', message: 'Malformed JSON body' });
    return;
  }

  console.error(`[http] ${req.method} ${req.path} failed:`, err);
  res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
};
