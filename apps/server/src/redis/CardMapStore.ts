/**
 * CardMapStore – physical card UID → card code.
 *
 * What is persisted:
 *   cards:uid  →  hash of UID → card code (e.g. "04A1B2C3" → "As")
 *
 * Redis when it is connected, otherwise a Map that lives as long as the
 * process. Each UID can be trained once; retraining needs a fresh store.
 */

import type Redis from 'ioredis';
import type { Card } from '@feltcast/shared';
import { isCard } from '../engine/Deck';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type CardMapErrorCode = 'UID_ALREADY_MAPPED' | 'UNKNOWN_CARD_UID' | 'INVALID_UID';

export class CardMapError extends Error {
  constructor(
    readonly code: CardMapErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CardMapError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Key helpers
// ─────────────────────────────────────────────────────────────────────────────

const KEY_CARD_MAP = 'cards:uid';
export const DECK_SIZE = 52;

/** Scanners report UIDs in mixed case, sometimes with separators. */
export function normalizeUid(raw: string): string {
  const uid = raw.replace(/[\s:-]/g, '').toUpperCase();
  if (!/^[0-9A-F]{4,32}$/.test(uid)) {
    throw new CardMapError('INVALID_UID', `Not a card UID: "${raw}"`);
  }
  return uid;
}

// ─────────────────────────────────────────────────────────────────────────────
// Store
// ─────────────────────────────────────────────────────────────────────────────

export class CardMapStore {
  private memory = new Map<string, Card>();

  constructor(private readonly redis: Redis | null) {}

  get backend(): 'redis' | 'memory' {
    return this.redis ? 'redis' : 'memory';
  }

  /** Records a UID. Rejects a UID that already has a card. */
  async train(rawUid: string, card: Card): Promise<void> {
    const uid = normalizeUid(rawUid);

    if (!this.redis) {
      const existing = this.memory.get(uid);
      if (existing) throw alreadyMapped(uid, existing);
      this.memory.set(uid, card);
      return;
    }

    try {
      const created = await this.redis.hsetnx(KEY_CARD_MAP, uid, card);
      if (created === 0) {
        const existing = await this.redis.hget(KEY_CARD_MAP, uid);
        throw alreadyMapped(uid, existing ?? 'another card');
      }
    } catch (err) {
      if (!(err instanceof CardMapError)) {
        console.warn(`[redis] train failed for ${uid}:`, err instanceof Error ? err.message : err);
      }
      throw err;
    }
  }

  /** The card for a UID. Throws UNKNOWN_CARD_UID when it was never trained. */
  async lookup(rawUid: string): Promise<Card> {
    const uid = normalizeUid(rawUid);
    const card = this.redis ? await this.redisLookup(uid) : this.memory.get(uid);
    if (!card) throw new CardMapError('UNKNOWN_CARD_UID', `UID ${uid} is not mapped to a card`);
    return card;
  }

  async count(): Promise<number> {
    if (!this.redis) return this.memory.size;
    try {
      return await this.redis.hlen(KEY_CARD_MAP);
    } catch (err) {
      console.warn('[redis] count failed:', err instanceof Error ? err.message : err);
      throw err;
    }
  }

  private async redisLookup(uid: string): Promise<Card | undefined> {
    if (!this.redis) return undefined;
    try {
      const raw = await this.redis.hget(KEY_CARD_MAP, uid);
      if (raw === null) return undefined;
      if (!isCard(raw)) {
        console.warn(`[redis] UID ${uid} maps to "${raw}", which is not a card`);
        return undefined;
      }
      return raw;
    } catch (err) {
      console.warn(`[redis] lookup failed for ${uid}:`, err instanceof Error ? err.message : err);
      throw err;
    }
  }
}

function alreadyMapped(uid: string, card: string): CardMapError {
  return new CardMapError('UID_ALREADY_MAPPED', `UID ${uid} is already mapped to ${card}`);
}
