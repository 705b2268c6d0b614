import { RANKS, SUITS, type Card, type Rank, type Suit } from '@feltcast/shared';
import { ConfigurationError } from './errors';

// ─────────────────────────────────────────────────────────────────────────────
// Seeded PRNG – mulberry32 (fast, deterministic, passes basic randomness tests)
// Both the simulated shuffle and the equity trials draw from one of these, so a
// fixed seed replays a whole hand.
// ─────────────────────────────────────────────────────────────────────────────

export type Rng = () => number;

function mulberry32(seed: number): Rng {
  let s = seed;
  return () => {
    s |= 0;
    s = (s + 0x6d2b79f5) | 0;
    let z = Math.imul(s ^ (s >>> 15), 1 | s);
    z = (z + Math.imul(z ^ (z >>> 7), 61 | z)) ^ z;
    // 2^32 keeps the result strictly below 1
    return ((z ^ (z >>> 14)) >>> 0) / 0x100000000;
  };
}

function seedToNumber(seed: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/** Deterministic random source in [0, 1) for the given seed. */
export function createRng(seed: string): Rng {
  return mulberry32(seedToNumber(seed));
}

// ─────────────────────────────────────────────────────────────────────────────
// Cards
// ─────────────────────────────────────────────────────────────────────────────

const RANK_SET: ReadonlySet<string> = new Set(RANKS);
const SUIT_SET: ReadonlySet<string> = new Set(SUITS);

function isRank(value: string): value is Rank {
  return RANK_SET.has(value);
}

function isSuit(value: string): value is Suit {
  return SUIT_SET.has(value);
}

export function isCard(value: string): value is Card {
  return value.length === 2 && isRank(value[0]) && isSuit(value[1]);
}

/** Accepts `as`, `AS`, `10s` and the like; returns the canonical code. */
export function parseCard(input: string): Card {
  const raw = input.trim();
  const rank = raw.slice(0, -1).toUpperCase().replace('10', 'T');
  const suit = raw.slice(-1).toLowerCase();
  const code = `${rank}${suit}`;
  if (!isCard(code)) {
    throw new ConfigurationError('INVALID_CARD', `Not a card: "${input}"`);
  }
  return code;
}

/** The 52 codes in rank-major order: 2c 2d 2h 2s 3c … As. */
export function buildDeck(): Card[] {
  const deck: Card[] = [];
  for (const rank of RANKS) {
    for (const suit of SUITS) {
      deck.push(`${rank}${suit}`);
    }
  }
  return deck;
}

/** Fisher-Yates in-place shuffle using a provided RNG. */
export function fisherYates<T>(arr: T[], rng: Rng): T[] {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}

/**
 * Moves `count` uniformly chosen items to the front of `arr` (a partial
 * Fisher-Yates) and returns them. The rest of the array is left permuted.
 */
export function drawRandom<T>(arr: T[], count: number, rng: Rng): T[] {
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(rng() * (arr.length - i));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr.slice(0, count);
}
