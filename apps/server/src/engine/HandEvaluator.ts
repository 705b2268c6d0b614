import { RANKS, SUITS, type Card, type Rank, type Suit } from '@feltcast/shared';
import { ConfigurationError } from './errors';

// ─────────────────────────────────────────────────────────────────────────────
// Hand rank constants  (higher = stronger)
// ─────────────────────────────────────────────────────────────────────────────

export const enum HandRank {
  HighCard = 0,
  OnePair = 1,
  TwoPair = 2,
  ThreeOfAKind = 3,
  Straight = 4,
  Flush = 5,
  FullHouse = 6,
  FourOfAKind = 7,
  StraightFlush = 8,
  RoyalFlush = 9,
}

const HAND_RANKS: readonly HandRank[] = [
  HandRank.HighCard,
  HandRank.OnePair,
  HandRank.TwoPair,
  HandRank.ThreeOfAKind,
  HandRank.Straight,
  HandRank.Flush,
  HandRank.FullHouse,
  HandRank.FourOfAKind,
  HandRank.StraightFlush,
  HandRank.RoyalFlush,
];

export const HAND_RANK_NAMES: Record<HandRank, string> = {
  [HandRank.HighCard]: 'High Card',
  [HandRank.OnePair]: 'One Pair',
  [HandRank.TwoPair]: 'Two Pair',
  [HandRank.ThreeOfAKind]: 'Three of a Kind',
  [HandRank.Straight]: 'Straight',
  [HandRank.Flush]: 'Flush',
  [HandRank.FullHouse]: 'Full House',
  [HandRank.FourOfAKind]: 'Four of a Kind',
  [HandRank.StraightFlush]: 'Straight Flush',
  [HandRank.RoyalFlush]: 'Royal Flush',
};

export interface EvaluatedHand {
  rank: HandRank;
  name: string;
  /** The five cards that make up the best hand, highest first */
  cards: Card[];
  /**
   * Tiebreaker value: an array of rank values (14 = Ace) used to break ties
   * within the same HandRank.  Compare element-by-element, largest wins.
   */
  tiebreakers: number[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Card lookup
// ─────────────────────────────────────────────────────────────────────────────

interface ParsedCard {
  code: Card;
  value: number;
  suit: Suit;
}

const PARSED = new Map<Card, ParsedCard>();
RANKS.forEach((rank, i) => {
  for (const suit of SUITS) {
    const code: Card = `${rank}${suit}`;
    PARSED.set(code, { code, value: i + 2, suit });
  }
});

function parse(card: Card): ParsedCard {
  const parsed = PARSED.get(card);
  if (!parsed) throw new ConfigurationError('INVALID_CARD', `Not a card: "${card}"`);
  return parsed;
}

/** 2 → '2', 10 → 'T', 14 → 'A'. */
export function rankLabel(value: number): Rank {
  const rank = RANKS[value - 2];
  if (rank === undefined) throw new RangeError(`No rank with value ${value}`);
  return rank;
}

export function rankValue(card: Card): number {
  return parse(card).value;
}

// ─────────────────────────────────────────────────────────────────────────────
// Evaluate the best 5-card hand from 5–7 cards
// ─────────────────────────────────────────────────────────────────────────────

export function evaluateBestHand(cards: readonly Card[]): EvaluatedHand {
  if (cards.length < 5) throw new Error('Need at least 5 cards');

  const parsed = cards.map(parse);
  let best: EvaluatedHand | null = null;

  for (const combo of combinations5(parsed)) {
    const evaluated = evaluate5(combo);
    if (!best || compareHands(evaluated, best) > 0) {
      best = evaluated;
    }
  }

  if (!best) throw new Error('No five-card combination found');
  return best;
}

/** Compare two evaluated hands: returns positive if a > b, negative if a < b, 0 if equal. */
export function compareHands(a: EvaluatedHand, b: EvaluatedHand): number {
  if (a.rank !== b.rank) return a.rank - b.rank;
  for (let i = 0; i < Math.max(a.tiebreakers.length, b.tiebreakers.length); i++) {
    const diff = (a.tiebreakers[i] ?? 0) - (b.tiebreakers[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

// ─────────────────────────────────────────────────────────────────────────────
// Numeric scores
//
// A score packs the hand rank and up to five tiebreakers into base 15, so two
// hands compare with plain `>`. Higher is better.
// ─────────────────────────────────────────────────────────────────────────────

const BASE = 15;
const RANK_WEIGHT = BASE ** 5;

export function encodeScore(hand: EvaluatedHand): number {
  let score = hand.rank * RANK_WEIGHT;
  let weight = RANK_WEIGHT / BASE;
  for (const tb of hand.tiebreakers) {
    score += tb * weight;
    weight /= BASE;
  }
  return score;
}

export function scoreHand(holeCards: readonly Card[], boardCards: readonly Card[]): number {
  return encodeScore(evaluateBestHand([...holeCards, ...boardCards]));
}

export function classify(score: number): HandRank {
  const rank = HAND_RANKS[Math.floor(score / RANK_WEIGHT)];
  if (rank === undefined) throw new RangeError(`Score ${score} is out of range`);
  return rank;
}

// ─────────────────────────────────────────────────────────────────────────────
// Evaluate exactly 5 cards
// ─────────────────────────────────────────────────────────────────────────────

function evaluate5(cards: ParsedCard[]): EvaluatedHand {
  const sorted = [...cards].sort((a, b) => b.value - a.value);
  const values = sorted.map(c => c.value);
  const isFlush = cards.every(c => c.suit === cards[0].suit);
  const straightHigh = straightHighCard(values);
  const groups = groupByCount(values);
  // Pairs and trips first, then kickers, each block highest first
  const grouped = groups.map(g => g.value);

  if (isFlush && straightHigh > 0) {
    const rank = straightHigh === 14 ? HandRank.RoyalFlush : HandRank.StraightFlush;
    return make(rank, sorted, [straightHigh]);
  }

  if (groups[0].count === 4) return make(HandRank.FourOfAKind, sorted, grouped);
  if (groups[0].count === 3 && groups[1].count === 2) return make(HandRank.FullHouse, sorted, grouped);
  if (isFlush) return make(HandRank.Flush, sorted, values);
  if (straightHigh > 0) return make(HandRank.Straight, sorted, [straightHigh]);
  if (groups[0].count === 3) return make(HandRank.ThreeOfAKind, sorted, grouped);
  if (groups[0].count === 2 && groups[1].count === 2) return make(HandRank.TwoPair, sorted, grouped);
  if (groups[0].count === 2) return make(HandRank.OnePair, sorted, grouped);

  return make(HandRank.HighCard, sorted, values);
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function make(rank: HandRank, cards: ParsedCard[], tiebreakers: number[]): EvaluatedHand {
  return { rank, name: HAND_RANK_NAMES[rank], cards: cards.map(c => c.code), tiebreakers };
}

/** High card of a 5-card straight (5 for the wheel), or 0 when there is none. */
function straightHighCard(sortedValues: number[]): number {
  const isConsecutive = sortedValues.every(
    (v, i) => i === 0 || sortedValues[i - 1] - v === 1
  );
  if (isConsecutive) return sortedValues[0];
  // Wheel: A-2-3-4-5
  const isWheel =
    sortedValues[0] === 14 &&
    sortedValues[1] === 5 &&
    sortedValues[2] === 4 &&
    sortedValues[3] === 3 &&
    sortedValues[4] === 2;
  return isWheel ? 5 : 0;
}

interface RankGroup {
  value: number;
  count: number;
}

/** Rank frequencies ordered by count, then rank, both descending. */
export function groupByCount(values: readonly number[]): RankGroup[] {
  const counts = new Map<number, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count || b.value - a.value);
}

function* combinations5<T>(cards: T[]): Generator<T[]> {
  const n = cards.length;
  for (let i = 0; i < n - 4; i++)
    for (let j = i + 1; j < n - 3; j++)
      for (let k = j + 1; k < n - 2; k++)
        for (let l = k + 1; l < n - 1; l++)
          for (let m = l + 1; m < n; m++)
            yield [cards[i], cards[j], cards[k], cards[l], cards[m]];
}
