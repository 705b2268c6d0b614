import type { Card, Phase, Street } from '@feltcast/shared';
import { buildDeck, drawRandom, type Rng } from './Deck';
import { CardIntegrityError, ConfigurationError } from './errors';
import { HandRank, evaluateBestHand, rankLabel, rankValue, scoreHand } from './HandEvaluator';
import type { HoleCards } from './types';

// ─────────────────────────────────────────────────────────────────────────────
// Monte Carlo equity.
//
// Each trial completes the board from the unseen cards and scores every
// player's best five. A lone winner takes credit 1; k co-winners take 1/k each
// and the trial counts once as a tie. The random source is injected so a fixed
// seed replays the same estimate.
// ─────────────────────────────────────────────────────────────────────────────

export const MIN_ITERATIONS = 200;
export const MAX_ITERATIONS = 2000;

const BASE_ITERATIONS = 2200;
const STREET_MULTIPLIER: Readonly<Record<Street, number>> = {
  PREFLOP: 1.0,
  FLOP: 0.75,
  TURN: 0.55,
  RIVER: 0.4,
};
const DEFAULT_MULTIPLIER = 0.6;

export interface EquityEstimate {
  winPercent: Record<string, number>;
  tiePercent: number;
  handDescriptors: Record<string, string>;
  iterations: number;
}

export function isStreet(phase: Phase): phase is Street {
  return phase in STREET_MULTIPLIER;
}

/** Fewer trials for bigger tables and later streets, always within the clamp. */
export function iterationsFor(playerCount: number, phase: Phase): number {
  const n = Math.max(2, playerCount);
  const base = Math.floor(BASE_ITERATIONS / n ** 0.9);
  const multiplier = isStreet(phase) ? STREET_MULTIPLIER[phase] : DEFAULT_MULTIPLIER;
  const iterations = Math.floor(base * multiplier);
  return Math.min(MAX_ITERATIONS, Math.max(MIN_ITERATIONS, iterations));
}

export function estimateEquity(
  holeCardsByPlayer: Readonly<Record<string, HoleCards>>,
  board: readonly Card[],
  iterations: number,
  rng: Rng,
): EquityEstimate {
  const players = Object.keys(holeCardsByPlayer);
  if (players.length === 0) {
    throw new ConfigurationError('INVALID_CONFIG', 'Equity needs at least one player');
  }
  if (board.length > 5) {
    throw new ConfigurationError('INVALID_CONFIG', `A board has at most 5 cards, got ${board.length}`);
  }
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new RangeError(`Iteration count must be a positive integer, got ${iterations}`);
  }

  const known = [...board, ...players.flatMap(p => holeCardsByPlayer[p])];
  const seen = new Set(known);
  if (seen.size !== known.length) {
    throw new CardIntegrityError('A card appears twice among hole and board cards');
  }

  const remainder = buildDeck().filter(c => !seen.has(c));
  const missing = 5 - board.length;
  const credit = new Map<string, number>(players.map(p => [p, 0]));
  let tieTrials = 0;

  const runTrial = (fullBoard: readonly Card[], weight: number): void => {
    let best = -1;
    let leaders: string[] = [];
    for (const player of players) {
      const score = scoreHand(holeCardsByPlayer[player], fullBoard);
      if (score > best) {
        best = score;
        leaders = [player];
      } else if (score === best) {
        leaders.push(player);
      }
    }
    const share = weight / leaders.length;
    for (const player of leaders) credit.set(player, (credit.get(player) ?? 0) + share);
    if (leaders.length > 1) tieTrials += weight;
  };

  if (missing === 0) {
    // Nothing left to draw: every trial would be the same one
    runTrial(board, iterations);
  } else {
    for (let t = 0; t < iterations; t++) {
      runTrial([...board, ...drawRandom(remainder, missing, rng)], 1);
    }
  }

  const winPercent: Record<string, number> = {};
  for (const player of players) {
    winPercent[player] = (100 * (credit.get(player) ?? 0)) / iterations;
  }

  return {
    winPercent,
    tiePercent: (100 * tieTrials) / iterations,
    handDescriptors: describeHands(holeCardsByPlayer, board),
    iterations,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Hand descriptors – from revealed cards only, never simulated ones
// ─────────────────────────────────────────────────────────────────────────────

export function describeHands(
  holeCardsByPlayer: Readonly<Record<string, HoleCards>>,
  board: readonly Card[],
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [player, hole] of Object.entries(holeCardsByPlayer)) {
    result[player] = describeHand(hole, board);
  }
  return result;
}

export function describeHand(hole: HoleCards, board: readonly Card[]): string {
  if (board.length === 0) {
    const a = rankValue(hole[0]);
    const b = rankValue(hole[1]);
    if (a === b) return `Pair of ${rankLabel(a)}s`;
    return `High Card ${rankLabel(Math.max(a, b))}`;
  }

  const best = evaluateBestHand([...hole, ...board]);
  const [first, second] = best.tiebreakers;

  switch (best.rank) {
    case HandRank.HighCard:
      return `High Card ${rankLabel(first)}`;
    case HandRank.OnePair:
      return `Pair of ${rankLabel(first)}s`;
    case HandRank.TwoPair:
      return `Two Pair, ${rankLabel(first)}s over ${rankLabel(second)}s`;
    case HandRank.ThreeOfAKind:
      return `Three of a Kind, ${rankLabel(first)}s`;
    case HandRank.Straight:
      return `Straight, ${straightSpan(first)}`;
    case HandRank.Flush:
      return `Flush, ${rankLabel(first)} high`;
    case HandRank.FullHouse:
      return `Full House, ${rankLabel(first)}s full of ${rankLabel(second)}s`;
    case HandRank.FourOfAKind:
      return `Four of a Kind, ${rankLabel(first)}s`;
    case HandRank.StraightFlush:
      return `Straight Flush, ${straightSpan(first)}`;
    default:
      return best.name;
  }
}

function straightSpan(high: number): string {
  if (high === 5) return 'A to 5';
  return `${rankLabel(high - 4)} to ${rankLabel(high)}`;
}
