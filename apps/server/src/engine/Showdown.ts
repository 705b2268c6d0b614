import type { HoleCards, RiverBoard, ShowdownResult } from './types';
import { describeHands } from './EquityEngine';
import { scoreHand } from './HandEvaluator';

/**
 * Exact split of the pot on a complete board. Pure: the same cards always
 * give the same result.
 */
export function resolveShowdown(
  holeCardsByPlayer: Readonly<Record<string, HoleCards>>,
  board: RiverBoard,
): ShowdownResult {
  const scores = Object.entries(holeCardsByPlayer).map(([player, hole]) => ({
    player,
    score: scoreHand(hole, board),
  }));
  const best = Math.max(...scores.map(s => s.score));
  const winners = scores.filter(s => s.score === best).map(s => s.player);

  const sharePercent: Record<string, number> = {};
  for (const { player } of scores) {
    sharePercent[player] = winners.includes(player) ? 100 / winners.length : 0;
  }

  return {
    sharePercent,
    tiePercent: winners.length > 1 ? 100 : 0,
    winners,
    handDescriptors: describeHands(holeCardsByPlayer, board),
  };
}
