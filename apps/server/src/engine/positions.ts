import type { PositionLabel } from '@feltcast/shared';
import { ConfigurationError } from './errors';

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 10;

/** Labels clockwise from the button, keyed by table size. */
const POSITION_LABELS: Readonly<Record<number, readonly PositionLabel[]>> = {
  2: ['BTN', 'BB'],
  3: ['BTN', 'SB', 'BB'],
  4: ['BTN', 'SB', 'BB', 'UTG'],
  5: ['BTN', 'SB', 'BB', 'UTG', 'CO'],
  6: ['BTN', 'SB', 'BB', 'UTG', 'HJ', 'CO'],
  7: ['BTN', 'SB', 'BB', 'UTG', 'UTG+1', 'HJ', 'CO'],
  8: ['BTN', 'SB', 'BB', 'UTG', 'UTG+1', 'UTG+2', 'HJ', 'CO'],
  9: ['BTN', 'SB', 'BB', 'UTG', 'UTG+1', 'UTG+2', 'UTG+3', 'HJ', 'CO'],
  10: ['BTN', 'SB', 'BB', 'UTG', 'UTG+1', 'UTG+2', 'UTG+3', 'UTG+4', 'HJ', 'CO'],
};

export function assertSeat(seat: number, playerCount: number): void {
  if (!Number.isInteger(seat) || seat < 0 || seat >= playerCount) {
    throw new ConfigurationError('INVALID_SEAT', `Seat ${seat} is not in 0..${playerCount - 1}`);
  }
}

/**
 * Maps every player to their position label. The seat `i` places clockwise
 * of the button gets `labels[i]`.
 */
export function positions(
  players: readonly string[],
  buttonIndex: number,
): Record<string, PositionLabel> {
  const n = players.length;
  const labels = POSITION_LABELS[n];
  if (!labels) {
    throw new ConfigurationError(
      'UNSUPPORTED_TABLE_SIZE',
      `Position labels exist for ${MIN_PLAYERS}–${MAX_PLAYERS} players, got ${n}`,
    );
  }
  assertSeat(buttonIndex, n);

  const result: Record<string, PositionLabel> = {};
  labels.forEach((label, i) => {
    result[players[(buttonIndex + i) % n]] = label;
  });
  return result;
}
