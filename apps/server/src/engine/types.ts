import type { Card, InfoMode, SnapshotKey } from '@feltcast/shared';

// ─────────────────────────────────────────────────────────────────────────────
// Internal engine types – never leave the server boundary as-is
// ─────────────────────────────────────────────────────────────────────────────

export type HoleCards = readonly [Card, Card];
export type FlopBoard = readonly [Card, Card, Card];
export type TurnBoard = readonly [Card, Card, Card, Card];
export type RiverBoard = readonly [Card, Card, Card, Card, Card];

export interface ShowdownResult {
  sharePercent: Record<string, number>;
  tiePercent: number;
  winners: string[];
  handDescriptors: Record<string, string>;
}

/** Phase and board travel together so the board length always matches. */
export type HandStage =
  | { phase: 'WAITING'; board: readonly [] }
  | { phase: 'PREFLOP'; board: readonly [] }
  | { phase: 'FLOP'; board: FlopBoard }
  | { phase: 'TURN'; board: TurnBoard }
  | { phase: 'RIVER'; board: RiverBoard }
  | { phase: 'SHOWDOWN'; board: RiverBoard; result: ShowdownResult };

export interface EquitySnapshot {
  street: SnapshotKey;
  winPercent: Readonly<Record<string, number>>;
  tiePercent: number;
  handDescriptors: Readonly<Record<string, string>>;
  /** 0 for the exact showdown split */
  iterations: number;
  exact: boolean;
}

export interface SessionConfig {
  players: readonly string[];
  buttonIndex: number;
  infoMode: InfoMode;
}

/**
 * One table's live game. Values are never edited in place: every transition
 * in GameEngine returns a fresh Session.
 */
export interface Session {
  readonly handId: string;
  /** 0 until the first hand is dealt */
  readonly handNumber: number;
  readonly players: readonly string[];
  readonly buttonIndex: number;
  /** Set by forceButton; the next new hand keeps the button where it is */
  readonly manualButton: boolean;
  readonly infoMode: InfoMode;
  readonly stage: HandStage;
  readonly holeCards: Readonly<Record<string, HoleCards>>;
  readonly burned: readonly Card[];
  readonly equityByStreet: Readonly<Partial<Record<SnapshotKey, EquitySnapshot>>>;
  readonly lastCompletedStreet: SnapshotKey | null;
  readonly version: number;
}

/** Ordered card supply for one deck at a time. */
export interface CardSource {
  /** Cards the next load would hold. */
  readonly available: number;
  /** Start a fresh deck. */
  shuffleAndLoad(): void;
  /** Throws ExhaustionError once the deck is spent. */
  nextCard(): Card;
}
