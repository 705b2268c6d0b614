// ─────────────────────────────────────────────────────────────────────────────
// Cards
// ─────────────────────────────────────────────────────────────────────────────

export const RANKS = ['2', '3', '4', '5', '6', '7', '8', '9', 'T', 'J', 'Q', 'K', 'A'] as const;
export const SUITS = ['c', 'd', 'h', 's'] as const;

export type Rank = (typeof RANKS)[number];
export type Suit = (typeof SUITS)[number];

/** Two-character card code, rank then suit: `As`, `Td`, `2c`. */
export type Card = `${Rank}${Suit}`;

// ─────────────────────────────────────────────────────────────────────────────
// Phases & disclosure
// ─────────────────────────────────────────────────────────────────────────────

export type Phase = 'WAITING' | 'PREFLOP' | 'FLOP' | 'TURN' | 'RIVER' | 'SHOWDOWN';

/** The four dealing streets, i.e. phases that carry a Monte Carlo estimate. */
export type Street = 'PREFLOP' | 'FLOP' | 'TURN' | 'RIVER';

/** Every phase that can own a cached snapshot. SHOWDOWN holds the exact split. */
export type SnapshotKey = Street | 'SHOWDOWN';

/**
 * FULL publishes the live street's equity and every hole card.
 * DELAYED publishes the previous street's equity and nothing private.
 */
export type InfoMode = 'FULL' | 'DELAYED';

export type DealerKind = 'SIMULATED' | 'SCANNED';

export type PositionLabel =
  | 'BTN'
  | 'SB'
  | 'BB'
  | 'UTG'
  | 'UTG+1'
  | 'UTG+2'
  | 'UTG+3'
  | 'UTG+4'
  | 'HJ'
  | 'CO';

// ─────────────────────────────────────────────────────────────────────────────
// Equity
// ─────────────────────────────────────────────────────────────────────────────

export interface EquitySnapshotView {
  street: SnapshotKey;
  /** Percent per player. Split pots share credit, so the values sum to 100. */
  winPercent: Record<string, number>;
  /** Percent of trials where two or more players shared the best hand */
  tiePercent: number;
  /** Empty in DELAYED mode */
  handDescriptors: Record<string, string>;
  iterations: number;
  /** True only for the showdown split */
  exact: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Views
// ─────────────────────────────────────────────────────────────────────────────

/** What any observer may see. */
export interface TableView {
  tableId: string;
  handId: string;
  handNumber: number;
  phase: Phase;
  board: Card[];
  players: string[];
  buttonIndex: number;
  positions: Record<string, PositionLabel>;
  infoMode: InfoMode;
  equity: EquitySnapshotView | null;
  /** Present only in FULL mode once cards are dealt */
  holeCards: Record<string, [Card, Card]> | null;
  version: number;
}

/** Everything, for whoever holds the host token. */
export interface HostTableView extends TableView {
  hostCode: string;
  dealer: DealerKind;
  liveEquity: EquitySnapshotView | null;
  allHoleCards: Record<string, [Card, Card]>;
  burned: Card[];
  lastCompletedStreet: SnapshotKey | null;
  manualButton: boolean;
  stagedCards: number;
  /** Players sharing the pot, once the hand reaches SHOWDOWN */
  winners: string[] | null;
}

export interface TableInfo {
  id: string;
  phase: Phase;
  playerCount: number;
  infoMode: InfoMode;
  dealer: DealerKind;
  version: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Requests
// ─────────────────────────────────────────────────────────────────────────────

export interface TableSetupPayload {
  players: string[];
  buttonSeat: number;
  infoMode?: InfoMode;
}

export interface CreateTablePayload extends TableSetupPayload {
  dealer?: DealerKind;
}

export interface CreateTableResponse {
  tableId: string;
  hostCode: string;
  state: TableView;
}

export interface ErrorPayload {
  code: string;
  message: string;
}
