import { v4 as uuid } from 'uuid';
import type { Card, InfoMode } from '@feltcast/shared';
import type { Rng } from './Deck';
import { estimateEquity, isStreet, iterationsFor } from './EquityEngine';
import { CardIntegrityError, ConfigurationError, ExhaustionError, SequencingError } from './errors';
import { MAX_PLAYERS, MIN_PLAYERS, assertSeat, positions } from './positions';
import { resolveShowdown } from './Showdown';
import type {
  CardSource,
  EquitySnapshot,
  FlopBoard,
  HoleCards,
  RiverBoard,
  Session,
  SessionConfig,
  TurnBoard,
} from './types';
import { publicFingerprint } from './visibility';

// ─────────────────────────────────────────────────────────────────────────────
// GameEngine – the hand's phase machine.
//
// WAITING → PREFLOP → FLOP → TURN → RIVER → SHOWDOWN → (next hand)
//
// STATELESS: every function takes a Session and returns a new one. Nothing is
// edited in place, so a failed transition leaves the caller's Session intact.
// The TableSession layer owns the live value and swaps it in one step.
// ─────────────────────────────────────────────────────────────────────────────

const INFO_MODES: readonly InfoMode[] = ['FULL', 'DELAYED'];

/** Hole cards, the five board cards and a burn before each street. */
export function cardsPerHand(playerCount: number): number {
  return 2 * playerCount + 5 + 3;
}

/** Validates a table setup and returns a Session waiting for its first hand. */
export function createSession(config: SessionConfig, prior?: Session | null): Session {
  const players = config.players.map(p => p.trim());

  if (players.length < MIN_PLAYERS || players.length > MAX_PLAYERS) {
    throw new ConfigurationError(
      'UNSUPPORTED_TABLE_SIZE',
      `A table seats ${MIN_PLAYERS}–${MAX_PLAYERS} players, got ${players.length}`,
    );
  }
  if (players.some(p => p.length === 0)) {
    throw new ConfigurationError('INVALID_CONFIG', 'Player names must not be blank');
  }
  if (new Set(players).size !== players.length) {
    throw new ConfigurationError('INVALID_CONFIG', 'Player names must be unique');
  }
  if (!INFO_MODES.includes(config.infoMode)) {
    throw new ConfigurationError('INVALID_CONFIG', `Unknown info mode "${config.infoMode}"`);
  }
  assertSeat(config.buttonIndex, players.length);
  // Fails fast if the size has no label table
  positions(players, config.buttonIndex);

  return {
    handId: uuid(),
    handNumber: 0,
    players,
    buttonIndex: config.buttonIndex,
    manualButton: false,
    infoMode: config.infoMode,
    stage: { phase: 'WAITING', board: [] },
    holeCards: {},
    burned: [],
    equityByStreet: {},
    lastCompletedStreet: null,
    version: prior?.version ?? 0,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Transitions
// ─────────────────────────────────────────────────────────────────────────────

/** One step along the phase cycle, picking the right deal for the phase. */
export function advance(session: Session, source: CardSource): Session {
  switch (session.stage.phase) {
    case 'WAITING':
    case 'SHOWDOWN':
      return startNextHand(session, source);
    case 'PREFLOP':
      return dealFlop(session, source);
    case 'FLOP':
      return dealTurn(session, source);
    case 'TURN':
      return dealRiver(session, source);
    case 'RIVER':
      return toShowdown(session);
  }
}

/**
 * Misdeal correction. Throws the current hand away and deals a new one with
 * the button on `seat`. The following natural new hand keeps that button.
 */
export function forceButton(session: Session, seat: number, source: CardSource): Session {
  assertSeat(seat, session.players.length);
  return dealNewHand(session, source, seat, true);
}

export function startNextHand(session: Session, source: CardSource): Session {
  const { phase } = session.stage;
  if (phase !== 'WAITING' && phase !== 'SHOWDOWN') {
    throw new SequencingError(`Cannot start a hand during ${phase}`);
  }
  const n = session.players.length;
  // The first hand uses the configured button; later ones move it one seat back
  const rotate = session.handNumber > 0 && !session.manualButton;
  const buttonIndex = rotate ? (session.buttonIndex - 1 + n) % n : session.buttonIndex;
  return dealNewHand(session, source, buttonIndex, false);
}

export function dealFlop(session: Session, source: CardSource): Session {
  const { stage } = session;
  if (stage.phase !== 'PREFLOP') {
    throw new SequencingError(`Cannot deal the flop during ${stage.phase}`);
  }
  const burn = source.nextCard();
  const board: FlopBoard = [source.nextCard(), source.nextCard(), source.nextCard()];
  return checked({
    ...session,
    stage: { phase: 'FLOP', board },
    burned: [...session.burned, burn],
  });
}

export function dealTurn(session: Session, source: CardSource): Session {
  const { stage } = session;
  if (stage.phase !== 'FLOP') {
    throw new SequencingError(`Cannot deal the turn during ${stage.phase}`);
  }
  const burn = source.nextCard();
  const board: TurnBoard = [...stage.board, source.nextCard()];
  return checked({
    ...session,
    stage: { phase: 'TURN', board },
    burned: [...session.burned, burn],
  });
}

export function dealRiver(session: Session, source: CardSource): Session {
  const { stage } = session;
  if (stage.phase !== 'TURN') {
    throw new SequencingError(`Cannot deal the river during ${stage.phase}`);
  }
  const burn = source.nextCard();
  const board: RiverBoard = [...stage.board, source.nextCard()];
  return checked({
    ...session,
    stage: { phase: 'RIVER', board },
    burned: [...session.burned, burn],
  });
}

/** No cards are drawn; the exact split is cached as the SHOWDOWN snapshot. */
export function toShowdown(session: Session): Session {
  const { stage } = session;
  if (stage.phase !== 'RIVER') {
    throw new SequencingError(`Cannot go to showdown during ${stage.phase}`);
  }
  const result = resolveShowdown(session.holeCards, stage.board);
  const snapshot: EquitySnapshot = {
    street: 'SHOWDOWN',
    winPercent: result.sharePercent,
    tiePercent: result.tiePercent,
    handDescriptors: result.handDescriptors,
    iterations: 0,
    exact: true,
  };
  return {
    ...session,
    stage: { phase: 'SHOWDOWN', board: stage.board, result },
    equityByStreet: { ...session.equityByStreet, SHOWDOWN: snapshot },
    lastCompletedStreet: 'SHOWDOWN',
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Equity cache
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Makes sure the current street has its snapshot. Runs the simulation at most
 * once per street per hand; returns the same Session when nothing is missing.
 */
export function withEquity(session: Session, rng: Rng): Session {
  const { phase, board } = session.stage;
  if (!isStreet(phase) || session.equityByStreet[phase]) return session;

  const iterations = iterationsFor(session.players.length, phase);
  const estimate = estimateEquity(session.holeCards, board, iterations, rng);
  const snapshot: EquitySnapshot = { street: phase, ...estimate, exact: false };

  return {
    ...session,
    equityByStreet: { ...session.equityByStreet, [phase]: snapshot },
    lastCompletedStreet: phase,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Version counter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Stamps `next` with a version: one more than `prev` when the public view
 * differs, the same otherwise.
 */
export function commitVersion(prev: Session, next: Session): Session {
  const changed = publicFingerprint(prev) !== publicFingerprint({ ...next, version: prev.version });
  const version = changed ? prev.version + 1 : prev.version;
  return next.version === version ? next : { ...next, version };
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function dealNewHand(
  session: Session,
  source: CardSource,
  buttonIndex: number,
  manualButton: boolean,
): Session {
  const n = session.players.length;
  const needed = cardsPerHand(n);
  // Checked before loading so a short scanned deck stays staged
  if (source.available < needed) {
    throw new ExhaustionError(
      `A ${n}-handed deal needs ${needed} cards, the source has ${source.available}`,
    );
  }
  source.shuffleAndLoad();

  const dealt: Card[][] = session.players.map(() => []);
  // Two rounds, one card at a time, starting left of the button
  for (let round = 0; round < 2; round++) {
    for (let offset = 1; offset <= n; offset++) {
      dealt[(buttonIndex + offset) % n].push(source.nextCard());
    }
  }

  const holeCards: Record<string, HoleCards> = {};
  session.players.forEach((player, seat) => {
    const [first, second] = dealt[seat];
    holeCards[player] = [first, second];
  });

  return checked({
    ...session,
    handId: uuid(),
    handNumber: session.handNumber + 1,
    buttonIndex,
    manualButton,
    stage: { phase: 'PREFLOP', board: [] },
    holeCards,
    burned: [],
    equityByStreet: {},
    lastCompletedStreet: null,
  });
}

/** Every dealt card must be distinct. */
function checked(session: Session): Session {
  const cards = [
    ...Object.values(session.holeCards).flat(),
    ...session.stage.board,
    ...session.burned,
  ];
  if (new Set(cards).size !== cards.length) {
    throw new CardIntegrityError(`Hand ${session.handId} was dealt the same card twice`);
  }
  return session;
}
