import type { Card, EquitySnapshotView, SnapshotKey, TableView } from '@feltcast/shared';
import { positions } from './positions';
import type { EquitySnapshot, HoleCards, Session } from './types';

/** Street → the street before it. Shared with the phase machine. */
export const PREVIOUS_STREET: Readonly<Record<SnapshotKey, SnapshotKey | null>> = {
  PREFLOP: null,
  FLOP: 'PREFLOP',
  TURN: 'FLOP',
  RIVER: 'TURN',
  SHOWDOWN: 'RIVER',
};

/** The snapshot for the current phase, whatever the disclosure mode. */
export function liveSnapshot(session: Session): EquitySnapshot | null {
  const { phase } = session.stage;
  if (phase === 'WAITING') return null;
  return session.equityByStreet[phase] ?? null;
}

/**
 * The snapshot an outside observer may see.
 *
 * FULL shows the live street, and the exact split once at SHOWDOWN.
 * DELAYED lags one street: nothing at PREFLOP, the RIVER estimate at
 * SHOWDOWN, and never any hand descriptors.
 */
export function resolveVisibleSnapshot(session: Session): EquitySnapshot | null {
  if (session.infoMode === 'FULL') return liveSnapshot(session);

  const { phase } = session.stage;
  if (phase === 'WAITING') return null;
  const previous = PREVIOUS_STREET[phase];
  if (!previous) return null;
  const snapshot = session.equityByStreet[previous];
  return snapshot ? { ...snapshot, handDescriptors: {} } : null;
}

export function toSnapshotView(snapshot: EquitySnapshot | null): EquitySnapshotView | null {
  if (!snapshot) return null;
  return {
    street: snapshot.street,
    winPercent: { ...snapshot.winPercent },
    tiePercent: snapshot.tiePercent,
    handDescriptors: { ...snapshot.handDescriptors },
    iterations: snapshot.iterations,
    exact: snapshot.exact,
  };
}

export function copyHoleCards(
  holeCards: Readonly<Record<string, HoleCards>>,
): Record<string, [Card, Card]> {
  const result: Record<string, [Card, Card]> = {};
  for (const [player, [first, second]] of Object.entries(holeCards)) {
    result[player] = [first, second];
  }
  return result;
}

/** Read-only projection served to every observer. */
export function currentView(session: Session, tableId: string): TableView {
  const dealt = Object.keys(session.holeCards).length > 0;
  return {
    tableId,
    handId: session.handId,
    handNumber: session.handNumber,
    phase: session.stage.phase,
    board: [...session.stage.board],
    players: [...session.players],
    buttonIndex: session.buttonIndex,
    positions: positions(session.players, session.buttonIndex),
    infoMode: session.infoMode,
    equity: toSnapshotView(resolveVisibleSnapshot(session)),
    holeCards: session.infoMode === 'FULL' && dealt ? copyHoleCards(session.holeCards) : null,
    version: session.version,
  };
}

/** Everything the public view shows, minus the version itself. */
export function publicFingerprint(session: Session): string {
  const { version: _version, ...observable } = currentView(session, '');
  return JSON.stringify(observable);
}
