/**
 * TableSession – owns one table's live Session.
 *
 * Responsibilities:
 *  - Apply GameEngine transitions and swap the result in as one step
 *  - Fill the equity cache for the street being shown
 *  - Bump the version only when the public view changed
 *  - Push the public view to everyone watching the table
 */

import { v4 as uuid } from 'uuid';
import type { Server } from 'socket.io';
import type {
  Card,
  ClientToServerEvents,
  DealerKind,
  HostTableView,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
  TableInfo,
  TableView,
} from '@feltcast/shared';
import { createRng, type Rng } from '../engine/Deck';
import { ConfigurationError } from '../engine/errors';
import {
  advance,
  commitVersion,
  createSession,
  forceButton,
  withEquity,
} from '../engine/GameEngine';
import type { CardSource, Session, SessionConfig } from '../engine/types';
import {
  copyHoleCards,
  currentView,
  liveSnapshot,
  toSnapshotView,
} from '../engine/visibility';
import { SimulatedCardSource } from '../dealer/SimulatedCardSource';
import { ScannedCardSource } from '../dealer/ScannedCardSource';

type IO = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

export interface TableSessionOptions {
  dealer?: DealerKind;
  /** Fixes both the shuffle and the equity trials */
  seed?: string;
}

export const roomName = (tableId: string) => `table:${tableId}`;

export class TableSession {
  readonly id: string;
  readonly hostCode: string;
  readonly dealer: DealerKind;

  private session: Session;
  private readonly source: CardSource;
  private readonly scanner: ScannedCardSource | null;
  private readonly rng: Rng;
  private io: IO;

  constructor(
    io: IO,
    id: string,
    hostCode: string,
    config: SessionConfig,
    options: TableSessionOptions = {},
  ) {
    this.io = io;
    this.id = id;
    this.hostCode = hostCode;
    this.dealer = options.dealer ?? 'SIMULATED';

    const seed = options.seed ?? uuid();
    this.rng = createRng(`${seed}:equity`);
    if (this.dealer === 'SCANNED') {
      this.scanner = new ScannedCardSource();
      this.source = this.scanner;
    } else {
      this.scanner = null;
      this.source = new SimulatedCardSource(`${seed}:deck`);
    }

    this.session = createSession(config);
  }

  // ─── Reads ────────────────────────────────────────────────────────────────

  get version(): number {
    return this.session.version;
  }

  get phase(): Session['stage']['phase'] {
    return this.session.stage.phase;
  }

  /** Public projection. Fills the equity cache first if the street lacks one. */
  view(): TableView {
    this.apply(this.session);
    return currentView(this.session, this.id);
  }

  hostView(): HostTableView {
    const base = this.view();
    const { session } = this;
    return {
      ...base,
      hostCode: this.hostCode,
      dealer: this.dealer,
      liveEquity: toSnapshotView(liveSnapshot(session)),
      allHoleCards: copyHoleCards(session.holeCards),
      burned: [...session.burned],
      lastCompletedStreet: session.lastCompletedStreet,
      manualButton: session.manualButton,
      stagedCards: this.scanner?.stagedCount ?? 0,
      winners: session.stage.phase === 'SHOWDOWN' ? [...session.stage.result.winners] : null,
    };
  }

  toTableInfo(): TableInfo {
    return {
      id: this.id,
      phase: this.phase,
      playerCount: this.session.players.length,
      infoMode: this.session.infoMode,
      dealer: this.dealer,
      version: this.version,
    };
  }

  // ─── Mutations ────────────────────────────────────────────────────────────

  advance(): HostTableView {
    const from = this.phase;
    this.apply(advance(this.session, this.source));
    console.log(`[table] ${this.id} ${from} → ${this.phase} (hand ${this.session.handNumber}, v${this.version})`);
    return this.hostView();
  }

  forceButton(seat: number): HostTableView {
    this.apply(forceButton(this.session, seat, this.source));
    console.log(`[table] ${this.id} misdeal – button forced to seat ${seat}, hand ${this.session.handNumber}`);
    return this.hostView();
  }

  /** Replaces the whole Session with a new setup. The version carries on. */
  reconfigure(config: SessionConfig): HostTableView {
    this.apply(createSession(config, this.session));
    console.log(`[table] ${this.id} reconfigured for ${config.players.length} players`);
    return this.hostView();
  }

  /** Adds one scanned card to the next deck. Only for SCANNED tables. */
  stageCard(card: Card): number {
    if (!this.scanner) {
      throw new ConfigurationError('INVALID_CONFIG', `Table ${this.id} deals simulated cards`);
    }
    return this.scanner.stage(card);
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  /**
   * The only place `session` is assigned. Equity and version are settled on
   * the candidate first, so readers see either the old value or the finished
   * new one.
   */
  private apply(candidate: Session): void {
    const next = commitVersion(this.session, withEquity(candidate, this.rng));
    const bumped = next.version !== this.session.version;
    this.session = next;
    if (bumped) this.broadcastState();
  }

  broadcastState(): void {
    this.io.to(roomName(this.id)).emit('table_state', currentView(this.session, this.id));
  }
}
