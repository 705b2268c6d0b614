/**
 * TableManager – registry of all live tables, keyed by table id.
 *
 * A table's Session is always reached through here; nothing holds a
 * "current table" on the side.
 */

import { v4 as uuid } from 'uuid';
import type { Server } from 'socket.io';
import type {
  ClientToServerEvents,
  DealerKind,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
  TableInfo,
} from '@feltcast/shared';
import { generateHostCode } from '../auth/hostCode';
import type { SessionConfig } from '../engine/types';
import { TableSession } from './TableSession';

type IO = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

export interface CreateTableOptions {
  dealer?: DealerKind;
  seed?: string;
}

export class TableManager {
  private tables = new Map<string, TableSession>();
  private io: IO;

  constructor(io: IO) {
    this.io = io;
  }

  // ─── CRUD ─────────────────────────────────────────────────────────────────

  /** Throws ConfigurationError before anything is registered. */
  createTable(config: SessionConfig, options: CreateTableOptions = {}): TableSession {
    const id = uuid();
    const table = new TableSession(this.io, id, generateHostCode(), config, options);
    this.tables.set(id, table);
    console.log(`[table] created ${id} (${config.players.length} players, ${config.infoMode}, ${table.dealer})`);
    return table;
  }

  getTable(id: string): TableSession | undefined {
    return this.tables.get(id);
  }

  deleteTable(id: string): boolean {
    return this.tables.delete(id);
  }

  listTables(): TableInfo[] {
    return [...this.tables.values()].map(t => t.toTableInfo());
  }

  get size(): number {
    return this.tables.size;
  }
}
