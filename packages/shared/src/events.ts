import type { ErrorPayload, TableView } from './types';

// ─────────────────────────────────────────────────────────────────────────────
// Client → Server
// ─────────────────────────────────────────────────────────────────────────────

export interface WatchTablePayload {
  tableId: string;
}

export interface ClientToServerEvents {
  /** Join a table's room. Server answers with table_state right away. */
  watch_table: (payload: WatchTablePayload) => void;
  unwatch_table: (payload: WatchTablePayload) => void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Server → Client
// ─────────────────────────────────────────────────────────────────────────────

export interface ServerToClientEvents {
  /** Public projection, pushed to the room after every version bump */
  table_state: (payload: TableView) => void;
  /** Error back to the requesting socket */
  error: (payload: ErrorPayload) => void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Inter-server room events (if you later add clustering)
// ─────────────────────────────────────────────────────────────────────────────

export interface InterServerEvents {
  ping: () => void;
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-socket data
// ─────────────────────────────────────────────────────────────────────────────

export interface SocketData {
  watching: string[];
}
