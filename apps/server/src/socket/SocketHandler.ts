/**
 * SocketHandler – pure transport layer.
 *
 * Rules:
 *  - No game logic here. Validate input shape, then delegate to TableManager.
 *  - Sockets only watch. Every mutation goes through the host HTTP routes,
 *    and TableSession pushes table_state to the room on each version bump.
 */

import type { Server, Socket } from 'socket.io';
import type {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData,
  WatchTablePayload,
} from '@feltcast/shared';
import type { TableManager } from '../table/TableManager';
import { roomName } from '../table/TableSession';

type IO = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
type Sock = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

function tableIdOf(payload: WatchTablePayload | undefined): string | null {
  const tableId = payload?.tableId;
  return typeof tableId === 'string' && tableId.length > 0 ? tableId : null;
}

export function registerSocketHandlers(io: IO, tables: TableManager): void {
  io.on('connection', (socket: Sock) => {
    console.log(`[socket] connected: ${socket.id}`);
    socket.data.watching = [];

    // ── Spectate ──────────────────────────────────────────────────────────
    socket.on('watch_table', payload => {
      const tableId = tableIdOf(payload);
      const table = tableId ? tables.getTable(tableId) : undefined;
      if (!tableId || !table) {
        socket.emit('error', { code: 'TABLE_NOT_FOUND', message: `No table ${tableId ?? '(missing id)'}` });
        return;
      }

      void socket.join(roomName(tableId));
      const watching = socket.data.watching ?? [];
      if (!watching.includes(tableId)) socket.data.watching = [...watching, tableId];
      socket.emit('table_state', table.view());
    });

    socket.on('unwatch_table', payload => {
      const tableId = tableIdOf(payload);
      if (!tableId) return;
      void socket.leave(roomName(tableId));
      socket.data.watching = (socket.data.watching ?? []).filter(id => id !== tableId);
    });

    socket.on('disconnect', reason => {
      console.log(`[socket] disconnected: ${socket.id} (${reason}, watched ${socket.data.watching?.length ?? 0})`);
    });
  });
}
