import request from 'supertest';
import { TestServer, createTestServer } from '../helpers/server';
import {
  connectSocket,
  createSocketClient,
  disconnectSocket,
  TestSocket,
  waitForError,
  waitForState,
} from '../helpers/socket';
import { createHostedTable } from '../helpers/tables';

describe('watch_table', () => {
  let server: TestServer;
  let sock: TestSocket;

  beforeAll(async () => {
    server = await createTestServer();
  });

  afterAll(async () => {
    await server.close();
  });

  async function watchedBy(socketId: string | undefined): Promise<string[] | undefined> {
    const sockets = await server.io.fetchSockets();
    return sockets.find(s => s.id === socketId)?.data.watching;
  }

  beforeEach(async () => {
    sock = createSocketClient(server.url);
    await connectSocket(sock);
  });

  afterEach(async () => {
    await disconnectSocket(sock);
  });

  it('sends the current view on watch', async () => {
    const table = await createHostedTable(server.app, { players: ['Ann', 'Ben'], buttonSeat: 0 });

    const first = waitForState(sock);
    sock.emit('watch_table', { tableId: table.tableId });
    const view = await first;

    expect(view.tableId).toBe(table.tableId);
    expect(view.phase).toBe('WAITING');
    expect(view.version).toBe(0);
  });

  it('pushes each version bump to watchers', async () => {
    const table = await createHostedTable(server.app, { players: ['Ann', 'Ben'], buttonSeat: 0, infoMode: 'DELAYED' });

    const watching = waitForState(sock);
    sock.emit('watch_table', { tableId: table.tableId });
    await watching;

    const pushed = waitForState(sock, v => v.phase === 'PREFLOP');
    await request(server.app).post(`/api/tables/${table.tableId}/advance`).set(table.auth);
    const view = await pushed;

    expect(view.version).toBe(1);
    expect(view.equity).toBeNull();
    expect(view.holeCards).toBeNull();
  });

  it('tracks the tables each socket watches', async () => {
    const table = await createHostedTable(server.app, { players: ['Ann', 'Ben'], buttonSeat: 0 });

    const watching = waitForState(sock);
    sock.emit('watch_table', { tableId: table.tableId });
    await watching;
    expect(await watchedBy(sock.id)).toEqual([table.tableId]);

    sock.emit('unwatch_table', { tableId: table.tableId });
    // Events are handled in order, so the error arrives after the unwatch
    const error = waitForError(sock);
    sock.emit('watch_table', { tableId: 'missing' });
    await error;
    expect(await watchedBy(sock.id)).toEqual([]);
  });

  it('reports unknown tables', async () => {
    const error = waitForError(sock);
    sock.emit('watch_table', { tableId: 'missing' });
    await expect(error).resolves.toEqual({ code: 'TABLE_NOT_FOUND', message: 'No table missing' });
  });
});
