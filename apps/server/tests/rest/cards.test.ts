import request from 'supertest';
import { TestServer, createTestServer } from '../helpers/server';
import { createHostedTable, HostedTable } from '../helpers/tables';

describe('card UID training', () => {
  let server: TestServer;
  let table: HostedTable;

  beforeAll(async () => {
    server = await createTestServer();
    table = await createHostedTable(server.app, { players: ['Ann', 'Ben'], buttonSeat: 0, dealer: 'SCANNED' });
  });

  afterAll(async () => {
    await server.close();
  });

  it('needs a host token', async () => {
    const res = await request(server.app).get('/api/cards/mappings');
    expect(res.status).toBe(401);
  });

  it('trains each UID once', async () => {
    const first = await request(server.app)
      .post('/api/cards/mappings')
      .set(table.auth)
      .send({ uid: '04:aa:00:01', card: 'as' });
    expect(first.status).toBe(201);
    expect(first.body).toEqual({ uid: '04AA0001', card: 'As', count: 1 });

    const again = await request(server.app)
      .post('/api/cards/mappings')
      .set(table.auth)
      .send({ uid: '04AA0001', card: 'Kd' });
    expect(again.status).toBe(409);
    expect(again.body.error).toBe('UID_ALREADY_MAPPED');

    const summary = await request(server.app).get('/api/cards/mappings').set(table.auth);
    expect(summary.body).toEqual({ count: 1, complete: false, backend: 'memory' });
  });

  it('rejects a label that is not a card', async () => {
    const res = await request(server.app)
      .post('/api/cards/mappings')
      .set(table.auth)
      .send({ uid: '04AA0002', card: 'Zz' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('INVALID_CARD');
  });
});

describe('dealing from scanned cards', () => {
  let server: TestServer;

  beforeAll(async () => {
    server = await createTestServer();
  });

  afterAll(async () => {
    await server.close();
  });

  async function scan(table: HostedTable, body: { uid: string } | { card: string }) {
    return request(server.app).post(`/api/tables/${table.tableId}/scans`).set(table.auth).send(body);
  }

  it('deals the scanned order, by UID or by label', async () => {
    const table = await createHostedTable(server.app, { players: ['Ann', 'Ben'], buttonSeat: 0, dealer: 'SCANNED', infoMode: 'FULL' });
    await request(server.app)
      .post('/api/cards/mappings')
      .set(table.auth)
      .send({ uid: '04BB0001', card: 'Kc' });

    const byUid = await scan(table, { uid: '04bb0001' });
    expect(byUid.status).toBe(200);
    expect(byUid.body).toEqual({ card: 'Kc', staged: 1 });

    // Ben (left of the button) is dealt first
    for (const card of ['As', 'Kd', 'Ad', '3h', '2c', '7h', '9s', '4h', 'Jd', '5h', '3c']) {
      const res = await scan(table, { card });
      expect(res.status).toBe(200);
    }
    const staged = await request(server.app).get(`/api/tables/${table.tableId}/host-state`).set(table.auth);
    expect(staged.body.stagedCards).toBe(12);

    const preflop = await request(server.app).post(`/api/tables/${table.tableId}/advance`).set(table.auth);
    expect(preflop.body.allHoleCards).toEqual({ Ann: ['As', 'Ad'], Ben: ['Kc', 'Kd'] });
    expect(preflop.body.stagedCards).toBe(0);
    expect(preflop.body.winners).toBeNull();

    let last = preflop;
    for (let i = 0; i < 4; i++) {
      last = await request(server.app).post(`/api/tables/${table.tableId}/advance`).set(table.auth);
    }
    expect(last.body.phase).toBe('SHOWDOWN');
    expect(last.body.board).toEqual(['2c', '7h', '9s', 'Jd', '3c']);
    expect(last.body.burned).toEqual(['3h', '4h', '5h']);
    expect(last.body.winners).toEqual(['Ann']);
    expect(last.body.equity).toMatchObject({
      street: 'SHOWDOWN',
      winPercent: { Ann: 100, Ben: 0 },
      tiePercent: 0,
      exact: true,
    });
  });

  it('refuses to start a hand with too few scanned cards', async () => {
    const table = await createHostedTable(server.app, { players: ['Ann', 'Ben'], buttonSeat: 0, dealer: 'SCANNED' });
    await scan(table, { card: 'As' });
    await scan(table, { card: 'Kd' });

    const res = await request(server.app).post(`/api/tables/${table.tableId}/advance`).set(table.auth);
    expect(res.status).toBe(409);
    expect(res.body.error).toBe('DECK_EXHAUSTED');

    const state = await request(server.app).get(`/api/tables/${table.tableId}/host-state`).set(table.auth);
    expect(state.body.phase).toBe('WAITING');
    expect(state.body.version).toBe(0);
    expect(state.body.stagedCards).toBe(2);
  });

  it('rejects unknown UIDs and repeated cards', async () => {
    const table = await createHostedTable(server.app, { players: ['Ann', 'Ben'], buttonSeat: 0, dealer: 'SCANNED' });

    const unknown = await scan(table, { uid: 'FFFF0000' });
    expect(unknown.status).toBe(422);
    expect(unknown.body.error).toBe('UNKNOWN_CARD_UID');

    await scan(table, { card: 'Qs' });
    const repeat = await scan(table, { card: 'qs' });
    expect(repeat.status).toBe(409);
    expect(repeat.body.error).toBe('DUPLICATE_CARD');
  });
});
