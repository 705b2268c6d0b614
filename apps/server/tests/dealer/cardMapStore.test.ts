import { CardMapError, CardMapStore, normalizeUid } from '../../src/redis/CardMapStore';

describe('CardMapStore (memory)', () => {
  let store: CardMapStore;

  beforeEach(() => {
    store = new CardMapStore(null);
  });

  it('looks up a trained UID however the scanner formats it', async () => {
    await store.train('04:a1:b2:c3', 'As');
    await expect(store.lookup('04A1B2C3')).resolves.toBe('As');
    await expect(store.lookup('04-a1-b2-c3')).resolves.toBe('As');
    await expect(store.count()).resolves.toBe(1);
    expect(store.backend).toBe('memory');
  });

  it('refuses to retrain a UID', async () => {
    await store.train('04A1B2C3', 'As');
    await expect(store.train('04a1b2c3', 'Kd')).rejects.toMatchObject({
      code: 'UID_ALREADY_MAPPED',
      message: 'UID 04A1B2C3 is already mapped to As',
    });
    await expect(store.lookup('04A1B2C3')).resolves.toBe('As');
  });

  it('reports unknown UIDs', async () => {
    await expect(store.lookup('DEADBEEF')).rejects.toBeInstanceOf(CardMapError);
    await expect(store.lookup('DEADBEEF')).rejects.toMatchObject({ code: 'UNKNOWN_CARD_UID' });
  });
});

describe('normalizeUid', () => {
  it('strips separators and upper-cases', () => {
    expect(normalizeUid(' 04 a1 b2 c3 ')).toBe('04A1B2C3');
  });

  it('rejects non-hex input', () => {
    expect(() => normalizeUid('not-a-uid')).toThrow(CardMapError);
  });
});
