import type { Card } from '@feltcast/shared';
import { resolveShowdown } from '../../src/engine/Showdown';
import { advance, createSession, toShowdown } from '../../src/engine/GameEngine';
import type { RiverBoard } from '../../src/engine/types';
import { stackedSource } from '../helpers/cards';

const PAIRED_BOARD: RiverBoard = ['Ks', 'Kd', '8c', '8h', 'As'];

describe('resolveShowdown', () => {
  it('splits evenly when both players play the board', () => {
    const result = resolveShowdown({ a: ['2c', '3d'], b: ['2h', '3s'] }, PAIRED_BOARD);

    expect(result.sharePercent).toEqual({ a: 50, b: 50 });
    expect(result.tiePercent).toBe(100);
    expect(result.winners).toEqual(['a', 'b']);
    expect(result.handDescriptors).toEqual({
      a: 'Two Pair, Ks over 8s',
      b: 'Two Pair, Ks over 8s',
    });
  });

  it('gives the whole pot to a single best hand', () => {
    const result = resolveShowdown(
      { a: ['2c', '3d'], b: ['Kh', '4s'], c: ['8d', '5c'] },
      PAIRED_BOARD,
    );

    expect(result.winners).toEqual(['b']);
    expect(result.sharePercent).toEqual({ a: 0, b: 100, c: 0 });
    expect(result.tiePercent).toBe(0);
    expect(result.handDescriptors.b).toBe('Full House, Ks full of 8s');
  });

  it('splits three ways when the board is the best hand for everyone', () => {
    const result = resolveShowdown(
      { a: ['2c', '3d'], b: ['2h', '3s'], c: ['4d', '5c'] },
      ['Ts', 'Js', 'Qs', 'Ks', 'As'],
    );

    expect(result.winners).toEqual(['a', 'b', 'c']);
    expect(result.sharePercent.a).toBeCloseTo(100 / 3, 9);
    expect(result.tiePercent).toBe(100);
  });
});

describe('toShowdown', () => {
  it('caches an exact tied split as the SHOWDOWN snapshot', () => {
    const deal: Card[] = [
      // b, a, b, a
      '2h', '2c', '3s', '3d',
      '4c', 'Ks', 'Kd', '8c',
      '4d', '8h',
      '4h', 'As',
    ];
    const source = stackedSource(deal);
    let session = createSession({ players: ['a', 'b'], buttonIndex: 0, infoMode: 'FULL' });
    for (let i = 0; i < 4; i++) session = advance(session, source);
    expect(session.stage.board).toEqual(PAIRED_BOARD);

    const showdown = toShowdown(session);

    expect(showdown.equityByStreet.SHOWDOWN).toEqual({
      street: 'SHOWDOWN',
      winPercent: { a: 50, b: 50 },
      tiePercent: 100,
      handDescriptors: { a: 'Two Pair, Ks over 8s', b: 'Two Pair, Ks over 8s' },
      iterations: 0,
      exact: true,
    });
    expect(showdown.lastCompletedStreet).toBe('SHOWDOWN');
    expect(showdown.stage.phase).toBe('SHOWDOWN');
    if (showdown.stage.phase === 'SHOWDOWN') {
      expect(showdown.stage.result.winners).toEqual(['a', 'b']);
    }
  });
});
