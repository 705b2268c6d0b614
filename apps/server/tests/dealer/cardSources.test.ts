import { SimulatedCardSource } from '../../src/dealer/SimulatedCardSource';
import { ScannedCardSource } from '../../src/dealer/ScannedCardSource';
import { parseCard } from '../../src/engine/Deck';
import { CardIntegrityError, ConfigurationError, ExhaustionError } from '../../src/engine/errors';

function drawAll(source: SimulatedCardSource): string[] {
  const cards: string[] = [];
  while (source.remaining > 0) cards.push(source.nextCard());
  return cards;
}

describe('SimulatedCardSource', () => {
  it('deals 52 distinct cards per load, then runs dry', () => {
    const source = new SimulatedCardSource('deck');
    source.shuffleAndLoad();
    const cards = drawAll(source);
    expect(cards).toHaveLength(52);
    expect(new Set(cards).size).toBe(52);
    expect(() => source.nextCard()).toThrow(ExhaustionError);
  });

  it('replays the same order for the same seed', () => {
    const a = new SimulatedCardSource('same');
    const b = new SimulatedCardSource('same');
    a.shuffleAndLoad();
    b.shuffleAndLoad();
    expect(drawAll(a)).toEqual(drawAll(b));
  });

  it('has nothing to deal before the first load', () => {
    expect(() => new SimulatedCardSource('empty').nextCard()).toThrow(ExhaustionError);
  });
});

describe('ScannedCardSource', () => {
  it('deals staged cards in scan order after a load', () => {
    const source = new ScannedCardSource();
    expect(source.stage('As')).toBe(1);
    expect(source.stage('Kd')).toBe(2);
    source.shuffleAndLoad();

    expect(source.stagedCount).toBe(0);
    expect(source.nextCard()).toBe('As');
    expect(source.nextCard()).toBe('Kd');
    expect(() => source.nextCard()).toThrow(ExhaustionError);
  });

  it('rejects the same card twice in one deck', () => {
    const source = new ScannedCardSource();
    source.stage('7c');
    expect(() => source.stage('7c')).toThrow(CardIntegrityError);
  });

  it('accepts a card again once the previous deck is loaded', () => {
    const source = new ScannedCardSource();
    source.stage('7c');
    source.shuffleAndLoad();
    expect(source.stage('7c')).toBe(1);
  });
});

describe('parseCard', () => {
  it('normalises case and tens', () => {
    expect(parseCard('as')).toBe('As');
    expect(parseCard('10H')).toBe('Th');
    expect(parseCard(' td ')).toBe('Td');
  });

  it('rejects anything else', () => {
    expect(() => parseCard('X1')).toThrow(ConfigurationError);
    expect(() => parseCard('')).toThrow(ConfigurationError);
  });
});
