import { v4 as uuid } from 'uuid';
import type { Card } from '@feltcast/shared';
import { buildDeck, createRng, fisherYates, type Rng } from '../engine/Deck';
import { ExhaustionError } from '../engine/errors';
import type { CardSource } from '../engine/types';

const DECK_SIZE = 52;

/** A software dealer: a fresh seeded shuffle on every load. */
export class SimulatedCardSource implements CardSource {
  readonly seed: string;
  private readonly rng: Rng;
  private deck: Card[] = [];

  constructor(seed: string = uuid()) {
    this.seed = seed;
    this.rng = createRng(seed);
  }

  get available(): number {
    return DECK_SIZE;
  }

  shuffleAndLoad(): void {
    this.deck = fisherYates(buildDeck(), this.rng);
  }

  nextCard(): Card {
    const card = this.deck.pop();
    if (!card) throw new ExhaustionError('Simulated deck is empty');
    return card;
  }

  get remaining(): number {
    return this.deck.length;
  }
}
