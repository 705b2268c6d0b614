import type { Card } from '@feltcast/shared';
import { CardIntegrityError, ExhaustionError } from '../engine/errors';
import type { CardSource } from '../engine/types';

/**
 * A physically shuffled deck read through the RFID scanner.
 *
 * Scans accumulate in a staging buffer in the order the cards will be dealt.
 * `shuffleAndLoad` turns the staged cards into the deck for the next hand and
 * starts a new, empty buffer.
 */
export class ScannedCardSource implements CardSource {
  private staged: Card[] = [];
  private deck: Card[] = [];

  stage(card: Card): number {
    if (this.staged.includes(card)) {
      throw new CardIntegrityError(`${card} was already scanned for this deck`);
    }
    this.staged.push(card);
    return this.staged.length;
  }

  shuffleAndLoad(): void {
    this.deck = this.staged;
    this.staged = [];
  }

  nextCard(): Card {
    const card = this.deck.shift();
    if (!card) throw new ExhaustionError('Not enough scanned cards for this deal');
    return card;
  }

  get stagedCount(): number {
    return this.staged.length;
  }

  get available(): number {
    return this.staged.length;
  }

  get remaining(): number {
    return this.deck.length;
  }
}
