import type { Card } from '@feltcast/shared';
import { ScannedCardSource } from '../../src/dealer/ScannedCardSource';

/** A source that deals exactly `cards`, in order, for the next hand. */
export function stackedSource(cards: Card[]): ScannedCardSource {
  const source = new ScannedCardSource();
  for (const card of cards) source.stage(card);
  return source;
}
