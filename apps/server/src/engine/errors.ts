// ─────────────────────────────────────────────────────────────────────────────
// Engine error taxonomy. Every error carries a stable code that the HTTP and
// socket layers forward as an ErrorPayload.
// ─────────────────────────────────────────────────────────────────────────────

export type GameErrorCode =
  | 'INVALID_CONFIG'
  | 'UNSUPPORTED_TABLE_SIZE'
  | 'INVALID_SEAT'
  | 'INVALID_CARD'
  | 'INVALID_PHASE'
  | 'DECK_EXHAUSTED'
  | 'DUPLICATE_CARD';

export class GameError extends Error {
  constructor(
    readonly code: GameErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad table setup. Raised before anything is mutated. */
export class ConfigurationError extends GameError {}

/** A street deal requested from a phase that does not allow it. */
export class SequencingError extends GameError {
  constructor(message: string) {
    super('INVALID_PHASE', message);
  }
}

export class ExhaustionError extends GameError {
  constructor(message = 'Card source is exhausted') {
    super('DECK_EXHAUSTED', message);
  }
}

/** The same card turned up twice in one deck. */
export class CardIntegrityError extends GameError {
  constructor(message: string) {
    super('DUPLICATE_CARD', message);
  }
}
