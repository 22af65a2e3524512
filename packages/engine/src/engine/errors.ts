// ─── Engine Errors ─────────────────────────────────────────────────
// Thrown only for programming-contract violations. Illegal moves and
// exhausted draws are game outcomes and surface as events instead.

/** A caller broke an operation's precondition (e.g. peeking an empty discard pile). */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}

/** A move was applied after a winner was declared. */
export class GameOverError extends Error {
  constructor(public readonly winner: string) {
    super(`Game is over: ${winner} already won`);
    this.name = "GameOverError";
  }
}
