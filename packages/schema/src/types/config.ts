// ─── Game Configuration ────────────────────────────────────────────
// The declarative description of a table: who sits where, which
// policy drives each seat, and the house rule toggle.
// A .game.json file is parsed into this type.

/** Decision policies a config can assign to a seat. */
export type PolicyKind = "human" | "aggressive";

export interface SeatConfig {
  readonly name: string;
  readonly policy: PolicyKind;
}

export interface GameConfig {
  readonly players: readonly SeatConfig[];
  /** Auto-play drawn cards that match the table. */
  readonly noMercy: boolean;
  readonly handSize: number;
  /** Shuffle seed; absent means "pick one at start". */
  readonly seed?: number;
}
