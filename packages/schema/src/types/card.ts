// ─── Card Primitives ───────────────────────────────────────────────
// Foundational types for the 108-card deck: colors, ranks, cards.
// Uses literal types and discriminated unions to make illegal states
// unrepresentable at the type level.

/** The four colors printed on card faces. */
export type PlayableColor = "RED" | "YELLOW" | "GREEN" | "BLUE";

/**
 * Nominal color of a card. `WILD` marks an unresolved wild card; it is
 * never an active color.
 */
export type Color = PlayableColor | "WILD";

/** Playable colors in enumeration order (also the color tie-break order). */
export const PLAYABLE_COLORS: readonly PlayableColor[] = [
  "RED",
  "YELLOW",
  "GREEN",
  "BLUE",
];

// ─── Ranks ─────────────────────────────────────────────────────────

export type NumberRank =
  | "ZERO"
  | "ONE"
  | "TWO"
  | "THREE"
  | "FOUR"
  | "FIVE"
  | "SIX"
  | "SEVEN"
  | "EIGHT"
  | "NINE";

export type ActionRank = "SKIP" | "REVERSE" | "DRAW_TWO";

export type WildRank = "WILD" | "WILD_DRAW_FOUR";

/** Combined rank type: numeric, action, or wild family. */
export type Rank = NumberRank | ActionRank | WildRank;

export const NUMBER_RANKS: readonly NumberRank[] = [
  "ZERO",
  "ONE",
  "TWO",
  "THREE",
  "FOUR",
  "FIVE",
  "SIX",
  "SEVEN",
  "EIGHT",
  "NINE",
];

export const ACTION_RANKS: readonly ActionRank[] = ["SKIP", "REVERSE", "DRAW_TWO"];

export const WILD_RANKS: readonly WildRank[] = ["WILD", "WILD_DRAW_FOUR"];

export const ALL_RANKS: readonly Rank[] = [
  ...NUMBER_RANKS,
  ...ACTION_RANKS,
  ...WILD_RANKS,
];

// ─── Card ──────────────────────────────────────────────────────────

/**
 * An immutable card value. Two cards with the same color and rank are
 * interchangeable; equality is by value, never by reference.
 */
export interface Card {
  readonly color: Color;
  readonly rank: Rank;
}
