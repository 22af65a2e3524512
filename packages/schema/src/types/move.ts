// ─── Moves ─────────────────────────────────────────────────────────
// What a decision policy hands back to the engine for one turn.

import type { Card, PlayableColor } from "./card";

/**
 * All possible moves as a discriminated union.
 *
 * - `play`:    put `card` on the discard pile. `chosenColor` only matters
 *              for wild ranks. `challenge` marks the play as a stack or
 *              challenge-inviting response; it never affects legality.
 * - `draw`:    draw one card, or absorb the pending forced draw.
 * - `invalid`: the policy itself gave up on an illegal intent; the
 *              engine charges a one-card penalty.
 */
export type Move =
  | {
      readonly kind: "play";
      readonly card: Card;
      readonly chosenColor: PlayableColor | null;
      readonly challenge: boolean;
    }
  | { readonly kind: "draw" }
  | { readonly kind: "invalid"; readonly reason: string };

export type MoveKind = Move["kind"];
