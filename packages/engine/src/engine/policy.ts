// ─── Decision Policy ───────────────────────────────────────────────
// The pluggable capability that picks a move for a seat. The engine
// holds only this interface, never a concrete player kind.

import type { Move } from "@no-mercy/schema";
import type { PlayerView } from "./state-filter";

export interface DecisionPolicy {
  /** Short label for logs and summaries, e.g. "human" or "aggressive". */
  readonly kind: string;

  /**
   * Picks this turn's move. Must not mutate anything reachable from
   * `view`. Automated policies answer synchronously; interactive ones
   * may wait for input.
   */
  chooseMove(view: PlayerView): Move | Promise<Move>;

  /**
   * Whether this seat challenges every Wild Draw Four played on it.
   * When false, a challenge happens only if the play itself carried
   * the challenge flag.
   */
  alwaysChallenges(): boolean;
}
