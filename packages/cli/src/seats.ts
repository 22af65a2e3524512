// ─── Seat Assembly ─────────────────────────────────────────────────
// Maps configured policy kinds to DecisionPolicy instances.

import type { GameConfig, PolicyKind } from "@no-mercy/schema";
import { AggressivePolicy, type DecisionPolicy, type SeatSetup } from "@no-mercy/engine";
import { HumanPolicy } from "./console/human-policy";
import type { Prompter } from "./console/prompter";

function policyFor(kind: PolicyKind, prompter: Prompter): DecisionPolicy {
  switch (kind) {
    case "human":
      return new HumanPolicy(prompter);
    case "aggressive":
      return new AggressivePolicy();
  }
}

/** Human seats share `prompter`; each AI seat gets its own policy. */
export function createSeats(config: GameConfig, prompter: Prompter): SeatSetup[] {
  return config.players.map((seat) => ({
    name: seat.name,
    policy: policyFor(seat.policy, prompter),
  }));
}

export function hasHumanSeat(config: GameConfig): boolean {
  return config.players.some((seat) => seat.policy === "human");
}
