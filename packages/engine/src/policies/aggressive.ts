// ─── Aggressive Policy ─────────────────────────────────────────────
// Automated seat that stacks whenever it can, leads with action cards
// and only plays a Wild Draw Four it could defend against a challenge.

import type { Card, Move } from "@no-mercy/schema";
import { isDrawCard, isWild, matches } from "../cards/card";
import { chooseColorAuto } from "../engine/color-choice";
import { drawMove, playMove } from "../engine/moves";
import type { DecisionPolicy } from "../engine/policy";
import type { PlayerView } from "../engine/state-filter";

export class AggressivePolicy implements DecisionPolicy {
  readonly kind = "aggressive";

  chooseMove(view: PlayerView): Move {
    const playable = view.hand.filter((c) => matches(c, view.topDiscard, view.activeColor));

    if (view.pendingDraw > 0) {
      const stack = playable.find((c) => isDrawCard(c.rank));
      return stack ? this.play(view, stack, true) : drawMove();
    }

    let fallback: Card | undefined;
    for (const card of playable) {
      if (card.rank === "WILD_DRAW_FOUR") {
        const defensible = !view.hand.some(
          (c) => !isWild(c.rank) && c.color === view.activeColor
        );
        if (defensible) return this.play(view, card, true);
        if (!fallback) fallback = card;
        continue;
      }
      if (card.rank === "DRAW_TWO" || card.rank === "SKIP" || card.rank === "REVERSE") {
        return this.play(view, card, false);
      }
      if (!fallback) fallback = card;
    }

    return fallback ? this.play(view, fallback, false) : drawMove();
  }

  alwaysChallenges(): boolean {
    return true;
  }

  private play(view: PlayerView, card: Card, challenge: boolean): Move {
    const color = isWild(card.rank) ? chooseColorAuto(view.hand) : null;
    return playMove(card, color, challenge);
  }
}
