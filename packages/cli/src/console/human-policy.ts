// ─── Human Policy ──────────────────────────────────────────────────
// An interactive seat: shows the table and the numbered hand, asks
// again on an answer outside it, and hands an illegal pick to the engine
// as an invalid move.

import type { Move, PlayableColor } from "@no-mercy/schema";
import { PLAYABLE_COLORS } from "@no-mercy/schema";
import {
  drawMove,
  formatCard,
  invalidMove,
  isDrawCard,
  isWild,
  matches,
  playMove,
  type DecisionPolicy,
  type PlayerView,
} from "@no-mercy/engine";
import type { Prompter } from "./prompter";

/** Lines shown to a human seat before it chooses. */
export function describeView(view: PlayerView): string[] {
  const lines = [
    `Top card: ${formatCard(view.topDiscard)} (active color ${view.activeColor})`,
  ];
  if (view.pendingDraw > 0) {
    lines.push(`Pending draw: ${view.pendingDraw}. Stack a draw card or take them.`);
  }
  lines.push(`${view.name}, your hand:`);
  view.hand.forEach((card, i) => {
    lines.push(`  ${i + 1}) ${formatCard(card)}`);
  });
  lines.push(view.pendingDraw > 0 ? `  0) draw ${view.pendingDraw}` : "  0) draw");
  return lines;
}

/** Accepts a color's full name or its first letter, in any case. */
export function parseColor(answer: string): PlayableColor | null {
  const upper = answer.trim().toUpperCase();
  if (upper.length === 0) return null;
  return PLAYABLE_COLORS.find((c) => (upper.length === 1 ? c.startsWith(upper) : c === upper)) ?? null;
}

export class HumanPolicy implements DecisionPolicy {
  readonly kind = "human";

  constructor(private readonly prompter: Prompter) {}

  async chooseMove(view: PlayerView): Promise<Move> {
    for (const line of describeView(view)) {
      this.prompter.say(line);
    }

    const max = view.hand.length;
    for (;;) {
      const answer = (await this.prompter.ask(`Choose 0-${max}: `)).trim();
      const choice = /^\d+$/.test(answer) ? Number(answer) : Number.NaN;
      const card = choice >= 1 ? view.hand[choice - 1] : undefined;

      if (choice === 0) {
        return drawMove();
      }
      if (card === undefined) {
        this.prompter.say(`Enter a number from 0 to ${max}.`);
        continue;
      }
      if (!matches(card, view.topDiscard, view.activeColor)) {
        this.prompter.say(
          `${formatCard(card)} does not match ${formatCard(view.topDiscard)} (active color ${view.activeColor}).`
        );
        return invalidMove("card does not match");
      }
      if (view.pendingDraw > 0 && !isDrawCard(card.rank)) {
        this.prompter.say(`${view.pendingDraw} cards are pending: only a draw card can be played.`);
        return invalidMove("must stack a draw card");
      }

      const color = isWild(card.rank) ? await this.askColor() : null;
      return playMove(card, color);
    }
  }

  alwaysChallenges(): boolean {
    return false;
  }

  private async askColor(): Promise<PlayableColor> {
    for (;;) {
      const color = parseColor(await this.prompter.ask("Color (R/Y/G/B): "));
      if (color !== null) return color;
      this.prompter.say(`Choose one of ${PLAYABLE_COLORS.join(", ")}.`);
    }
  }
}
