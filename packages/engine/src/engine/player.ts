// ─── Player ────────────────────────────────────────────────────────
// A seat at the table: a name, a hand, and the policy that moves for it.
// Hand order is display order only.

import type { Card, Color, Move, PlayableColor } from "@no-mercy/schema";
import { isWild, matches, sameCard } from "../cards/card";
import type { Deck } from "../deck/deck";
import type { DecisionPolicy } from "./policy";
import type { PlayerView } from "./state-filter";

export class Player {
  private readonly cards: Card[] = [];

  constructor(
    readonly name: string,
    readonly policy: DecisionPolicy
  ) {}

  get hand(): readonly Card[] {
    return this.cards;
  }

  get handSize(): number {
    return this.cards.length;
  }

  // ── Hand mutation (engine only) ─────────────────────────────────

  /**
   * Draws up to `count` cards into the hand. Stops early, without
   * error, when the deck cannot supply a card. Returns what was drawn.
   */
  draw(deck: Deck, count: number): Card[] {
    const drawn: Card[] = [];
    for (let i = 0; i < count; i++) {
      const card = deck.draw();
      if (card === null) break;
      this.cards.push(card);
      drawn.push(card);
    }
    return drawn;
  }

  receive(card: Card): void {
    this.cards.push(card);
  }

  /** Removes one card equal to `card`. Returns false when none is held. */
  remove(card: Card): boolean {
    const index = this.cards.findIndex((c) => sameCard(c, card));
    if (index === -1) return false;
    this.cards.splice(index, 1);
    return true;
  }

  // ── Hand queries ─────────────────────────────────────────────────

  holds(card: Card): boolean {
    return this.cards.some((c) => sameCard(c, card));
  }

  hasPlayable(top: Card, activeColor: PlayableColor): boolean {
    return this.cards.some((c) => matches(c, top, activeColor));
  }

  countColor(color: Color): number {
    return this.cards.filter((c) => c.color === color).length;
  }

  hasNonWildColor(color: Color): boolean {
    return this.cards.some((c) => !isWild(c.rank) && c.color === color);
  }

  // ── Decision capability ──────────────────────────────────────────

  chooseMove(view: PlayerView): Move | Promise<Move> {
    return this.policy.chooseMove(view);
  }

  alwaysChallenges(): boolean {
    return this.policy.alwaysChallenges();
  }
}
