// ─── Deck ──────────────────────────────────────────────────────────
// Owns the draw pile and the discard pile. Index 0 is the front of
// each pile: the next card to draw, and the current top discard.

import type { Card } from "@no-mercy/schema";
import { isWild } from "../cards/card";
import { PreconditionError } from "../engine/errors";
import type { RandomSource } from "../engine/prng";
import { standardDeck } from "./presets";

export class Deck {
  private drawPile: Card[];
  private discardPile: Card[];
  /** Called after the discard pile has been recycled into the draw pile. */
  private onReshuffle: ((recycled: number) => void) | undefined;

  private constructor(
    drawPile: readonly Card[],
    discardPile: readonly Card[],
    private readonly rng: RandomSource
  ) {
    this.drawPile = [...drawPile];
    this.discardPile = [...discardPile];
  }

  /** The full 108-card deck, shuffled, with an empty discard pile. */
  static standard(rng: RandomSource): Deck {
    return new Deck(rng.shuffle(standardDeck()), [], rng);
  }

  /** A deck with fixed pile order, front first. */
  static fromPiles(
    drawPile: readonly Card[],
    discardPile: readonly Card[],
    rng: RandomSource
  ): Deck {
    return new Deck(drawPile, discardPile, rng);
  }

  /** Installs the reshuffle hook; the engine points it at its event stream. */
  setReshuffleListener(listener: ((recycled: number) => void) | undefined): void {
    this.onReshuffle = listener;
  }

  get drawPileSize(): number {
    return this.drawPile.length;
  }

  get discardPileSize(): number {
    return this.discardPile.length;
  }

  /** Snapshot of the draw pile, front first. */
  drawPileCards(): readonly Card[] {
    return [...this.drawPile];
  }

  /** Snapshot of the discard pile, top first. */
  discardPileCards(): readonly Card[] {
    return [...this.discardPile];
  }

  /**
   * Takes the front card of the draw pile, recycling the discard pile
   * first when the draw pile is empty. Returns null when nothing could
   * be recycled.
   */
  draw(): Card | null {
    if (this.drawPile.length === 0) {
      this.reshuffleFromDiscard();
    }
    return this.drawPile.shift() ?? null;
  }

  discard(card: Card): void {
    this.discardPile.unshift(card);
  }

  /** @throws {PreconditionError} if nothing has been discarded yet. */
  topDiscard(): Card {
    const top = this.discardPile[0];
    if (top === undefined) {
      throw new PreconditionError("Discard pile is empty: no top card to read");
    }
    return top;
  }

  /**
   * Draws and discards until a non-wild card lands on top, so the game
   * opens with a color to match.
   * Never recycles the discard pile.
   * @throws {PreconditionError} if the draw pile runs out first.
   */
  startDiscardNonWild(): Card {
    for (;;) {
      const card = this.drawPile.shift();
      if (card === undefined) {
        throw new PreconditionError("Deck ran out before a non-wild opening card was found");
      }
      this.discard(card);
      if (!isWild(card.rank)) {
        return card;
      }
    }
  }

  /**
   * Keeps the top discard in place and shuffles every card beneath it
   * into the draw pile. Returns the number of cards recycled.
   */
  reshuffleFromDiscard(): number {
    const [top, ...rest] = this.discardPile;
    if (top === undefined) {
      return 0;
    }
    this.discardPile = [top];
    this.drawPile.push(...this.rng.shuffle(rest));
    if (rest.length > 0) {
      this.onReshuffle?.(rest.length);
    }
    return rest.length;
  }
}
