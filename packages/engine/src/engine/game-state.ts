// ─── Game State ────────────────────────────────────────────────────
// The mutable table state one engine instance owns: turn pointer,
// direction, active color, pending forced draw, deck and seats.

import type { Direction, PlayableColor } from "@no-mercy/schema";
import type { Deck } from "../deck/deck";
import { PreconditionError } from "./errors";
import type { Player } from "./player";

export class GameState {
  currentIndex = 0;
  direction: Direction = 1;
  /** Accumulated DRAW_TWO / WILD_DRAW_FOUR penalties awaiting an answer. */
  pendingDraw = 0;
  turnNumber = 0;
  winner: Player | null = null;

  constructor(
    readonly deck: Deck,
    readonly players: readonly Player[],
    public activeColor: PlayableColor,
    readonly noMercy: boolean = true
  ) {
    if (players.length < 2) {
      throw new RangeError(`Need at least 2 players, got ${players.length}`);
    }
  }

  current(): Player {
    return this.playerAt(this.currentIndex);
  }

  /** Seat index `steps` turns ahead in the current direction. */
  indexAfter(steps: number): number {
    const n = this.players.length;
    return (((this.currentIndex + steps * this.direction) % n) + n) % n;
  }

  nextPlayer(): Player {
    return this.playerAt(this.indexAfter(1));
  }

  advanceTurn(steps: number): void {
    this.currentIndex = this.indexAfter(steps);
  }

  reverse(): void {
    this.direction = this.direction === 1 ? -1 : 1;
  }

  get isOver(): boolean {
    return this.winner !== null;
  }

  playerAt(index: number): Player {
    const player = this.players[index];
    if (player === undefined) {
      throw new PreconditionError(`No player at seat ${index}`);
    }
    return player;
  }
}
