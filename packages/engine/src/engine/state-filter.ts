// ─── State Filter ──────────────────────────────────────────────────
// Produces per-player views of the game state, hiding information
// that the player shouldn't see (opponent hands, pile order).
// Policies only ever receive these views.

import type { Card, Direction, PlayableColor } from "@no-mercy/schema";
import type { GameState } from "./game-state";

/** Public information about one seat. */
export interface SeatView {
  readonly name: string;
  readonly handSize: number;
}

/** A read-only projection of game state for a specific player. */
export interface PlayerView {
  readonly playerIndex: number;
  readonly name: string;
  /** A copy of the player's own hand. */
  readonly hand: readonly Card[];
  readonly topDiscard: Card;
  readonly activeColor: PlayableColor;
  readonly pendingDraw: number;
  readonly direction: Direction;
  readonly turnNumber: number;
  readonly noMercy: boolean;
  readonly drawPileSize: number;
  /** Every seat in table order, including this player's. */
  readonly seats: readonly SeatView[];
}

/**
 * Creates a player-specific view of the game state.
 * Opponents are reduced to their name and card count.
 */
export function createPlayerView(state: GameState, playerIndex: number): PlayerView {
  const player = state.playerAt(playerIndex);

  return {
    playerIndex,
    name: player.name,
    hand: [...player.hand],
    topDiscard: state.deck.topDiscard(),
    activeColor: state.activeColor,
    pendingDraw: state.pendingDraw,
    direction: state.direction,
    turnNumber: state.turnNumber,
    noMercy: state.noMercy,
    drawPileSize: state.deck.drawPileSize,
    seats: state.players.map((p) => ({ name: p.name, handSize: p.handSize })),
  };
}
