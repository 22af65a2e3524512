// ─── Game Events ───────────────────────────────────────────────────
// Discrete notifications the engine emits while it mutates state.
// Presentation layers (console, log, tests) subscribe to these instead
// of the engine printing anything itself.

import type { Card, PlayableColor } from "./card";

/** Turn order: +1 clockwise, -1 counterclockwise. */
export type Direction = 1 | -1;

/** Why a batch of cards moved from the deck into a hand. */
export type DrawReason =
  | "penalty"
  | "pending"
  | "voluntary"
  | "challenge_penalty"
  | "failed_challenge";

/** Why a proposed play was refused. */
export type PlayRejection = "not_in_hand" | "no_match" | "must_stack";

/** A seat's public card count. */
export interface HandCount {
  readonly name: string;
  readonly handSize: number;
}

/** Effect of the opening discard, applied before anyone moves. */
export type InitialEffect = "skip" | "reverse" | "draw_two";

/**
 * Event payloads, discriminated on `type`. Players are referenced by
 * name; seat indices are included where a consumer needs them.
 */
export type GameEventBody =
  | {
      readonly type: "game_started";
      readonly players: readonly string[];
      readonly topCard: Card;
      readonly activeColor: PlayableColor;
      readonly noMercy: boolean;
    }
  | { readonly type: "initial_effect"; readonly card: Card; readonly effect: InitialEffect }
  | {
      readonly type: "turn_started";
      readonly player: string;
      readonly playerIndex: number;
      readonly turnNumber: number;
      /** Every seat's hand size as the turn begins, in seat order. */
      readonly hands: readonly HandCount[];
    }
  | { readonly type: "invalid_move"; readonly player: string; readonly reason: string }
  | {
      readonly type: "play_rejected";
      readonly player: string;
      readonly card: Card;
      readonly reason: PlayRejection;
    }
  | {
      readonly type: "card_played";
      readonly player: string;
      readonly card: Card;
      readonly activeColor: PlayableColor;
    }
  | { readonly type: "last_card"; readonly player: string }
  | {
      readonly type: "cards_drawn";
      readonly player: string;
      readonly cards: readonly Card[];
      readonly reason: DrawReason;
    }
  | {
      readonly type: "draw_exhausted";
      readonly player: string;
      readonly requested: number;
      readonly received: number;
    }
  | { readonly type: "auto_played"; readonly player: string; readonly card: Card }
  | { readonly type: "turn_skipped"; readonly player: string }
  | {
      readonly type: "direction_reversed";
      readonly direction: Direction;
      readonly actsAsSkip: boolean;
    }
  | { readonly type: "pending_draw_increased"; readonly pendingDraw: number }
  | {
      readonly type: "challenge_resolved";
      readonly challenger: string;
      readonly target: string;
      readonly successful: boolean;
      /** Name of the player who paid for the challenge. */
      readonly penalized: string;
      readonly penalty: number;
    }
  | { readonly type: "deck_reshuffled"; readonly recycled: number }
  | { readonly type: "game_won"; readonly winner: string; readonly turnNumber: number };

/** An emitted event: its payload plus a sequence number, starting at 1. */
export type GameEvent = GameEventBody & { readonly seq: number };

export type GameEventType = GameEventBody["type"];
