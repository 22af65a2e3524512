// ─── Event Formatter ───────────────────────────────────────────────
// One line of narrative per engine event. Returns null for events the
// console does not narrate.

import type { DrawReason, GameEvent, HandCount, InitialEffect, PlayRejection } from "@no-mercy/schema";
import { formatCard, isWild } from "@no-mercy/engine";

const DRAW_SUFFIX: Record<DrawReason, string> = {
  voluntary: "",
  pending: "",
  penalty: " as a penalty",
  challenge_penalty: " for an illegal Wild Draw Four",
  failed_challenge: " for a failed challenge",
};

const OPENING: Record<InitialEffect, string> = {
  skip: "the first player is skipped",
  reverse: "play starts counterclockwise",
  draw_two: "the first player faces 2 cards",
};

function cards(count: number): string {
  return count === 1 ? "1 card" : `${count} cards`;
}

function rejection(player: string, card: string, reason: PlayRejection): string {
  switch (reason) {
    case "not_in_hand":
      return `${player} does not hold ${card}; turn forfeited`;
    case "no_match":
      return `${card} does not match; ${player} forfeits the turn`;
    case "must_stack":
      return `${player} must stack a draw card; takes the pending cards instead`;
  }
}

/** "B 5, C 3" for every seat except `player`. */
export function formatOpponents(hands: readonly HandCount[], player: string): string {
  return hands
    .filter((h) => h.name !== player)
    .map((h) => `${h.name} ${h.handSize}`)
    .join(", ");
}

export function formatEvent(event: GameEvent): string | null {
  switch (event.type) {
    case "game_started":
      return (
        `Players: ${event.players.join(", ")}. Opening card: ${formatCard(event.topCard)}. ` +
        `No-mercy rule ${event.noMercy ? "on" : "off"}.`
      );
    case "initial_effect":
      return `Opening ${event.card.rank}: ${OPENING[event.effect]}`;
    case "turn_started":
      return `--- Turn ${event.turnNumber}: ${event.player} ---`;
    case "invalid_move":
      return `${event.player} made an invalid move (${event.reason})`;
    case "play_rejected":
      return rejection(event.player, formatCard(event.card), event.reason);
    case "card_played":
      return isWild(event.card.rank)
        ? `${event.player} plays ${formatCard(event.card)} and picks ${event.activeColor}`
        : `${event.player} plays ${formatCard(event.card)}`;
    case "last_card":
      return `${event.player}: UNO!`;
    case "cards_drawn":
      return `${event.player} draws ${cards(event.cards.length)}${DRAW_SUFFIX[event.reason]}`;
    case "draw_exhausted":
      return `Deck exhausted: ${event.player} got ${event.received} of ${event.requested}`;
    case "auto_played":
      return `${event.player}'s drawn ${formatCard(event.card)} matches and is played`;
    case "turn_skipped":
      return `${event.player} is skipped`;
    case "direction_reversed": {
      const way = event.direction === 1 ? "clockwise" : "counterclockwise";
      return event.actsAsSkip ? `Direction reversed (${way}), acting as a skip` : `Direction reversed (${way})`;
    }
    case "pending_draw_increased":
      return `Pending draw is now ${event.pendingDraw}`;
    case "challenge_resolved":
      return event.successful
        ? `${event.challenger} challenges ${event.target}: the Wild Draw Four was illegal`
        : `${event.challenger} challenges ${event.target}: the Wild Draw Four was legal`;
    case "deck_reshuffled":
      return null;
    case "game_won":
      return `${event.winner} wins on turn ${event.turnNumber}!`;
  }
}
