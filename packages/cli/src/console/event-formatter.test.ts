import { describe, it, expect } from "vitest";
import { createCard, type GameEvent, type GameEventBody } from "@no-mercy/engine";
import { formatEvent, formatOpponents } from "./event-formatter.js";

function event(body: GameEventBody): GameEvent {
  return { ...body, seq: 1 };
}

const RED_FIVE = createCard("RED", "FIVE");

describe("formatEvent", () => {
  it("announces the table", () => {
    expect(
      formatEvent(
        event({
          type: "game_started",
          players: ["You", "AI-1"],
          topCard: RED_FIVE,
          activeColor: "RED",
          noMercy: true,
        })
      )
    ).toBe("Players: You, AI-1. Opening card: RED FIVE. No-mercy rule on.");
  });

  it("describes the opening effect", () => {
    expect(
      formatEvent(event({ type: "initial_effect", card: createCard("BLUE", "SKIP"), effect: "skip" }))
    ).toBe("Opening SKIP: the first player is skipped");
  });

  it("marks the start of a turn", () => {
    expect(
      formatEvent(
        event({ type: "turn_started", player: "AI-1", playerIndex: 1, turnNumber: 12, hands: [] })
      )
    ).toBe("--- Turn 12: AI-1 ---");
  });

  it("names the color picked with a wild", () => {
    expect(
      formatEvent(
        event({
          type: "card_played",
          player: "You",
          card: createCard("WILD", "WILD_DRAW_FOUR"),
          activeColor: "GREEN",
        })
      )
    ).toBe("You plays WILD_DRAW_FOUR and picks GREEN");
  });

  it("describes a colored play without the color choice", () => {
    expect(
      formatEvent(event({ type: "card_played", player: "You", card: RED_FIVE, activeColor: "RED" }))
    ).toBe("You plays RED FIVE");
  });

  it.each([
    ["voluntary", 1, "AI-1 draws 1 card"],
    ["pending", 6, "AI-1 draws 6 cards"],
    ["penalty", 1, "AI-1 draws 1 card as a penalty"],
    ["challenge_penalty", 4, "AI-1 draws 4 cards for an illegal Wild Draw Four"],
    ["failed_challenge", 6, "AI-1 draws 6 cards for a failed challenge"],
  ] as const)("describes a %s draw", (reason, count, expected) => {
    const cards = Array.from({ length: count }, () => RED_FIVE);
    expect(formatEvent(event({ type: "cards_drawn", player: "AI-1", cards, reason }))).toBe(expected);
  });

  it("explains each rejected play", () => {
    const rejected = (reason: "not_in_hand" | "no_match" | "must_stack") =>
      formatEvent(event({ type: "play_rejected", player: "You", card: RED_FIVE, reason }));

    expect(rejected("not_in_hand")).toBe("You does not hold RED FIVE; turn forfeited");
    expect(rejected("no_match")).toBe("RED FIVE does not match; You forfeits the turn");
    expect(rejected("must_stack")).toBe("You must stack a draw card; takes the pending cards instead");
  });

  it("describes a two-seat reverse as a skip", () => {
    expect(formatEvent(event({ type: "direction_reversed", direction: -1, actsAsSkip: true }))).toBe(
      "Direction reversed (counterclockwise), acting as a skip"
    );
    expect(formatEvent(event({ type: "direction_reversed", direction: 1, actsAsSkip: false }))).toBe(
      "Direction reversed (clockwise)"
    );
  });

  it("reports challenge outcomes", () => {
    const body = {
      type: "challenge_resolved",
      challenger: "AI-1",
      target: "You",
      penalized: "You",
      penalty: 4,
    } as const;

    expect(formatEvent(event({ ...body, successful: true }))).toBe(
      "AI-1 challenges You: the Wild Draw Four was illegal"
    );
    expect(formatEvent(event({ ...body, successful: false, penalized: "AI-1", penalty: 6 }))).toBe(
      "AI-1 challenges You: the Wild Draw Four was legal"
    );
  });

  it("covers the remaining narrated events", () => {
    expect(formatEvent(event({ type: "last_card", player: "You" }))).toBe("You: UNO!");
    expect(formatEvent(event({ type: "turn_skipped", player: "AI-2" }))).toBe("AI-2 is skipped");
    expect(formatEvent(event({ type: "pending_draw_increased", pendingDraw: 6 }))).toBe(
      "Pending draw is now 6"
    );
    expect(formatEvent(event({ type: "invalid_move", player: "AI-1", reason: "no move" }))).toBe(
      "AI-1 made an invalid move (no move)"
    );
    expect(
      formatEvent(event({ type: "draw_exhausted", player: "You", requested: 4, received: 1 }))
    ).toBe("Deck exhausted: You got 1 of 4");
    expect(formatEvent(event({ type: "auto_played", player: "You", card: RED_FIVE }))).toBe(
      "You's drawn RED FIVE matches and is played"
    );
    expect(formatEvent(event({ type: "game_won", winner: "AI-1", turnNumber: 31 }))).toBe(
      "AI-1 wins on turn 31!"
    );
  });

  it("does not narrate reshuffles", () => {
    expect(formatEvent(event({ type: "deck_reshuffled", recycled: 40 }))).toBeNull();
  });
});

describe("formatOpponents", () => {
  it("lists every other seat's card count", () => {
    const hands = [
      { name: "You", handSize: 5 },
      { name: "AI-1", handSize: 3 },
      { name: "AI-2", handSize: 9 },
    ];
    expect(formatOpponents(hands, "You")).toBe("AI-1 3, AI-2 9");
  });
});
