import { describe, it, expect } from "vitest";
import { card, filler, makeTable } from "../__tests__/fixtures.js";
import { PreconditionError } from "./errors.js";
import { createPlayerView } from "./state-filter.js";

// ─── Test Helpers ──────────────────────────────────────────────────

function makeThreeSeatTable() {
  return makeTable({
    hands: [
      [card("RED", "ONE"), card("WILD", "WILD")],
      [card("BLUE", "TWO"), card("BLUE", "THREE"), card("GREEN", "SKIP")],
      [card("YELLOW", "FOUR")],
    ],
    discard: [card("RED", "FIVE"), card("BLUE", "FIVE")],
    drawPile: filler(6),
  });
}

describe("createPlayerView", () => {
  it("shows the player their own hand", () => {
    const { state } = makeThreeSeatTable();
    const view = createPlayerView(state, 1);

    expect(view.playerIndex).toBe(1);
    expect(view.name).toBe("B");
    expect(view.hand).toEqual([card("BLUE", "TWO"), card("BLUE", "THREE"), card("GREEN", "SKIP")]);
  });

  it("reduces every seat to its name and hand size", () => {
    const { state } = makeThreeSeatTable();
    const view = createPlayerView(state, 0);

    expect(view.seats).toEqual([
      { name: "A", handSize: 2 },
      { name: "B", handSize: 3 },
      { name: "C", handSize: 1 },
    ]);
  });

  it("copies the table's public state", () => {
    const { state } = makeThreeSeatTable();
    state.pendingDraw = 4;
    state.reverse();
    state.turnNumber = 9;

    const view = createPlayerView(state, 2);

    expect(view.topDiscard).toEqual(card("RED", "FIVE"));
    expect(view.activeColor).toBe("RED");
    expect(view.pendingDraw).toBe(4);
    expect(view.direction).toBe(-1);
    expect(view.turnNumber).toBe(9);
    expect(view.noMercy).toBe(true);
    expect(view.drawPileSize).toBe(6);
  });

  it("does not share the hand array with the player", () => {
    const { state, players } = makeThreeSeatTable();
    const view = createPlayerView(state, 0);
    const seatA = players[0];

    seatA?.receive(card("GREEN", "NINE"));

    expect(view.hand).toHaveLength(2);
    expect(seatA?.hand).toHaveLength(3);
  });

  it("throws PreconditionError for a seat that does not exist", () => {
    const { state } = makeThreeSeatTable();
    expect(() => createPlayerView(state, 5)).toThrow(PreconditionError);
  });
});
