import { describe, it, expect } from "vitest";
import { createCard, type Card, type PlayerView } from "@no-mercy/engine";
import { HumanPolicy, describeView, parseColor } from "./human-policy.js";
import type { Prompter } from "./prompter.js";

// ══════════════════════════════════════════════════════════════════════
// Factories
// ══════════════════════════════════════════════════════════════════════

/** Answers questions from a fixed script and records everything shown. */
class ScriptedPrompter implements Prompter {
  readonly said: string[] = [];
  readonly asked: string[] = [];
  private readonly answers: string[];

  constructor(answers: readonly string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.asked.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for "${question}"`);
    }
    return answer;
  }

  say(line: string): void {
    this.said.push(line);
  }
}

function makeView(hand: Card[], top: Card, pendingDraw = 0): PlayerView {
  return {
    playerIndex: 0,
    name: "You",
    hand,
    topDiscard: top,
    activeColor: "RED",
    pendingDraw,
    direction: 1,
    turnNumber: 4,
    noMercy: true,
    drawPileSize: 50,
    seats: [
      { name: "You", handSize: hand.length },
      { name: "AI-1", handSize: 5 },
    ],
  };
}

const RED_ONE = createCard("RED", "ONE");
const RED_FIVE = createCard("RED", "FIVE");
const BLUE_TWO = createCard("BLUE", "TWO");
const WILD = createCard("WILD", "WILD");

// ══════════════════════════════════════════════════════════════════════
// Tests
// ══════════════════════════════════════════════════════════════════════

describe("describeView", () => {
  it("numbers the hand after the table summary", () => {
    expect(describeView(makeView([RED_ONE, WILD], RED_FIVE))).toEqual([
      "Top card: RED FIVE (active color RED)",
      "You, your hand:",
      "  1) RED ONE",
      "  2) WILD",
      "  0) draw",
    ]);
  });

  it("mentions a pending draw", () => {
    const lines = describeView(makeView([RED_ONE], createCard("RED", "DRAW_TWO"), 2));

    expect(lines[1]).toBe("Pending draw: 2. Stack a draw card or take them.");
    expect(lines.at(-1)).toBe("  0) draw 2");
  });
});

describe("parseColor", () => {
  it("accepts names and initials in any case", () => {
    expect(parseColor("blue")).toBe("BLUE");
    expect(parseColor(" r ")).toBe("RED");
    expect(parseColor("Y")).toBe("YELLOW");
  });

  it("rejects anything else", () => {
    expect(parseColor("bl")).toBeNull();
    expect(parseColor("purple")).toBeNull();
    expect(parseColor("")).toBeNull();
  });
});

describe("HumanPolicy", () => {
  it("never challenges on its own", () => {
    expect(new HumanPolicy(new ScriptedPrompter([])).alwaysChallenges()).toBe(false);
  });

  it("draws on 0", async () => {
    const policy = new HumanPolicy(new ScriptedPrompter(["0"]));

    expect(await policy.chooseMove(makeView([RED_ONE], RED_FIVE))).toEqual({ kind: "draw" });
  });

  it("plays the chosen card", async () => {
    const prompter = new ScriptedPrompter(["1"]);
    const move = await new HumanPolicy(prompter).chooseMove(makeView([RED_ONE, BLUE_TWO], RED_FIVE));

    expect(move).toEqual({ kind: "play", card: RED_ONE, chosenColor: null, challenge: false });
    expect(prompter.asked).toEqual(["Choose 0-2: "]);
  });

  it("re-prompts on input outside the hand", async () => {
    const prompter = new ScriptedPrompter(["7", "x", " 1 "]);
    const move = await new HumanPolicy(prompter).chooseMove(makeView([RED_ONE, BLUE_TWO], RED_FIVE));

    expect(move).toMatchObject({ kind: "play", card: RED_ONE });
    expect(prompter.asked).toHaveLength(3);
    expect(prompter.said.filter((l) => l === "Enter a number from 0 to 2.")).toHaveLength(2);
  });

  it("turns a card that does not match into an invalid move", async () => {
    const prompter = new ScriptedPrompter(["1"]);
    const move = await new HumanPolicy(prompter).chooseMove(makeView([BLUE_TWO, RED_ONE], RED_FIVE));

    expect(move).toEqual({ kind: "invalid", reason: "card does not match" });
    expect(prompter.asked).toEqual(["Choose 0-2: "]);
    expect(prompter.said.at(-1)).toBe("BLUE TWO does not match RED FIVE (active color RED).");
  });

  it("turns a non-draw card under a pending draw into an invalid move", async () => {
    const prompter = new ScriptedPrompter(["1"]);
    const move = await new HumanPolicy(prompter).chooseMove(
      makeView([RED_ONE, createCard("BLUE", "DRAW_TWO")], createCard("RED", "DRAW_TWO"), 2)
    );

    expect(move).toEqual({ kind: "invalid", reason: "must stack a draw card" });
    expect(prompter.asked).toEqual(["Choose 0-2: "]);
    expect(prompter.said.at(-1)).toBe("2 cards are pending: only a draw card can be played.");
  });

  it("stacks a draw card while a draw is pending", async () => {
    const blueDrawTwo = createCard("BLUE", "DRAW_TWO");
    const move = await new HumanPolicy(new ScriptedPrompter(["2"])).chooseMove(
      makeView([RED_ONE, blueDrawTwo], createCard("RED", "DRAW_TWO"), 2)
    );

    expect(move).toEqual({ kind: "play", card: blueDrawTwo, chosenColor: null, challenge: false });
  });

  it("asks for a color after a wild until it gets one", async () => {
    const prompter = new ScriptedPrompter(["1", "purple", "g"]);
    const move = await new HumanPolicy(prompter).chooseMove(makeView([WILD, BLUE_TWO], RED_FIVE));

    expect(move).toEqual({ kind: "play", card: WILD, chosenColor: "GREEN", challenge: false });
    expect(prompter.asked).toEqual(["Choose 0-2: ", "Color (R/Y/G/B): ", "Color (R/Y/G/B): "]);
    expect(prompter.said.at(-1)).toBe("Choose one of RED, YELLOW, GREEN, BLUE.");
  });
});
