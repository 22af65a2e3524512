// ─── Test Fixtures ─────────────────────────────────────────────────
// Hand-built tables with fixed pile order, and a policy that replays
// a scripted list of moves.

import type { Card, Color, Move, PlayableColor, Rank } from "@no-mercy/schema";
import { createCard, isPlayableColor } from "../cards/card";
import { Deck } from "../deck/deck";
import { GameState } from "../engine/game-state";
import { Player } from "../engine/player";
import type { DecisionPolicy } from "../engine/policy";
import { createRng } from "../engine/prng";
import type { PlayerView } from "../engine/state-filter";
import { TurnEngine } from "../engine/turn-engine";

export function card(color: Color, rank: Rank): Card {
  return createCard(color, rank);
}

/** `count` copies of a card that matches nothing the tests put on top. */
export function filler(count: number, color: Color = "YELLOW", rank: Rank = "NINE"): Card[] {
  return Array.from({ length: count }, () => createCard(color, rank));
}

/** Replays `moves` in order and records every view it was shown. */
export class ScriptedPolicy implements DecisionPolicy {
  readonly kind = "scripted";
  readonly views: PlayerView[] = [];
  private readonly queue: Move[];

  constructor(
    moves: readonly Move[] = [],
    private readonly challenges = false
  ) {
    this.queue = [...moves];
  }

  get calls(): number {
    return this.views.length;
  }

  chooseMove(view: PlayerView): Move {
    this.views.push(view);
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error(`ScriptedPolicy for ${view.name} ran out of moves`);
    }
    return next;
  }

  alwaysChallenges(): boolean {
    return this.challenges;
  }
}

export interface TableLayout {
  /** One hand per seat, seat 0 first. */
  readonly hands: readonly (readonly Card[])[];
  /** Discard pile, top first. */
  readonly discard: readonly Card[];
  /** Draw pile, next card first. */
  readonly drawPile?: readonly Card[];
  /** Defaults to the top discard's color. */
  readonly activeColor?: PlayableColor;
  readonly noMercy?: boolean;
  readonly policies?: readonly DecisionPolicy[];
}

export interface Table {
  readonly engine: TurnEngine;
  readonly state: GameState;
  readonly deck: Deck;
  readonly players: readonly Player[];
}

const SEAT_NAMES = ["A", "B", "C", "D", "E", "F"];

export function makeTable(layout: TableLayout): Table {
  const deck = Deck.fromPiles(layout.drawPile ?? [], layout.discard, createRng(1));
  const players = layout.hands.map((hand, i) => {
    const policy = layout.policies?.[i] ?? new ScriptedPolicy();
    const player = new Player(SEAT_NAMES[i] ?? `P${i}`, policy);
    for (const c of hand) player.receive(c);
    return player;
  });

  const topColor = layout.discard[0]?.color ?? "RED";
  const activeColor = layout.activeColor ?? (isPlayableColor(topColor) ? topColor : "RED");
  const state = new GameState(deck, players, activeColor, layout.noMercy ?? true);
  const engine = new TurnEngine(state);
  return { engine, state, deck, players };
}

/** Seat `index` of a table, failing the test if it does not exist. */
export function seat(table: Table, index: number): Player {
  return table.state.playerAt(index);
}
