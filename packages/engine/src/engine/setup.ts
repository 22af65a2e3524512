// ─── Game Setup ────────────────────────────────────────────────────
// Builds a ready-to-play engine: shuffled deck, dealt hands, opening
// discard, and the opening card's effect applied.

import { DECK_SIZE, DEFAULT_HAND_SIZE } from "@no-mercy/schema";
import { isPlayableColor } from "../cards/card";
import { Deck } from "../deck/deck";
import { PreconditionError } from "./errors";
import { GameState } from "./game-state";
import { Player } from "./player";
import type { DecisionPolicy } from "./policy";
import { createRng, type RandomSource } from "./prng";
import { TurnEngine, type GameEventListener } from "./turn-engine";

export interface SeatSetup {
  readonly name: string;
  readonly policy: DecisionPolicy;
}

export interface GameSetup {
  readonly seats: readonly SeatSetup[];
  /** Shuffle seed; ignored when `rng` is given. Defaults to `Date.now()`. */
  readonly seed?: number;
  readonly rng?: RandomSource;
  readonly noMercy?: boolean;
  readonly handSize?: number;
  /** Subscribed before the opening events are emitted. */
  readonly listeners?: readonly GameEventListener[];
}

/**
 * Creates and starts a game.
 * @throws {RangeError} for fewer than 2 seats or a deal the deck cannot cover.
 */
export function createGame(setup: GameSetup): TurnEngine {
  const handSize = setup.handSize ?? DEFAULT_HAND_SIZE;
  if (setup.seats.length < 2) {
    throw new RangeError(`Need at least 2 players, got ${setup.seats.length}`);
  }
  if (!Number.isInteger(handSize) || handSize < 1) {
    throw new RangeError(`Hand size must be a positive integer, got ${handSize}`);
  }
  if (setup.seats.length * handSize >= DECK_SIZE) {
    throw new RangeError(
      `Cannot deal ${handSize} cards to ${setup.seats.length} players from ${DECK_SIZE}`
    );
  }

  const rng = setup.rng ?? createRng(setup.seed ?? Date.now());
  const deck = Deck.standard(rng);
  const players = setup.seats.map((seat) => new Player(seat.name, seat.policy));

  for (const player of players) {
    player.draw(deck, handSize);
  }

  const opening = deck.startDiscardNonWild();
  if (!isPlayableColor(opening.color)) {
    throw new PreconditionError(`Opening card has no color: ${opening.rank}`);
  }

  const state = new GameState(deck, players, opening.color, setup.noMercy ?? true);
  const engine = new TurnEngine(state);
  for (const listener of setup.listeners ?? []) {
    engine.onEvent(listener);
  }
  engine.start();
  return engine;
}
