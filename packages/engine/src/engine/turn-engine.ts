// ─── Turn Engine ───────────────────────────────────────────────────
// The state machine that runs a game: solicits a move from the
// current seat, validates it, applies card effects, advances the turn
// pointer and detects the winner. Every observable step is emitted as
// a GameEvent; the engine never prints.

import type {
  Card,
  DrawReason,
  GameEvent,
  GameEventBody,
  Move,
  PlayableColor,
  PlayRejection,
} from "@no-mercy/schema";
import { isDrawCard, isPlayableColor, isWild, matches } from "../cards/card";
import { chooseColorAuto } from "./color-choice";
import { GameOverError } from "./errors";
import type { GameState } from "./game-state";
import type { Player } from "./player";
import { createPlayerView } from "./state-filter";

export type GameEventListener = (event: GameEvent) => void;

export interface RunOptions {
  /** Stop after this many turns even without a winner. Unlimited by default. */
  readonly maxTurns?: number;
}

/** Cards the Wild Draw Four player takes when a challenge succeeds. */
export const CHALLENGE_PENALTY = 4;
/** Cards the challenger takes when a Wild Draw Four challenge fails (4 + 2). */
export const FAILED_CHALLENGE_PENALTY = 6;

export class TurnEngine {
  private readonly listeners = new Set<GameEventListener>();
  private readonly log: GameEvent[] = [];
  private seq = 0;
  private started = false;

  constructor(readonly state: GameState) {
    state.deck.setReshuffleListener((recycled) => {
      this.emit({ type: "deck_reshuffled", recycled });
    });
  }

  // ── Observation ─────────────────────────────────────────────────

  /** Subscribes to events in emission order. Returns an unsubscribe function. */
  onEvent(listener: GameEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Every event emitted so far, oldest first. */
  get events(): readonly GameEvent[] {
    return this.log;
  }

  get winner(): Player | null {
    return this.state.winner;
  }

  get isOver(): boolean {
    return this.state.isOver;
  }

  // ── Lifecycle ───────────────────────────────────────────────────

  /**
   * Announces the table and applies the opening discard's effect.
   * Runs once; later calls do nothing.
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    const { state } = this;
    const top = state.deck.topDiscard();
    this.emit({
      type: "game_started",
      players: state.players.map((p) => p.name),
      topCard: top,
      activeColor: state.activeColor,
      noMercy: state.noMercy,
    });

    switch (top.rank) {
      case "SKIP":
        this.emit({ type: "initial_effect", card: top, effect: "skip" });
        this.emit({ type: "turn_skipped", player: state.current().name });
        state.advanceTurn(1);
        break;
      case "REVERSE":
        // Nobody has played yet, so only the direction changes.
        state.reverse();
        this.emit({ type: "initial_effect", card: top, effect: "reverse" });
        break;
      case "DRAW_TWO":
        state.pendingDraw = 2;
        this.emit({ type: "initial_effect", card: top, effect: "draw_two" });
        break;
      default:
        break;
    }
  }

  /**
   * Plays one full turn: asks the current seat's policy for a move,
   * then applies it. Starts the game first if needed.
   * @throws {GameOverError} if a winner has already been declared.
   */
  async playTurn(): Promise<void> {
    this.assertNotOver();
    this.start();

    const { state } = this;
    const player = state.current();
    state.turnNumber += 1;
    this.emit({
      type: "turn_started",
      player: player.name,
      playerIndex: state.currentIndex,
      turnNumber: state.turnNumber,
      hands: state.players.map((p) => ({ name: p.name, handSize: p.handSize })),
    });

    const move = await player.chooseMove(createPlayerView(state, state.currentIndex));
    this.applyMove(move);
  }

  /** Plays turns until someone wins or `maxTurns` is reached. Returns the winner, if any. */
  async run(options: RunOptions = {}): Promise<Player | null> {
    const maxTurns = options.maxTurns ?? Number.POSITIVE_INFINITY;
    this.start();
    while (!this.state.isOver && this.state.turnNumber < maxTurns) {
      await this.playTurn();
    }
    return this.state.winner;
  }

  /**
   * Applies `move` for the current seat. Illegal moves are resolved
   * with their penalty and reported as events, never thrown.
   * @throws {GameOverError} if a winner has already been declared.
   */
  applyMove(move: Move): void {
    this.assertNotOver();
    const player = this.state.current();

    switch (move.kind) {
      case "invalid":
        this.emit({ type: "invalid_move", player: player.name, reason: move.reason });
        this.drawInto(player, 1, "penalty");
        this.state.advanceTurn(1);
        break;
      case "draw":
        this.resolveDraw(player);
        break;
      case "play":
        this.resolvePlay(player, move.card, move.chosenColor, move.challenge);
        break;
    }

    this.checkWin(player);
  }

  // ── Draw ────────────────────────────────────────────────────────

  private resolveDraw(player: Player): void {
    const { state } = this;
    if (state.pendingDraw > 0) {
      this.absorbPending(player);
      return;
    }

    const card = state.deck.draw();
    if (card === null) {
      this.emit({ type: "draw_exhausted", player: player.name, requested: 1, received: 0 });
      state.advanceTurn(1);
      return;
    }

    player.receive(card);
    this.emit({ type: "cards_drawn", player: player.name, cards: [card], reason: "voluntary" });

    if (state.noMercy && matches(card, state.deck.topDiscard(), state.activeColor)) {
      this.emit({ type: "auto_played", player: player.name, card });
      const color = isWild(card.rank) ? chooseColorAuto(player.hand) : null;
      this.playCard(player, card, color, false);
      return;
    }

    state.advanceTurn(1);
  }

  /** The whole pending amount lands on `player`, ending their turn. */
  private absorbPending(player: Player): void {
    const amount = this.state.pendingDraw;
    this.state.pendingDraw = 0;
    this.drawInto(player, amount, "pending");
    this.state.advanceTurn(1);
  }

  private drawInto(player: Player, count: number, reason: DrawReason): Card[] {
    const drawn = player.draw(this.state.deck, count);
    if (drawn.length > 0) {
      this.emit({ type: "cards_drawn", player: player.name, cards: drawn, reason });
    }
    if (drawn.length < count) {
      this.emit({
        type: "draw_exhausted",
        player: player.name,
        requested: count,
        received: drawn.length,
      });
    }
    return drawn;
  }

  // ── Play ────────────────────────────────────────────────────────

  private resolvePlay(
    player: Player,
    card: Card,
    chosenColor: PlayableColor | null,
    challenge: boolean
  ): void {
    const { state } = this;

    if (!player.holds(card)) {
      this.reject(player, card, "not_in_hand");
      state.advanceTurn(1);
      return;
    }
    if (!matches(card, state.deck.topDiscard(), state.activeColor)) {
      this.reject(player, card, "no_match");
      state.advanceTurn(1);
      return;
    }
    if (state.pendingDraw > 0 && !isDrawCard(card.rank)) {
      this.reject(player, card, "must_stack");
      this.absorbPending(player);
      return;
    }

    this.playCard(player, card, chosenColor, challenge);
  }

  private reject(player: Player, card: Card, reason: PlayRejection): void {
    this.emit({ type: "play_rejected", player: player.name, card, reason });
  }

  /** Moves `card` from hand to discard and applies its effect. */
  private playCard(
    player: Player,
    card: Card,
    chosenColor: PlayableColor | null,
    challenge: boolean
  ): void {
    const { state } = this;
    const colorBeforePlay = state.activeColor;

    player.remove(card);
    state.deck.discard(card);

    if (isWild(card.rank)) {
      state.activeColor = chosenColor ?? chooseColorAuto(player.hand);
    } else if (isPlayableColor(card.color)) {
      state.activeColor = card.color;
    }
    this.emit({ type: "card_played", player: player.name, card, activeColor: state.activeColor });

    if (player.handSize === 1) {
      this.emit({ type: "last_card", player: player.name });
    }

    switch (card.rank) {
      case "SKIP":
        this.emit({ type: "turn_skipped", player: state.nextPlayer().name });
        state.advanceTurn(2);
        break;
      case "REVERSE": {
        state.reverse();
        // Two seats: reversing hands the turn straight back, i.e. a skip.
        const actsAsSkip = state.players.length === 2;
        this.emit({ type: "direction_reversed", direction: state.direction, actsAsSkip });
        state.advanceTurn(actsAsSkip ? 2 : 1);
        break;
      }
      case "DRAW_TWO":
        this.raisePending(2);
        state.advanceTurn(1);
        break;
      case "WILD_DRAW_FOUR":
        this.resolveWildDrawFour(player, colorBeforePlay, challenge);
        state.advanceTurn(1);
        break;
      default:
        state.advanceTurn(1);
        break;
    }
  }

  private raisePending(amount: number): void {
    this.state.pendingDraw += amount;
    this.emit({ type: "pending_draw_increased", pendingDraw: this.state.pendingDraw });
  }

  /**
   * The next seat may challenge. The play was illegal if `player` still
   * holds a non-wild card of the color that was active before it.
   */
  private resolveWildDrawFour(
    player: Player,
    colorBeforePlay: PlayableColor,
    challengeFlag: boolean
  ): void {
    const challenger = this.state.nextPlayer();
    if (!challenger.alwaysChallenges() && !challengeFlag) {
      this.raisePending(4);
      return;
    }

    const illegal = player.hasNonWildColor(colorBeforePlay);
    const penalized = illegal ? player : challenger;
    const penalty = illegal ? CHALLENGE_PENALTY : FAILED_CHALLENGE_PENALTY;
    this.emit({
      type: "challenge_resolved",
      challenger: challenger.name,
      target: player.name,
      successful: illegal,
      penalized: penalized.name,
      penalty,
    });
    this.drawInto(penalized, penalty, illegal ? "challenge_penalty" : "failed_challenge");
  }

  // ── Bookkeeping ─────────────────────────────────────────────────

  private checkWin(player: Player): void {
    if (this.state.winner === null && player.handSize === 0) {
      this.state.winner = player;
      this.emit({ type: "game_won", winner: player.name, turnNumber: this.state.turnNumber });
    }
  }

  private assertNotOver(): void {
    const { winner } = this.state;
    if (winner !== null) {
      throw new GameOverError(winner.name);
    }
  }

  private emit(body: GameEventBody): void {
    this.seq += 1;
    const event: GameEvent = { ...body, seq: this.seq };
    this.log.push(event);
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
