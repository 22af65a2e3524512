// ─── Console Presenter ─────────────────────────────────────────────
// Subscribes to an engine's events and narrates them on stdout.
// Reshuffles go to console.debug and only appear with --verbose.

import type { GameEvent } from "@no-mercy/schema";
import { formatEvent, formatOpponents } from "./event-formatter";

export interface PresenterOptions {
  readonly verbose?: boolean;
}

export class ConsolePresenter {
  private readonly verbose: boolean;

  constructor(options: PresenterOptions = {}) {
    this.verbose = options.verbose ?? false;
  }

  /** Bound listener, suitable for `onEvent` or `GameSetup.listeners`. */
  readonly listener = (event: GameEvent): void => {
    this.handle(event);
  };

  handle(event: GameEvent): void {
    if (event.type === "deck_reshuffled") {
      if (this.verbose) {
        console.debug(`Reshuffled ${event.recycled} discards into the draw pile`);
      }
      return;
    }

    const line = formatEvent(event);
    if (line !== null) {
      console.log(line);
    }

    if (event.type === "turn_started") {
      console.log(`Cards held: ${formatOpponents(event.hands, event.player)}`);
    }
  }
}
