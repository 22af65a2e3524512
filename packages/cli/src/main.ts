// ─── no-mercy ──────────────────────────────────────────────────────
// Console entry point: resolves the table from flags or a config file,
// seats humans and AIs, and narrates the game until someone wins.

import { parseArgs } from "node:util";
import { createGame } from "@no-mercy/engine";
import { GameConfigError, resolveConfig } from "./config/load-config";
import { ConsolePresenter } from "./console/presenter";
import { InputClosedError, ReadlinePrompter } from "./console/prompter";
import { createSeats, hasHumanSeat } from "./seats";

/** Turn limit for games without a human seat. */
const WATCH_TURN_LIMIT = 10_000;

const USAGE = `Usage: no-mercy [options]

  --config <file>   Load the table from a .game.json file
  --players <n>     Number of seats, 2-10 (default 2; not with --config)
  --seed <n>        Shuffle seed, for a reproducible game
  --classic         Turn the no-mercy auto-play rule off
  --watch           Seat only AI players
  --verbose         Also report deck reshuffles
  -h, --help        Show this message`;

/** node:util parseArgs rejects unknown flags with a coded TypeError. */
function isParseArgsError(err: unknown): err is TypeError {
  return (
    err instanceof TypeError &&
    "code" in err &&
    typeof err.code === "string" &&
    err.code.startsWith("ERR_PARSE_ARGS")
  );
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: "string" },
      players: { type: "string" },
      seed: { type: "string" },
      classic: { type: "boolean", default: false },
      watch: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help === true) {
    console.log(USAGE);
    return;
  }

  const config = await resolveConfig({
    config: values.config,
    players: values.players,
    seed: values.seed,
    classic: values.classic === true,
    watch: values.watch === true,
  });
  const seed = config.seed ?? Date.now();
  console.log(`Seed: ${seed}`);

  const prompter = new ReadlinePrompter();
  const presenter = new ConsolePresenter({ verbose: values.verbose === true });
  const engine = createGame({
    seats: createSeats(config, prompter),
    seed,
    noMercy: config.noMercy,
    handSize: config.handSize,
    listeners: [presenter.listener],
  });

  try {
    const winner = await engine.run({
      maxTurns: hasHumanSeat(config) ? undefined : WATCH_TURN_LIMIT,
    });
    if (winner === null) {
      console.log(`No winner after ${engine.state.turnNumber} turns.`);
    }
  } finally {
    prompter.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof GameConfigError) {
    console.error(err.message);
    for (const issue of err.issues) {
      console.error(`  ${issue}`);
    }
  } else if (err instanceof InputClosedError) {
    console.error("\nInput closed; leaving the game.");
  } else if (isParseArgsError(err)) {
    console.error(err.message);
    console.error(USAGE);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
