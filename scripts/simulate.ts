#!/usr/bin/env tsx
// ─── Simulate ──────────────────────────────────────────────────────
// Plays a batch of seeded AI-only games and reports how the seats fare.
// Usage: tsx scripts/simulate.ts [--games N] [--players N] [--seed N] [--classic]

import { parseArgs } from "node:util";
import { AggressivePolicy, createGame, createRng } from "../packages/engine/src/index";

/** Games still running after this many turns are counted as cut off. */
const TURN_LIMIT = 5_000;

interface Tally {
  readonly wins: number[];
  cutOff: number;
  totalTurns: number;
}

function positiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 1) {
    console.error(`--${name} must be a positive integer, got "${value}"`);
    process.exit(1);
  }
  return n;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      games: { type: "string" },
      players: { type: "string" },
      seed: { type: "string" },
      classic: { type: "boolean", default: false },
    },
  });

  const games = positiveInt("games", values.games, 100);
  const players = positiveInt("players", values.players, 4);
  const seed = positiveInt("seed", values.seed, 1);
  if (players < 2 || players > 10) {
    console.error(`--players must be between 2 and 10, got ${players}`);
    process.exit(1);
  }

  const names = Array.from({ length: players }, (_, i) => `AI-${i + 1}`);
  const seeds = createRng(seed);
  const tally: Tally = { wins: names.map(() => 0), cutOff: 0, totalTurns: 0 };

  console.log(`\nSimulating ${games} game(s) with ${players} aggressive seats (seed ${seed})...\n`);

  for (let g = 0; g < games; g++) {
    const engine = createGame({
      seats: names.map((name) => ({ name, policy: new AggressivePolicy() })),
      seed: seeds.nextInt(0, 2 ** 31),
      noMercy: values.classic !== true,
    });

    const winner = await engine.run({ maxTurns: TURN_LIMIT });
    tally.totalTurns += engine.state.turnNumber;
    if (winner === null) {
      tally.cutOff++;
    } else {
      const seat = names.indexOf(winner.name);
      tally.wins[seat] = (tally.wins[seat] ?? 0) + 1;
    }
  }

  names.forEach((name, i) => {
    const wins = tally.wins[i] ?? 0;
    const share = ((wins / games) * 100).toFixed(1);
    console.log(`  ${name.padEnd(6)} ${String(wins).padStart(5)} wins  (${share}%)`);
  });
  console.log();
  console.log(`Average turns per game: ${(tally.totalTurns / games).toFixed(1)}`);
  console.log(`Cut off at ${TURN_LIMIT} turns: ${tally.cutOff}`);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
