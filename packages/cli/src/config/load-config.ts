// ─── Config Loading ────────────────────────────────────────────────
// Turns a .game.json file or command-line flags into a validated
// GameConfig. Everything funnels through the zod parse boundary.

import { readFile } from "node:fs/promises";
import type { GameConfig, SeatConfig } from "@no-mercy/schema";
import { formatIssues, MAX_PLAYERS, MIN_PLAYERS, safeParseGameConfig } from "@no-mercy/schema";

// ─── Error Types ───────────────────────────────────────────────────

/** Error thrown when a game config cannot be read or fails validation. */
export class GameConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = "GameConfigError";
  }
}

// ─── Parsing ───────────────────────────────────────────────────────

/**
 * Validates already-decoded JSON.
 * @param source - Where the value came from, for the error message.
 */
export function parseConfig(raw: unknown, source: string): GameConfig {
  const result = safeParseGameConfig(raw);
  if (!result.success) {
    throw new GameConfigError(`Invalid game config in ${source}`, formatIssues(result.error));
  }
  return result.data;
}

/** Reads, decodes and validates a .game.json file. */
export async function loadConfigFile(path: string): Promise<GameConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new GameConfigError(`Failed to read ${path}: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new GameConfigError(`${path} is not valid JSON: ${message}`);
  }

  return parseConfig(json, path);
}

// ─── Flags ─────────────────────────────────────────────────────────

export interface ConfigFlags {
  readonly config?: string;
  readonly players?: string;
  readonly seed?: string;
  readonly classic: boolean;
  readonly watch: boolean;
}

export const DEFAULT_PLAYER_COUNT = 2;

/** Parses a whole-number flag value; the schema checks the range. */
function integerFlag(name: string, value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new GameConfigError(`--${name} must be an integer, got "${value}"`);
  }
  return Number(trimmed);
}

function playerCount(flags: ConfigFlags): number {
  if (flags.players === undefined) return DEFAULT_PLAYER_COUNT;
  const count = integerFlag("players", flags.players);
  if (count < MIN_PLAYERS || count > MAX_PLAYERS) {
    throw new GameConfigError(`--players must be between ${MIN_PLAYERS} and ${MAX_PLAYERS}, got ${count}`);
  }
  return count;
}

/** Seat list for a flag-built table: "You" first unless watching, then AI-1, AI-2, ... */
export function defaultSeats(count: number, watch: boolean): SeatConfig[] {
  return Array.from({ length: count }, (_, i): SeatConfig => {
    if (i === 0 && !watch) return { name: "You", policy: "human" };
    return { name: `AI-${watch ? i + 1 : i}`, policy: "aggressive" };
  });
}

/**
 * Resolves the table to play. A config file is the base when given;
 * otherwise seats are built from `--players`. `--seed`, `--classic` and
 * `--watch` override either source.
 */
export async function resolveConfig(flags: ConfigFlags): Promise<GameConfig> {
  if (flags.config !== undefined && flags.players !== undefined) {
    throw new GameConfigError("--players cannot be combined with --config");
  }

  const base =
    flags.config !== undefined
      ? await loadConfigFile(flags.config)
      : parseConfig({ players: defaultSeats(playerCount(flags), flags.watch) }, "command-line flags");

  return parseConfig(
    {
      players: flags.watch
        ? base.players.map((seat) => ({ ...seat, policy: "aggressive" }))
        : base.players,
      noMercy: flags.classic ? false : base.noMercy,
      handSize: base.handSize,
      seed: flags.seed !== undefined ? integerFlag("seed", flags.seed) : base.seed,
    },
    "command-line flags"
  );
}
