// ─── Schema Validation ─────────────────────────────────────────────
// Zod schemas for runtime validation of .game.json files.
// This is the "parse boundary" — raw JSON enters, typed data exits.

import { z } from "zod";
import type { GameConfig } from "../types/config";

/** Cards in the standard deck. */
export const DECK_SIZE = 108;

export const MIN_PLAYERS = 2;
export const MAX_PLAYERS = 10;
export const MAX_HAND_SIZE = 15;
export const DEFAULT_HAND_SIZE = 7;

// ─── Sections ──────────────────────────────────────────────────────

const SeatSchema = z.object({
  name: z.string().trim().min(1),
  policy: z.enum(["human", "aggressive"]),
});

// ─── Complete Config Schema ────────────────────────────────────────

export const GameConfigSchema = z
  .object({
    players: z.array(SeatSchema).min(MIN_PLAYERS).max(MAX_PLAYERS),
    noMercy: z.boolean().default(true),
    handSize: z.number().int().min(1).max(MAX_HAND_SIZE).default(DEFAULT_HAND_SIZE),
    seed: z.number().int().refine(Number.isSafeInteger, { message: "seed must be a safe integer" }).optional(),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.players.forEach((seat, index) => {
      if (seen.has(seat.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["players", index, "name"],
          message: `Duplicate player name: "${seat.name}"`,
        });
      }
      seen.add(seat.name);
    });

    // At least one card must remain to open the discard pile.
    if (config.players.length * config.handSize >= DECK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["handSize"],
        message: `players × handSize must be below ${DECK_SIZE}`,
      });
    }
  });

/** Inferred type from the Zod schema — should match GameConfig. */
export type ParsedGameConfig = z.infer<typeof GameConfigSchema>;

/**
 * Parses raw JSON into a validated GameConfig.
 * Returns the parsed data or throws a ZodError with detailed issues.
 */
export function parseGameConfig(raw: unknown): GameConfig {
  return GameConfigSchema.parse(raw);
}

/**
 * Safe parse variant — returns a discriminated result instead of throwing.
 */
export function safeParseGameConfig(
  raw: unknown
): z.SafeParseReturnType<unknown, ParsedGameConfig> {
  return GameConfigSchema.safeParse(raw);
}

/** One `path: message` line per issue, for console reporting. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return `${path || "(root)"}: ${issue.message}`;
  });
}
