// ─── Card & Rules Model ────────────────────────────────────────────
// Card construction, rank-family predicates and the matching rule.
// Everything here is pure; no function touches game state.

import type {
  ActionRank,
  Card,
  Color,
  NumberRank,
  PlayableColor,
  Rank,
  WildRank,
} from "@no-mercy/schema";
import { ACTION_RANKS, NUMBER_RANKS, WILD_RANKS } from "@no-mercy/schema";

// ─── Rank Families ─────────────────────────────────────────────────

const NUMBER_SET: ReadonlySet<Rank> = new Set<Rank>(NUMBER_RANKS);
const ACTION_SET: ReadonlySet<Rank> = new Set<Rank>(ACTION_RANKS);
const WILD_SET: ReadonlySet<Rank> = new Set<Rank>(WILD_RANKS);

export function isNumber(rank: Rank): rank is NumberRank {
  return NUMBER_SET.has(rank);
}

export function isAction(rank: Rank): rank is ActionRank {
  return ACTION_SET.has(rank);
}

export function isWild(rank: Rank): rank is WildRank {
  return WILD_SET.has(rank);
}

/** DRAW_TWO and WILD_DRAW_FOUR: the only ranks that may answer a pending draw. */
export function isDrawCard(rank: Rank): boolean {
  return rank === "DRAW_TWO" || rank === "WILD_DRAW_FOUR";
}

export function isPlayableColor(color: Color): color is PlayableColor {
  return color !== "WILD";
}

// ─── Construction & Equality ───────────────────────────────────────

/** Creates a frozen card. */
export function createCard(color: Color, rank: Rank): Card {
  return Object.freeze({ color, rank });
}

export function sameCard(a: Card, b: Card): boolean {
  return a.color === b.color && a.rank === b.rank;
}

/** Stable key for multiset comparisons, e.g. `"RED:SKIP"`. */
export function cardKey(card: Card): string {
  return `${card.color}:${card.rank}`;
}

/** Display label. Wilds show only their rank. */
export function formatCard(card: Card): string {
  if (isWild(card.rank)) {
    return card.rank;
  }
  return `${card.color} ${card.rank}`;
}

// ─── Matching ──────────────────────────────────────────────────────

/**
 * Whether `candidate` may be played on `top` while `activeColor` is in
 * effect. Wilds always match; on a wild top the active color stands in
 * for the top card's color.
 */
export function matches(
  candidate: Card,
  top: Card,
  activeColor: PlayableColor
): boolean {
  if (isWild(candidate.rank)) {
    return true;
  }
  if (isWild(top.rank)) {
    return candidate.color === activeColor || candidate.rank === top.rank;
  }
  return candidate.color === top.color || candidate.rank === top.rank;
}
