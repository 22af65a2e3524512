// ─── Deck Presets ──────────────────────────────────────────────────
// Factory for the standard 108-card composition, plus the multiset
// helpers the conservation checks are built on.

import type { Card } from "@no-mercy/schema";
import { ACTION_RANKS, NUMBER_RANKS, PLAYABLE_COLORS } from "@no-mercy/schema";
import { cardKey, createCard } from "../cards/card";

/**
 * Standard 108-card deck, unshuffled.
 * 4 colors × (one 0 + two each of 1–9, Skip, Reverse, Draw Two) + 4 Wild + 4 Wild Draw Four.
 */
export function standardDeck(): readonly Card[] {
  const cards: Card[] = [];

  for (const color of PLAYABLE_COLORS) {
    // One 0 per color
    cards.push(createCard(color, "ZERO"));
    // Two each of 1–9 and action cards
    for (const rank of [...NUMBER_RANKS.slice(1), ...ACTION_RANKS]) {
      cards.push(createCard(color, rank));
      cards.push(createCard(color, rank));
    }
  }

  for (let i = 0; i < 4; i++) {
    cards.push(createCard("WILD", "WILD"));
    cards.push(createCard("WILD", "WILD_DRAW_FOUR"));
  }

  return cards;
}

/** Counts cards by `cardKey`. */
export function countCards(cards: Iterable<Card>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const card of cards) {
    const key = cardKey(card);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

/** Multiset equality of two card collections. */
export function sameCardMultiset(a: Iterable<Card>, b: Iterable<Card>): boolean {
  const left = countCards(a);
  const right = countCards(b);
  if (left.size !== right.size) return false;
  for (const [key, count] of left) {
    if (right.get(key) !== count) return false;
  }
  return true;
}
