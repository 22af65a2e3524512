// ─── Move Constructors ─────────────────────────────────────────────

import type { Card, Move, PlayableColor } from "@no-mercy/schema";

export function playMove(
  card: Card,
  chosenColor: PlayableColor | null = null,
  challenge = false
): Move {
  return { kind: "play", card, chosenColor, challenge };
}

export function drawMove(): Move {
  return { kind: "draw" };
}

export function invalidMove(reason: string): Move {
  return { kind: "invalid", reason };
}
