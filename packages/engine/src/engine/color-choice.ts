// ─── Automated Color Choice ────────────────────────────────────────

import type { Card, PlayableColor } from "@no-mercy/schema";
import { PLAYABLE_COLORS } from "@no-mercy/schema";

/**
 * The playable color held most often in `hand`. Ties go to the color
 * listed first in RED, YELLOW, GREEN, BLUE; wild cards count for none.
 */
export function chooseColorAuto(hand: readonly Card[]): PlayableColor {
  let best: PlayableColor = "RED";
  let bestCount = -1;
  for (const color of PLAYABLE_COLORS) {
    const count = hand.filter((c) => c.color === color).length;
    if (count > bestCount) {
      best = color;
      bestCount = count;
    }
  }
  return best;
}
