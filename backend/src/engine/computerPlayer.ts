import { COLORS, defaultRng, isWild, legalIndices, type Card, type Color, type Rng } from './cards';

export type ComputerAction =
  | { type: 'PLAY'; index: number }
  | { type: 'DRAW' };

/** Any legal card, picked uniformly; draws when nothing fits. */
export function chooseComputerAction(hand: Card[], top: Card | undefined, rng: Rng = defaultRng): ComputerAction {
  const choices = legalIndices(hand, top);
  if (choices.length === 0) return { type: 'DRAW' };
  return { type: 'PLAY', index: choices[Math.floor(rng() * choices.length)] };
}

/**
 * Color for a wild the computer just played: the color it holds most of
 * (first one seen wins a tie). Unplayed wilds don't count. Random when the
 * hand has no colored card left.
 */
export function chooseWildColor(hand: Card[], rng: Rng = defaultRng): Color {
  const counts = new Map<Color, number>();
  for (const card of hand) {
    const color = card.color;
    if (isWild(card) || color === 'ALL') continue;
    counts.set(color, (counts.get(color) ?? 0) + 1);
  }

  let best: Color | null = null;
  let bestCount = 0;
  for (const [color, n] of counts) {
    if (n > bestCount) {
      best = color;
      bestCount = n;
    }
  }
  return best ?? COLORS[Math.floor(rng() * COLORS.length)];
}

/** Whole number of "thinking" units in [min, max]. */
export function thinkingUnits(rng: Rng = defaultRng, min = 1, max = 4): number {
  return min + Math.floor(rng() * (max - min + 1));
}
