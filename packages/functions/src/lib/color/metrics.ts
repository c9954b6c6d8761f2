import type { RGB } from "outfit-harmony-shared";

/** Largest possible distance, between black and white */
export const MAX_COLOR_DISTANCE = Math.sqrt(3 * 255 * 255);

/** Euclidean distance in RGB space; a rough proxy for contrast. */
export function colorDistance([r1, g1, b1]: RGB, [r2, g2, b2]: RGB): number {
  return Math.sqrt((r1 - r2) ** 2 + (g1 - g2) ** 2 + (b1 - b2) ** 2);
}
