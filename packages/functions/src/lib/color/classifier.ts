import type { ColorClassification, ColorTone, OutfitColor, RGB } from "outfit-harmony-shared";
import { COLOR_TONES, isColorName, outfitColorToRgb } from "./palette";

const NEUTRAL_SPREAD = 30;
const BLACK_BELOW = 30;
const WHITE_ABOVE = 225;

/** Perceptual luminance, 0-255 */
export function colorBrightness([r, g, b]: RGB): number {
  return 0.299 * r + 0.587 * g + 0.114 * b;
}

/**
 * Map an RGB value onto the fixed name/tone palette.
 *
 * Predicates are checked in a fixed order and the first match wins. Several
 * of them overlap (brown vs orange vs red for dark warm colors, for
 * instance), so the order is part of the contract.
 */
export function classifyColorType(rgb: RGB): ColorClassification {
  const [r, g, b] = rgb;
  const brightness = colorBrightness(rgb);
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);

  if (max - min < NEUTRAL_SPREAD) {
    if (brightness < BLACK_BELOW) return { name: "black", tone: "neutral" };
    if (brightness > WHITE_ABOVE) return { name: "white", tone: "neutral" };
    return { name: "gray", tone: "neutral" };
  }

  const total = r + g + b;
  if (total === 0) {
    return { name: "black", tone: "neutral" };
  }

  const rRatio = r / total;
  const gRatio = g / total;
  const bRatio = b / total;

  // Dark orange-red reads as brown; must run before the yellow and red checks.
  if (brightness < 150 && r > 50 && g > 30 && b < Math.min(r, g) * 0.7 && r > b && g > b) {
    return { name: "brown", tone: "warm" };
  }

  if (rRatio > 0.35 && gRatio > 0.3 && r > b && g > b) {
    if (r > g * 1.15 && g > 100) return { name: "orange", tone: "warm" };
    if (brightness > 200) return { name: "pale-yellow", tone: "warm" };
    return { name: "yellow", tone: "warm" };
  }

  if (rRatio > 0.4 && r > g && r > b) {
    if (brightness > 200) return { name: "pink", tone: "warm" };
    if (brightness < 80) return { name: "deep-red", tone: "warm" };
    return { name: "red", tone: "warm" };
  }

  if (gRatio > 0.35 && g > r && g > b) {
    if (brightness > 200) return { name: "pale-green", tone: "cold" };
    if (brightness < 100) return { name: "deep-green", tone: "cold" };
    return { name: "green", tone: "cold" };
  }

  if (bRatio > 0.4 && b > r && b > g) {
    if (brightness > 200) return { name: "pale-blue", tone: "cold" };
    if (brightness < 100) return { name: "deep-blue", tone: "cold" };
    return { name: "blue", tone: "cold" };
  }

  if (rRatio > 0.3 && bRatio > 0.3 && r > g && b > g) {
    if (brightness > 200) return { name: "pale-purple", tone: "cold" };
    if (brightness < 100) return { name: "deep-purple", tone: "cold" };
    return { name: "purple", tone: "cold" };
  }

  if (max === r) return { name: "red", tone: "warm" };
  if (max === g) return { name: "green", tone: "cold" };
  return { name: "blue", tone: "cold" };
}

/**
 * Palette name for any outfit color. RGB triples and hex strings are
 * classified; other strings are lowercased and trimmed, and unknown names
 * pass through as-is so rules can still count them.
 */
export function resolveColorName(color: OutfitColor): string {
  const rgb = outfitColorToRgb(color);
  if (rgb) {
    return classifyColorType(rgb).name;
  }
  return typeof color === "string" ? color.trim().toLowerCase() : "";
}

export function toneOfColorName(name: string): ColorTone | null {
  return isColorName(name) ? COLOR_TONES[name] : null;
}
