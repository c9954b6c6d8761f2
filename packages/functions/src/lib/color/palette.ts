import type { ColorName, ColorTone, OutfitColor, RGB } from "outfit-harmony-shared";

export const COLOR_TONES: Readonly<Record<ColorName, ColorTone>> = {
  red: "warm",
  "deep-red": "warm",
  pink: "warm",
  orange: "warm",
  yellow: "warm",
  "pale-yellow": "warm",
  brown: "warm",
  green: "cold",
  "deep-green": "cold",
  "pale-green": "cold",
  blue: "cold",
  "deep-blue": "cold",
  "pale-blue": "cold",
  purple: "cold",
  "deep-purple": "cold",
  "pale-purple": "cold",
  black: "neutral",
  white: "neutral",
  gray: "neutral",
};

export const NEUTRAL_COLOR_NAMES: ReadonlySet<string> = new Set(["black", "white", "gray"]);

/**
 * Color families that sit opposite each other on a simplified color wheel.
 * Seeing one from each side of a pair without a neutral between them reads
 * as a clash.
 */
export const COMPLEMENTARY_FAMILY_PAIRS: ReadonlyArray<
  readonly [ReadonlySet<string>, ReadonlySet<string>]
> = [
  [new Set(["red", "deep-red", "pink"]), new Set(["green", "deep-green", "pale-green"])],
  [new Set(["blue", "deep-blue", "pale-blue"]), new Set(["orange", "yellow", "pale-yellow"])],
  [new Set(["yellow", "pale-yellow"]), new Set(["purple", "deep-purple", "pale-purple"])],
];

/** Approximate luminance used when only a color's name is known. */
export const NAMED_COLOR_BRIGHTNESS: Readonly<Record<ColorName, number>> = {
  black: 0,
  "deep-blue": 50,
  "deep-green": 50,
  "deep-red": 50,
  "deep-purple": 50,
  gray: 128,
  brown: 100,
  blue: 150,
  green: 150,
  red: 150,
  purple: 150,
  "pale-blue": 200,
  "pale-green": 200,
  pink: 220,
  "pale-purple": 200,
  white: 255,
  "pale-yellow": 240,
  yellow: 220,
  orange: 200,
};

export const UNKNOWN_NAME_BRIGHTNESS = 128;

export function isColorName(value: string): value is ColorName {
  return Object.prototype.hasOwnProperty.call(COLOR_TONES, value);
}

export function isRgb(value: unknown): value is RGB {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    value.every((channel) => Number.isInteger(channel) && channel >= 0 && channel <= 255)
  );
}

/** Parses "#1A2B3C" or "1a2b3c"; anything else yields null. */
export function parseHexColor(value: string): RGB | null {
  const match = value.trim().match(/^#?([0-9a-fA-F]{6})$/);
  if (!match) {
    return null;
  }
  const hex = match[1];
  return [
    Number.parseInt(hex.substring(0, 2), 16),
    Number.parseInt(hex.substring(2, 4), 16),
    Number.parseInt(hex.substring(4, 6), 16),
  ];
}

/**
 * Normalizes an outfit color to RGB when it carries one, either directly or
 * as a hex string. Plain names return null.
 */
export function outfitColorToRgb(color: OutfitColor): RGB | null {
  if (typeof color === "string") {
    return parseHexColor(color);
  }
  return color;
}

export function hasComplementaryClash(names: Iterable<string>): boolean {
  return findComplementaryClashes(names).length > 0;
}

export function findComplementaryClashes(
  names: Iterable<string>
): Array<readonly [ReadonlySet<string>, ReadonlySet<string>]> {
  const present = new Set(names);
  const overlaps = (family: ReadonlySet<string>) => [...family].some((name) => present.has(name));
  return COMPLEMENTARY_FAMILY_PAIRS.filter(([left, right]) => overlaps(left) && overlaps(right));
}
