import type { OutfitColor, OutfitRecord } from "outfit-harmony-shared";
import { colorBrightness, resolveColorName } from "../color/classifier";
import {
  findComplementaryClashes,
  isColorName,
  NAMED_COLOR_BRIGHTNESS,
  NEUTRAL_COLOR_NAMES,
  outfitColorToRgb,
  UNKNOWN_NAME_BRIGHTNESS,
} from "../color/palette";
import { ColorRule, type RuleOptions, type RuleVerdict } from "./base-rule";

export interface ThreeColorRuleOptions extends RuleOptions {
  maxColors?: number;
}

/** At most `maxColors` distinct non-neutral colors across the outfit. */
export class ThreeColorRule extends ColorRule {
  readonly maxColors: number;

  constructor(options: ThreeColorRuleOptions = {}) {
    const maxColors = options.maxColors ?? 3;
    super("three-color", `Keep the outfit to at most ${maxColors} main colors`, {
      ...options,
      weight: options.weight ?? 1.5,
    });
    this.maxColors = maxColors;
  }

  protected evaluateColors(colors: OutfitColor[]): RuleVerdict {
    const mainColors = new Set<string>();
    for (const color of colors) {
      const name = resolveColorName(color);
      if (!NEUTRAL_COLOR_NAMES.has(name)) {
        mainColors.add(name);
      }
    }

    const count = mainColors.size;
    if (count <= this.maxColors) {
      return {
        passed: true,
        score: 100,
        message: `Within the ${this.maxColors}-color guideline with ${count} main color${count === 1 ? "" : "s"}`,
        severity: "info",
      };
    }

    return {
      passed: false,
      score: Math.max(0, 100 - (count - this.maxColors) * 20),
      message: `Outfit has ${count} main colors; at most ${this.maxColors} is recommended`,
      suggestion: `Keep ${this.maxColors} main colors and switch the rest to neutrals (black, white or gray).`,
      severity: "warning",
    };
  }
}

function brightnessOf(color: OutfitColor): number {
  const rgb = outfitColorToRgb(color);
  if (rgb) {
    return colorBrightness(rgb);
  }
  const name = typeof color === "string" ? color.trim().toLowerCase() : "";
  return isColorName(name) ? NAMED_COLOR_BRIGHTNESS[name] : UNKNOWN_NAME_BRIGHTNESS;
}

function averageBrightness(colors: OutfitColor[]): number {
  return colors.reduce((sum, color) => sum + brightnessOf(color), 0) / colors.length;
}

/** The top should be at least as light as the bottom. */
export class LightTopDarkBottomRule extends ColorRule {
  constructor(options: RuleOptions = {}) {
    super("light-top-dark-bottom", "Tops should be lighter than bottoms", {
      ...options,
      weight: options.weight ?? 1.2,
    });
  }

  protected evaluateColors(_colors: OutfitColor[], outfit: OutfitRecord): RuleVerdict {
    const { topColors, bottomColors } = outfit;
    if (topColors.length === 0 || bottomColors.length === 0) {
      return this.skipped("Top or bottom colors missing; check skipped");
    }

    const top = averageBrightness(topColors);
    const bottom = averageBrightness(bottomColors);

    if (top >= bottom) {
      return { passed: true, score: 100, message: "Top is lighter than the bottom", severity: "info" };
    }

    return {
      passed: false,
      score: Math.max(0, 100 - (bottom - top) / 2),
      message: `Top is darker than the bottom (top brightness ${top.toFixed(1)}, bottom brightness ${bottom.toFixed(1)})`,
      suggestion: "Choose a lighter top or a darker bottom.",
      severity: "warning",
    };
  }
}

/** Complementary color families should not meet without a buffer. */
export class ForbiddenColorComboRule extends ColorRule {
  constructor(options: RuleOptions = {}) {
    super(
      "forbidden-color-combo",
      "Avoid pairing complementary colors directly (red with green, purple with yellow)",
      { ...options, weight: options.weight ?? 1.8 }
    );
  }

  protected evaluateColors(colors: OutfitColor[]): RuleVerdict {
    const clashes = findComplementaryClashes(colors.map(resolveColorName));

    if (clashes.length === 0) {
      return { passed: true, score: 100, message: "No clashing color combinations", severity: "info" };
    }

    const described = clashes
      .map(([left, right]) => `${[...left].join("/")} with ${[...right].join("/")}`)
      .join("; ");
    return {
      passed: false,
      score: 50,
      message: `Clashing color combinations: ${described}`,
      suggestion: "Avoid putting complementary colors side by side; use a neutral (black, white or gray) between them.",
      severity: "error",
    };
  }
}
