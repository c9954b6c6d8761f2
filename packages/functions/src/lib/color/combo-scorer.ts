import type { ColorComboEvaluation, ColorName, ColorTone, RGB } from "outfit-harmony-shared";
import { classifyColorType } from "./classifier";
import { colorDistance } from "./metrics";
import { hasComplementaryClash } from "./palette";

const MAX_MAIN_COLORS = 3;
const LOW_CONTRAST = 50;
const SOFT_CONTRAST = 100;
const HARSH_CONTRAST = 400;

/**
 * Score how well a set of colors works together, 0-100.
 *
 * Starts from 100 and applies every deduction that holds (they stack):
 * more than three colors, warm and cold without a neutral, pairs that are
 * too close or too far apart, and complementary families without a
 * neutral buffer.
 */
export function evaluateColorCombo(colors: RGB[]): ColorComboEvaluation {
  if (colors.length === 0) {
    return {
      score: 0,
      suggestions: ["Provide at least one color to evaluate."],
      analysis: null,
    };
  }

  if (colors.length === 1) {
    const only = classifyColorType(colors[0]);
    return {
      score: 100,
      suggestions: ["Single-color outfit: minimalist and elegant."],
      analysis: {
        colorCount: 1,
        colorTypes: [only.name],
        tones: [only.tone],
        contrastScores: [],
      },
    };
  }

  let score = 100;
  const suggestions: string[] = [];

  if (colors.length > MAX_MAIN_COLORS) {
    score -= 20;
    suggestions.push(
      `Keep the outfit to at most ${MAX_MAIN_COLORS} main colors; it currently has ${colors.length}.`
    );
  } else if (colors.length === MAX_MAIN_COLORS) {
    suggestions.push("Follows the three-color guideline.");
  }

  const colorTypes: ColorName[] = [];
  const tones: ColorTone[] = [];
  for (const color of colors) {
    const { name, tone } = classifyColorType(color);
    colorTypes.push(name);
    tones.push(tone);
  }

  const warmCount = tones.filter((tone) => tone === "warm").length;
  const coldCount = tones.filter((tone) => tone === "cold").length;
  const neutralCount = tones.filter((tone) => tone === "neutral").length;

  if (warmCount > 0 && coldCount > 0) {
    if (neutralCount === 0) {
      score -= 15;
      suggestions.push("Mixing warm and cold colors works better with a neutral (black, white or gray) between them.");
    } else {
      suggestions.push("The neutral color bridges the warm and cold tones well.");
    }
  }

  const contrastScores: number[] = [];
  let minContrast = Number.POSITIVE_INFINITY;
  let maxContrast = 0;
  for (let i = 0; i < colors.length; i++) {
    for (let j = i + 1; j < colors.length; j++) {
      const contrast = colorDistance(colors[i], colors[j]);
      contrastScores.push(contrast);
      minContrast = Math.min(minContrast, contrast);
      maxContrast = Math.max(maxContrast, contrast);
    }
  }

  if (minContrast < LOW_CONTRAST) {
    score -= 20;
    suggestions.push("Some colors are too similar and the outfit lacks depth; add more contrast.");
  } else if (minContrast < SOFT_CONTRAST) {
    score -= 10;
    suggestions.push("Some colors are low in contrast; consider a little more separation.");
  }

  if (maxContrast > HARSH_CONTRAST) {
    score -= 10;
    suggestions.push("Some colors contrast very strongly and may look jarring; soften one of them.");
  }

  const complementary = hasComplementaryClash(colorTypes);
  if (complementary && neutralCount === 0) {
    score -= 15;
    suggestions.push("Complementary colors detected; add a neutral (black, white or gray) to balance them.");
  } else if (complementary) {
    suggestions.push("The neutral color balances the complementary pair well.");
  }

  if (neutralCount === colors.length) {
    suggestions.push("All-neutral palette: classic and safe.");
  } else if (neutralCount > 0) {
    suggestions.push("Neutrals paired with color: balanced and elegant.");
  }

  score = Math.max(0, Math.min(100, score));

  if (score >= 80 && suggestions.length === 0) {
    suggestions.push("The colors work well together.");
  }

  return {
    score: Math.round(score * 10) / 10,
    suggestions,
    analysis: {
      colorCount: colors.length,
      colorTypes,
      tones,
      contrastScores,
    },
  };
}
