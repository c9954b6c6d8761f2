import type { GarmentSlot, OutfitStyles } from "outfit-harmony-shared";
import { DEFAULT_STYLE_CATEGORIES, styleCategoryOf, type StyleCategoryMap } from "../garments";
import { StyleRule, type RuleOptions, type RuleVerdict } from "./base-rule";

const SLOTS: readonly GarmentSlot[] = ["top", "bottom", "shoes"];

export interface StyleCoordinationRuleOptions extends RuleOptions {
  categories?: StyleCategoryMap;
}

/** Top, bottom and shoes should come from the same style category. */
export class StyleCoordinationRule extends StyleRule {
  readonly categories: StyleCategoryMap;

  constructor(options: StyleCoordinationRuleOptions = {}) {
    super("style-coordination", "Top, bottom and shoes should share one style", {
      ...options,
      weight: options.weight ?? 1.5,
    });
    this.categories = options.categories ?? DEFAULT_STYLE_CATEGORIES;
  }

  protected evaluateStyles(styles: OutfitStyles): RuleVerdict {
    const categories = new Set(
      SLOTS.map((slot) => styleCategoryOf(styles[slot], this.categories)).filter(
        (category) => category !== "unknown"
      )
    );

    if (categories.size === 0) {
      return { passed: true, score: 100, message: "Unable to determine the outfit's style", severity: "info" };
    }

    if (categories.size === 1) {
      return { passed: true, score: 100, message: "Styles are consistent", severity: "info" };
    }

    if (categories.size === 2) {
      return {
        passed: true,
        score: 70,
        message: "Styles are partly mixed but still acceptable",
        suggestion: "Settle on a single style for a more cohesive look.",
        severity: "warning",
      };
    }

    return {
      passed: false,
      score: 40,
      message: `Styles clash across ${categories.size} categories (${[...categories].join(", ")})`,
      suggestion: "Pair formal pieces with formal pieces and casual with casual.",
      severity: "error",
    };
  }
}
