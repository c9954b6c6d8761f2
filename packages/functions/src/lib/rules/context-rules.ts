import type { GarmentSlot, OutfitContext, OutfitRecord, StyleCategory } from "outfit-harmony-shared";
import { DEFAULT_STYLE_CATEGORIES, styleCategoryOf } from "../garments";
import { ContextRule, type RuleOptions, type RuleVerdict } from "./base-rule";

/** Style categories that suit each usage context */
export const CONTEXT_STYLE_CATEGORIES: Readonly<Record<string, ReadonlySet<StyleCategory>>> = {
  "formal occasion": new Set<StyleCategory>(["formal"]),
  business: new Set<StyleCategory>(["formal"]),
  work: new Set<StyleCategory>(["formal", "casual"]),
  casual: new Set<StyleCategory>(["casual"]),
  sport: new Set<StyleCategory>(["casual"]),
  party: new Set<StyleCategory>(["casual", "formal"]),
};

const SLOTS: readonly GarmentSlot[] = ["top", "bottom", "shoes"];

export function normalizeContextType(type: unknown): string {
  return typeof type === "string" ? type.trim().toLowerCase() : "";
}

/** The outfit's style should suit the occasion it is worn to. */
export class ContextAppropriateRule extends ContextRule {
  constructor(options: RuleOptions = {}) {
    super("context-appropriate", "Dress in a style that suits the occasion", {
      ...options,
      weight: options.weight ?? 1.3,
    });
  }

  protected evaluateContext(context: OutfitContext, outfit: OutfitRecord): RuleVerdict {
    const contextType = normalizeContextType(context.type);
    if (!contextType) {
      return this.skipped("No context type given");
    }

    const recommended = Object.prototype.hasOwnProperty.call(CONTEXT_STYLE_CATEGORIES, contextType)
      ? CONTEXT_STYLE_CATEGORIES[contextType]
      : undefined;
    if (!recommended) {
      return this.skipped(`No particular style expected for "${contextType}"`);
    }

    const worn = new Set(
      SLOTS.map((slot) => styleCategoryOf(outfit.styles[slot], DEFAULT_STYLE_CATEGORIES))
    );
    const suits = [...recommended].some((category) => worn.has(category));

    if (suits) {
      return { passed: true, score: 100, message: `Style suits the "${contextType}" context`, severity: "info" };
    }

    if (recommended.has("formal")) {
      return {
        passed: false,
        score: 60,
        message: `"${contextType}" calls for formal wear; the outfit is too casual`,
        suggestion: "Choose formal pieces such as a shirt, a jacket or leather shoes.",
        severity: "warning",
      };
    }

    return {
      passed: false,
      score: 60,
      message: `"${contextType}" calls for casual wear; the outfit is too formal`,
      suggestion: "Choose casual pieces such as a t-shirt, jeans or sneakers.",
      severity: "warning",
    };
  }
}
