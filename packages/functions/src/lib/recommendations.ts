import type { ContextRecommendation } from "outfit-harmony-shared";
import { normalizeContextType } from "./rules/context-rules";

const FALLBACK_CONTEXT = "casual";

type RecommendationEntry = Omit<ContextRecommendation, "context">;

const RECOMMENDATIONS: Readonly<Record<string, RecommendationEntry>> = {
  "formal occasion": {
    colorSuggestions: ["black", "white", "gray", "deep-blue"],
    styleSuggestions: { top: "shirt", bottom: "casual-pants", shoes: "leather-shoes" },
    tips: [
      "Stay with classic black, white and gray.",
      "Keep to formal pieces and avoid busy patterns.",
      "Leather shoes are the safest choice.",
      "Aim for a clean, understated silhouette.",
    ],
  },
  business: {
    colorSuggestions: ["deep-blue", "gray", "white", "black"],
    styleSuggestions: { top: "shirt", bottom: "casual-pants", shoes: "leather-shoes" },
    tips: [
      "Favor a composed, steady look.",
      "Darker colors read as more professional.",
      "Keep everything neat and pressed.",
      "Avoid very bright colors.",
    ],
  },
  work: {
    colorSuggestions: ["white", "blue", "gray", "black"],
    styleSuggestions: { top: "shirt", bottom: "casual-pants", shoes: "leather-shoes" },
    tips: [
      "Look professional without losing energy.",
      "A brighter accent color is fine.",
      "Comfort matters over a long day.",
      "Pick breathable fabrics.",
    ],
  },
  casual: {
    colorSuggestions: ["white", "blue", "gray", "black", "brown"],
    styleSuggestions: { top: "t-shirt", bottom: "jeans", shoes: "sneakers" },
    tips: [
      "Casual settings leave more freedom.",
      "Choose comfortable pieces.",
      "A richer palette works here.",
      "Just keep the pieces coordinated.",
    ],
  },
  sport: {
    colorSuggestions: ["black", "white", "gray", "blue", "red"],
    styleSuggestions: { top: "t-shirt", bottom: "casual-pants", shoes: "sneakers" },
    tips: [
      "Comfort comes first.",
      "Pick breathable materials.",
      "Brighter colors are welcome.",
      "Sneakers are a must.",
    ],
  },
};

/** Styling guidance for a usage context; unknown contexts get the casual set. */
export function getContextRecommendation(contextType?: string | null): ContextRecommendation {
  const requested = normalizeContextType(contextType);
  const context = Object.prototype.hasOwnProperty.call(RECOMMENDATIONS, requested) ? requested : FALLBACK_CONTEXT;
  const entry = RECOMMENDATIONS[context];
  return {
    context,
    tips: [...entry.tips],
    colorSuggestions: [...entry.colorSuggestions],
    styleSuggestions: { ...entry.styleSuggestions },
  };
}

export function listRecommendationContexts(): string[] {
  return Object.keys(RECOMMENDATIONS);
}
