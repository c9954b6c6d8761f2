import type { RGB } from "./color";

export type GarmentSlot = "top" | "bottom" | "shoes";

/** Garment classes produced by the style classifier, in output-index order */
export type GarmentClass =
  | "t-shirt"
  | "shirt"
  | "hoodie"
  | "jacket"
  | "jeans"
  | "casual-pants"
  | "sneakers"
  | "leather-shoes";

export type StyleCategory = "formal" | "casual";

/**
 * An outfit color: an RGB triple, a palette name such as "deep-blue",
 * or a hex string ("#1A2B3C").
 */
export type OutfitColor = RGB | string;

export type OutfitStyles = Partial<Record<GarmentSlot, string | null>>;

export interface OutfitContext {
  type?: string;
  [key: string]: unknown;
}

export interface OutfitRecord {
  colors: OutfitColor[];
  styles: OutfitStyles;
  context: OutfitContext;
  topColors: OutfitColor[];
  bottomColors: OutfitColor[];
}

export interface OutfitEvaluateRequest {
  colors?: OutfitColor[];
  styles?: OutfitStyles;
  context?: OutfitContext;
  /** Defaults to `colors` */
  topColors?: OutfitColor[];
  /** Defaults to `colors` */
  bottomColors?: OutfitColor[];
}

export interface ContextRecommendation {
  context: string;
  tips: string[];
  colorSuggestions: string[];
  styleSuggestions: Record<GarmentSlot, GarmentClass>;
}
