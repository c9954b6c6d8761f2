/** Red, green, blue; integers in 0-255, no alpha */
export type RGB = [number, number, number];

export type ColorName =
  | "red"
  | "deep-red"
  | "pink"
  | "orange"
  | "yellow"
  | "pale-yellow"
  | "green"
  | "deep-green"
  | "pale-green"
  | "blue"
  | "deep-blue"
  | "pale-blue"
  | "purple"
  | "deep-purple"
  | "pale-purple"
  | "brown"
  | "black"
  | "white"
  | "gray";

export type ColorTone = "warm" | "cold" | "neutral";

export interface ColorClassification {
  name: ColorName;
  tone: ColorTone;
}

export interface DominantColor {
  rgb: RGB;
  /** Share of the image's pixels in this cluster, 0-100 */
  percentage: number;
}

export interface ClassifiedDominantColor extends DominantColor, ColorClassification {}

export interface ColorComboAnalysis {
  colorCount: number;
  colorTypes: ColorName[];
  tones: ColorTone[];
  /** Pairwise RGB distances in (i, j) order with i < j */
  contrastScores: number[];
}

export interface ColorComboEvaluation {
  /** 0-100 */
  score: number;
  suggestions: string[];
  analysis: ColorComboAnalysis | null;
}

export interface ColorClassifyRequest {
  rgb: RGB;
}

export interface ColorComboRequest {
  colors: RGB[];
}

export interface ColorExtractResponse {
  colors: ClassifiedDominantColor[];
  k: number;
}
