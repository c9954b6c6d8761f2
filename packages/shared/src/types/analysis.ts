import type { ClassifiedDominantColor, ColorComboEvaluation } from "./color";
import type { OutfitContext, OutfitStyles } from "./outfit";
import type { EvaluationReport } from "./rules";

export interface OutfitAnalyzeResponse {
  colors: ClassifiedDominantColor[];
  colorEvaluation: Pick<ColorComboEvaluation, "score" | "suggestions">;
  styles: OutfitStyles;
  context: OutfitContext;
  ruleEvaluation: EvaluationReport;
  analyzedAt: string;
}
