export type RuleSeverity = "info" | "warning" | "error";

export type RuleKind = "color" | "style" | "context";

export interface RuleResult {
  passed: boolean;
  /** Always clamped to 0-100 */
  score: number;
  message: string;
  suggestion: string | null;
  severity: RuleSeverity;
  weight: number;
}

export interface RuleOutcome {
  ruleName: string;
  ruleDescription: string;
  passed: boolean;
  score: number;
  message: string;
  suggestion: string | null;
  severity: RuleSeverity;
  weight: number;
}

export interface RuleSuggestion {
  rule: string;
  suggestion: string;
  severity: RuleSeverity;
}

export interface EvaluationSummary {
  totalRules: number;
  passedRules: number;
  failedRules: number;
  errors: number;
  warnings: number;
}

export interface EvaluationReport {
  /** Weighted mean of rule scores, 0-100, two decimals */
  score: number;
  /** False when any rule reported severity "error" */
  passed: boolean;
  results: RuleOutcome[];
  suggestions: RuleSuggestion[];
  summary: EvaluationSummary;
}

export interface RuleDescriptor {
  name: string;
  description: string;
  kind: RuleKind;
  weight: number;
  enabled: boolean;
}

export interface RuleListResponse {
  rules: RuleDescriptor[];
}

export interface RuleConfigureRequest {
  weight?: number;
  enabled?: boolean;
}
