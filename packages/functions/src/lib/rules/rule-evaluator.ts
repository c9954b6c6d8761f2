import type {
  EvaluationReport,
  OutfitEvaluateRequest,
  OutfitRecord,
  RuleOutcome,
  RuleResult,
  RuleSuggestion,
} from "outfit-harmony-shared";
import { clampScore, type OutfitRule } from "./base-rule";
import { RuleLibrary, type RuleConfiguration } from "./rule-library";

export class RuleEvaluationError extends Error {
  constructor(public readonly ruleName: string, cause: unknown) {
    super(`Rule "${ruleName}" failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "RuleEvaluationError";
  }
}

export function buildOutfitRecord(input: OutfitEvaluateRequest): OutfitRecord {
  const colors = input.colors ?? [];
  return {
    colors,
    styles: input.styles ?? {},
    context: input.context ?? {},
    topColors: input.topColors?.length ? input.topColors : colors,
    bottomColors: input.bottomColors?.length ? input.bottomColors : colors,
  };
}

/**
 * Runs every enabled rule of a library against one outfit and folds the
 * results into a weighted report.
 *
 * A rule that throws aborts the whole evaluation with a
 * RuleEvaluationError; no partial report is produced.
 */
export class RuleEvaluator {
  constructor(readonly library: RuleLibrary = new RuleLibrary()) {}

  evaluateOutfit(input: OutfitEvaluateRequest = {}): EvaluationReport {
    const outfit = buildOutfitRecord(input);
    const results: RuleOutcome[] = [];
    let weightedScore = 0;
    let totalWeight = 0;

    for (const rule of this.library.getEnabled()) {
      const result = runRule(rule, outfit);
      results.push({
        ruleName: rule.name,
        ruleDescription: rule.description,
        passed: result.passed,
        score: result.score,
        message: result.message,
        suggestion: result.suggestion,
        severity: result.severity,
        weight: rule.weight,
      });
      weightedScore += result.score * rule.weight;
      totalWeight += rule.weight;
    }

    const suggestions: RuleSuggestion[] = [];
    for (const result of results) {
      if (result.suggestion) {
        suggestions.push({ rule: result.ruleName, suggestion: result.suggestion, severity: result.severity });
      }
    }

    const errors = results.filter((result) => result.severity === "error").length;
    const warnings = results.filter((result) => result.severity === "warning").length;
    const passedRules = results.filter((result) => result.passed).length;
    const score = totalWeight > 0 ? weightedScore / totalWeight : 0;

    return {
      score: Math.round(score * 100) / 100,
      passed: errors === 0,
      results,
      suggestions,
      summary: {
        totalRules: results.length,
        passedRules,
        failedRules: results.length - passedRules,
        errors,
        warnings,
      },
    };
  }

  addCustomRule(rule: OutfitRule): void {
    this.library.add(rule);
  }

  configureRule(name: string, configuration: RuleConfiguration): boolean {
    return this.library.configure(name, configuration);
  }
}

function runRule(rule: OutfitRule, outfit: OutfitRecord): RuleResult {
  let result: RuleResult;
  try {
    result = rule.evaluate(outfit);
  } catch (error) {
    throw new RuleEvaluationError(rule.name, error);
  }
  // Rules implementing OutfitRule directly skip BaseRule's clamping.
  return { ...result, score: clampScore(result.score) };
}
