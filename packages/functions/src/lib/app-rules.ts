import { applyRuleOverrides, parseRuleOverrides, RuleLibrary } from "./rules/rule-library";
import { RuleEvaluator } from "./rules/rule-evaluator";
import { RULE_OVERRIDES } from "./settings";

/** Default rule set with the deployment's RULE_OVERRIDES applied. */
export function createConfiguredRuleLibrary(rawOverrides: string | undefined): RuleLibrary {
  const library = new RuleLibrary();
  const unknown = applyRuleOverrides(library, parseRuleOverrides(rawOverrides));
  if (unknown.length > 0) {
    console.warn(`[app-rules] RULE_OVERRIDES names unknown rules: ${unknown.join(", ")}`);
  }
  return library;
}

// The function app owns one library for its lifetime; every HTTP trigger
// evaluates against it and the rules endpoints reconfigure it.
export const ruleLibrary = createConfiguredRuleLibrary(RULE_OVERRIDES);
export const ruleEvaluator = new RuleEvaluator(ruleLibrary);
