import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { OutfitColor, RuleResult } from "outfit-harmony-shared";
import { ColorRule, type OutfitRule, type RuleVerdict } from "./base-rule";
import { ForbiddenColorComboRule, ThreeColorRule } from "./color-rules";
import { buildOutfitRecord, RuleEvaluationError, RuleEvaluator } from "./rule-evaluator";
import { RuleLibrary } from "./rule-library";

class ExplodingRule extends ColorRule {
  constructor() {
    super("exploding", "Always throws");
  }

  protected evaluateColors(_colors: OutfitColor[]): RuleVerdict {
    throw new Error("boom");
  }
}

function plainRule(name: string, score: number): OutfitRule {
  return {
    name,
    description: "Implements OutfitRule without BaseRule",
    kind: "color",
    weight: 1,
    enabled: true,
    evaluate(): RuleResult {
      return { passed: true, score, message: "raw", suggestion: null, severity: "info", weight: 1 };
    },
  };
}

describe("buildOutfitRecord", () => {
  it("fills missing sections and defaults top/bottom to all colors", () => {
    assert.deepEqual(buildOutfitRecord({ colors: ["red"] }), {
      colors: ["red"],
      styles: {},
      context: {},
      topColors: ["red"],
      bottomColors: ["red"],
    });
    assert.deepEqual(buildOutfitRecord({ colors: ["red"], topColors: [], bottomColors: ["black"] }).topColors, ["red"]);
  });
});

describe("RuleEvaluator", () => {
  it("produces a weighted report for a coordinated work outfit", () => {
    const report = new RuleEvaluator().evaluateOutfit({
      colors: [
        [255, 255, 255],
        [0, 0, 0],
        [100, 150, 200],
      ],
      styles: { top: "shirt", bottom: "casual-pants", shoes: "leather-shoes" },
      context: { type: "work" },
    });

    // (100*1.5 + 100*1.2 + 100*1.8 + 70*1.5 + 100*1.3) / 7.3
    assert.equal(report.score, 93.84);
    assert.equal(report.passed, true);
    assert.deepEqual(report.suggestions, [
      {
        rule: "style-coordination",
        suggestion: "Settle on a single style for a more cohesive look.",
        severity: "warning",
      },
    ]);
    assert.deepEqual(report.summary, { totalRules: 5, passedRules: 5, failedRules: 0, errors: 0, warnings: 1 });
  });

  it("fails the outfit when any rule reports an error", () => {
    const report = new RuleEvaluator().evaluateOutfit({
      colors: [
        [255, 0, 0],
        [0, 255, 0],
        [255, 255, 0],
        [0, 0, 255],
      ],
      styles: { top: "t-shirt", bottom: "jeans", shoes: "leather-shoes" },
      context: { type: "formal occasion" },
    });

    // (80*1.5 + 100*1.2 + 50*1.8 + 70*1.5 + 100*1.3) / 7.3
    assert.equal(report.score, 77.4);
    assert.equal(report.passed, false);
    assert.deepEqual(
      report.results.map(({ ruleName, score, severity }) => [ruleName, score, severity]),
      [
        ["three-color", 80, "warning"],
        ["light-top-dark-bottom", 100, "info"],
        ["forbidden-color-combo", 50, "error"],
        ["style-coordination", 70, "warning"],
        ["context-appropriate", 100, "info"],
      ]
    );
    assert.deepEqual(report.summary, { totalRules: 5, passedRules: 3, failedRules: 2, errors: 1, warnings: 2 });
  });

  it("passes an empty outfit with every rule skipped", () => {
    const report = new RuleEvaluator().evaluateOutfit();
    assert.equal(report.score, 100);
    assert.equal(report.passed, true);
    assert.deepEqual(report.suggestions, []);
  });

  it("scores 0 when no rule is enabled", () => {
    const library = new RuleLibrary([]);
    const report = new RuleEvaluator(library).evaluateOutfit({ colors: ["red"] });
    assert.equal(report.score, 0);
    assert.equal(report.passed, true);
    assert.deepEqual(report.results, []);
  });

  it("weights rule scores by their weight", () => {
    const library = new RuleLibrary([new ThreeColorRule({ weight: 1 }), new ForbiddenColorComboRule({ weight: 2 })]);
    const report = new RuleEvaluator(library).evaluateOutfit({ colors: ["red", "green"] });
    // (100*1 + 50*2) / 3
    assert.equal(report.score, 66.67);
  });

  it("reflects configuration changes on the next evaluation", () => {
    const evaluator = new RuleEvaluator();
    const input = { colors: ["red", "green"] };
    assert.equal(evaluator.evaluateOutfit(input).summary.totalRules, 5);

    assert.equal(evaluator.configureRule("forbidden-color-combo", { enabled: false }), true);
    const report = evaluator.evaluateOutfit(input);
    assert.equal(report.summary.totalRules, 4);
    assert.equal(report.passed, true);
  });

  it("is idempotent for the same input", () => {
    const evaluator = new RuleEvaluator();
    const input = { colors: ["navy", "#FFFFFF"], styles: { top: "hoodie" }, context: { type: "party" } };
    assert.deepEqual(evaluator.evaluateOutfit(input), evaluator.evaluateOutfit(input));
  });

  it("clamps scores from rules that bypass BaseRule", () => {
    const high = new RuleEvaluator(new RuleLibrary([plainRule("too-high", 250)])).evaluateOutfit({ colors: ["red"] });
    assert.equal(high.score, 100);
    assert.equal(high.results[0].score, 100);

    const nan = new RuleEvaluator(new RuleLibrary([plainRule("not-a-number", Number.NaN)])).evaluateOutfit();
    assert.equal(nan.score, 0);
    assert.equal(nan.results[0].score, 0);
  });

  it("aborts the whole evaluation when a rule throws", () => {
    const evaluator = new RuleEvaluator();
    evaluator.addCustomRule(new ExplodingRule());
    assert.throws(
      () => evaluator.evaluateOutfit({ colors: ["red"] }),
      (error: unknown) =>
        error instanceof RuleEvaluationError && error.ruleName === "exploding" && error.message === 'Rule "exploding" failed: boom'
    );
  });
});
