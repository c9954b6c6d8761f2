import { describe, it, mock } from "node:test";
import assert from "node:assert/strict";
import type { OutfitRule } from "./base-rule";
import { ThreeColorRule } from "./color-rules";
import { applyRuleOverrides, DuplicateRuleError, parseRuleOverrides, RuleLibrary } from "./rule-library";

const DEFAULT_NAMES = [
  "three-color",
  "light-top-dark-bottom",
  "forbidden-color-combo",
  "style-coordination",
  "context-appropriate",
];

describe("RuleLibrary", () => {
  it("registers the five default rules in order", () => {
    const library = new RuleLibrary();
    assert.deepEqual(
      library.list().map((rule) => rule.name),
      DEFAULT_NAMES
    );
    assert.deepEqual(
      library.describe().map(({ name, weight }) => [name, weight]),
      [
        ["three-color", 1.5],
        ["light-top-dark-bottom", 1.2],
        ["forbidden-color-combo", 1.8],
        ["style-coordination", 1.5],
        ["context-appropriate", 1.3],
      ]
    );
  });

  it("drops a disabled rule from the enabled set and restores it in place", () => {
    const library = new RuleLibrary();
    assert.equal(library.disable("forbidden-color-combo"), true);
    assert.equal(library.getEnabled().length, 4);

    assert.equal(library.enable("forbidden-color-combo"), true);
    assert.deepEqual(
      library.getEnabled().map((rule) => rule.name),
      DEFAULT_NAMES
    );
  });

  it("reports unknown names instead of throwing", () => {
    const library = new RuleLibrary();
    assert.equal(library.disable("nope"), false);
    assert.equal(library.remove("nope"), false);
    assert.equal(library.get("nope"), undefined);
  });

  it("rejects duplicate names", () => {
    const library = new RuleLibrary();
    assert.throws(() => library.add(new ThreeColorRule()), DuplicateRuleError);
  });

  it("rejects rules whose weight is not positive", () => {
    const negative: OutfitRule = {
      name: "negative-weight",
      description: "Carries an invalid weight",
      kind: "color",
      weight: -0.5,
      enabled: true,
      evaluate: () => ({ passed: true, score: 0, message: "", suggestion: null, severity: "info", weight: -0.5 }),
    };
    const library = new RuleLibrary();
    assert.throws(() => library.add(negative), RangeError);
    assert.throws(() => library.add({ ...negative, name: "nan-weight", weight: Number.NaN }), RangeError);
    assert.equal(library.list().length, 5);
    assert.throws(() => new RuleLibrary([negative]), RangeError);
  });

  it("removes rules", () => {
    const library = new RuleLibrary();
    assert.equal(library.remove("three-color"), true);
    assert.equal(library.list().length, 4);
  });

  it("configures weight and enabled together", () => {
    const library = new RuleLibrary();
    assert.equal(library.configure("three-color", { weight: 3, enabled: false }), true);
    assert.equal(library.get("three-color")?.weight, 3);
    assert.equal(library.get("three-color")?.enabled, false);
    assert.throws(() => library.configure("three-color", { weight: 0 }), RangeError);
  });
});

describe("parseRuleOverrides", () => {
  it("reads weights and on/off switches", () => {
    const warn = mock.method(console, "warn", () => undefined);
    try {
      assert.deepEqual(
        parseRuleOverrides("three-color=2, style-coordination=off,bad,x=-1,context-appropriate=ON,three-color=off"),
        {
          "three-color": { weight: 2, enabled: false },
          "style-coordination": { enabled: false },
          "context-appropriate": { enabled: true },
        }
      );
      assert.equal(warn.mock.callCount(), 2);
    } finally {
      warn.mock.restore();
    }
  });

  it("returns nothing for an absent value", () => {
    assert.deepEqual(parseRuleOverrides(undefined), {});
    assert.deepEqual(parseRuleOverrides(""), {});
  });
});

describe("applyRuleOverrides", () => {
  it("applies known overrides and returns the unknown names", () => {
    const library = new RuleLibrary();
    const unknown = applyRuleOverrides(library, {
      "three-color": { weight: 2.5 },
      "no-such-rule": { enabled: false },
    });
    assert.deepEqual(unknown, ["no-such-rule"]);
    assert.equal(library.get("three-color")?.weight, 2.5);
  });
});
