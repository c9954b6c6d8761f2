import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { findComplementaryClashes, hasComplementaryClash, isRgb, parseHexColor } from "./palette";

describe("parseHexColor", () => {
  it("accepts six hex digits with or without #", () => {
    assert.deepEqual(parseHexColor("#1A2B3C"), [26, 43, 60]);
    assert.deepEqual(parseHexColor(" ff8000 "), [255, 128, 0]);
  });

  it("rejects short and malformed values", () => {
    assert.equal(parseHexColor("#fff"), null);
    assert.equal(parseHexColor("navy"), null);
    assert.equal(parseHexColor("#12345g"), null);
  });
});

describe("isRgb", () => {
  it("accepts three integers in range only", () => {
    assert.equal(isRgb([0, 128, 255]), true);
    assert.equal(isRgb([0, 128]), false);
    assert.equal(isRgb([0, 128, 256]), false);
    assert.equal(isRgb([0, 1.5, 2]), false);
    assert.equal(isRgb("0,0,0"), false);
  });
});

describe("complementary families", () => {
  it("flags one member from each side of a pair", () => {
    assert.equal(hasComplementaryClash(["deep-red", "pale-green"]), true);
    assert.equal(hasComplementaryClash(["purple", "yellow"]), true);
    assert.equal(hasComplementaryClash(["blue", "orange"]), true);
  });

  it("ignores colors from the same side or unrelated families", () => {
    assert.equal(hasComplementaryClash(["red", "pink", "deep-red"]), false);
    assert.equal(hasComplementaryClash(["purple", "orange"]), false);
    assert.equal(hasComplementaryClash(["black", "white"]), false);
  });

  it("reports every matching pair", () => {
    assert.equal(findComplementaryClashes(["red", "green", "pale-yellow", "deep-blue"]).length, 2);
  });
});
