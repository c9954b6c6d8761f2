import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  parseColorCount,
  parseComboRequest,
  parseEvaluateRequest,
  parseJsonField,
  parseRuleConfigureRequest,
  RequestValidationError,
} from "./outfit-request";

describe("parseEvaluateRequest", () => {
  it("keeps known slots and trims colors", () => {
    assert.deepEqual(
      parseEvaluateRequest({
        colors: [[255, 0, 0], "navy", " #00FF00 "],
        styles: { top: " Shirt ", shoes: null, hat: "beanie" },
        context: { type: "work", weather: "rain" },
      }),
      {
        colors: [[255, 0, 0], "navy", "#00FF00"],
        styles: { top: "Shirt", shoes: null },
        context: { type: "work", weather: "rain" },
        topColors: undefined,
        bottomColors: undefined,
      }
    );
  });

  it("names the offending field", () => {
    assert.throws(
      () => parseEvaluateRequest({ colors: [[256, 0, 0]] }),
      new RequestValidationError("colors[0] must be an array of three integers between 0 and 255")
    );
    assert.throws(
      () => parseEvaluateRequest({ styles: { top: 3 } }),
      new RequestValidationError("styles.top must be a string or null")
    );
    assert.throws(
      () => parseEvaluateRequest({ context: { type: 1 } }),
      new RequestValidationError("context.type must be a string")
    );
    assert.throws(() => parseEvaluateRequest([]), RequestValidationError);
  });

  it("caps the number of colors", () => {
    const colors = Array.from({ length: 65 }, () => "red");
    assert.throws(() => parseEvaluateRequest({ colors }), RequestValidationError);
  });
});

describe("parseComboRequest", () => {
  it("accepts RGB triples only", () => {
    assert.deepEqual(parseComboRequest({ colors: [] }), []);
    assert.deepEqual(parseComboRequest({ colors: [[1, 2, 3]] }), [[1, 2, 3]]);
    assert.throws(() => parseComboRequest({ colors: ["red"] }), RequestValidationError);
    assert.throws(() => parseComboRequest({}), RequestValidationError);
  });
});

describe("parseRuleConfigureRequest", () => {
  it("requires a positive weight or a boolean enabled", () => {
    assert.deepEqual(parseRuleConfigureRequest({ enabled: false }), { enabled: false });
    assert.deepEqual(parseRuleConfigureRequest({ weight: 2 }), { weight: 2 });
    assert.throws(() => parseRuleConfigureRequest({}), RequestValidationError);
    assert.throws(() => parseRuleConfigureRequest({ weight: 0 }), RequestValidationError);
    assert.throws(() => parseRuleConfigureRequest({ enabled: "yes" }), RequestValidationError);
  });
});

describe("parseColorCount", () => {
  it("clamps to 1..max and falls back on junk", () => {
    assert.equal(parseColorCount("12", 5, 10), 10);
    assert.equal(parseColorCount("0", 5, 10), 1);
    assert.equal(parseColorCount("3", 5, 10), 3);
    assert.equal(parseColorCount("abc", 5, 10), 5);
    assert.equal(parseColorCount(null, 5, 10), 5);
  });
});

describe("parseJsonField", () => {
  it("parses JSON text fields", () => {
    assert.deepEqual(parseJsonField('{"type":"work"}', "context"), { type: "work" });
    assert.equal(parseJsonField("  ", "context"), undefined);
    assert.equal(parseJsonField(null, "context"), undefined);
    assert.throws(() => parseJsonField("{bad", "context"), new RequestValidationError("context must be valid JSON"));
  });
});
