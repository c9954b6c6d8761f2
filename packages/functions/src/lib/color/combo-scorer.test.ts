import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { RGB } from "outfit-harmony-shared";
import { evaluateColorCombo } from "./combo-scorer";

describe("evaluateColorCombo", () => {
  it("scores an empty palette 0 and asks for a color", () => {
    const result = evaluateColorCombo([]);
    assert.equal(result.score, 0);
    assert.deepEqual(result.suggestions, ["Provide at least one color to evaluate."]);
    assert.equal(result.analysis, null);
  });

  it("scores a single color 100", () => {
    const result = evaluateColorCombo([[100, 150, 200]]);
    assert.equal(result.score, 100);
    assert.deepEqual(result.suggestions, ["Single-color outfit: minimalist and elegant."]);
    assert.deepEqual(result.analysis?.colorTypes, ["blue"]);
  });

  it("stacks the warm/cold and complementary deductions for red, green and blue", () => {
    const result = evaluateColorCombo([
      [255, 0, 0],
      [0, 255, 0],
      [0, 0, 255],
    ]);

    assert.equal(result.score, 70);
    assert.deepEqual(result.analysis?.colorTypes, ["deep-red", "green", "deep-blue"]);
    assert.deepEqual(result.analysis?.tones, ["warm", "cold", "cold"]);
    assert.equal(result.analysis?.contrastScores.length, 3);
    assert.deepEqual(result.suggestions, [
      "Follows the three-color guideline.",
      "Mixing warm and cold colors works better with a neutral (black, white or gray) between them.",
      "Complementary colors detected; add a neutral (black, white or gray) to balance them.",
    ]);
  });

  it("deducts only for harsh contrast when neutrals frame a color", () => {
    const result = evaluateColorCombo([
      [0, 0, 0],
      [255, 255, 255],
      [255, 0, 0],
    ]);
    assert.equal(result.score, 90);
    assert.ok(result.suggestions.includes("Neutrals paired with color: balanced and elegant."));
  });

  it("deducts 20 for colors that are too similar", () => {
    const result = evaluateColorCombo([
      [100, 100, 100],
      [110, 110, 110],
      [120, 120, 120],
    ]);
    assert.equal(result.score, 80);
    assert.deepEqual(result.suggestions, [
      "Follows the three-color guideline.",
      "Some colors are too similar and the outfit lacks depth; add more contrast.",
      "All-neutral palette: classic and safe.",
    ]);
  });

  it("deducts 10 for low but acceptable contrast", () => {
    // red (200,30,30) and brown (255,100,50) are ~91 apart
    const result = evaluateColorCombo([
      [200, 30, 30],
      [255, 100, 50],
    ]);
    assert.equal(result.score, 90);
    assert.deepEqual(result.suggestions, ["Some colors are low in contrast; consider a little more separation."]);
  });

  it("penalizes more than three colors on top of the other deductions", () => {
    const result = evaluateColorCombo([
      [255, 0, 0],
      [0, 255, 0],
      [0, 0, 255],
      [255, 255, 0],
      [255, 0, 255],
    ]);
    // -20 count, -15 warm/cold, -10 harsh contrast, -15 complementary
    assert.equal(result.score, 40);
    assert.equal(
      result.suggestions[0],
      "Keep the outfit to at most 3 main colors; it currently has 5."
    );
  });

  it("adds a positive remark when nothing else was said", () => {
    const result = evaluateColorCombo([
      [200, 30, 30],
      [255, 165, 0],
    ]);
    assert.equal(result.score, 100);
    assert.deepEqual(result.suggestions, ["The colors work well together."]);
  });

  it("keeps scores within 0-100 for assorted palettes", () => {
    const palettes: RGB[][] = [
      [
        [255, 0, 0],
        [255, 0, 0],
        [255, 0, 0],
        [255, 0, 0],
      ],
      [
        [0, 0, 0],
        [255, 255, 255],
      ],
      [
        [10, 200, 30],
        [240, 10, 200],
        [255, 255, 0],
        [0, 0, 128],
        [128, 0, 0],
        [0, 128, 128],
      ],
    ];
    for (const palette of palettes) {
      const { score } = evaluateColorCombo(palette);
      assert.ok(score >= 0 && score <= 100, `score ${score} out of range`);
    }
  });
});
