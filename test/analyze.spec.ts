import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { analyze, computeScore, hasQuantity } from "../src/pipeline/analyze";
import { parse } from "../src/pipeline/parse";
import { Recipe } from "../src/pipeline/types";

function makeRecipe(overrides: Partial<Recipe> = {}): Recipe {
  return {
    title: "Haferfrühstück",
    category: "Frühstück",
    servings: "1",
    time: "5 Minuten",
    difficulty: "leicht",
    ingredients: ["80 g Haferflocken", "100 g Beeren"],
    steps: ["Mischen"],
    images: [],
    parseMode: "structured",
    source: { startLine: 1, endLine: 9 },
    ...overrides,
  };
}

describe("analyze", () => {
  it("scores a complete recipe at 100", () => {
    const result = analyze(makeRecipe());

    assert.equal(result.score, 100);
    assert.deepEqual(result.issues, []);
    assert.deepEqual(result.warnings, []);
    assert.deepEqual(result.messages, []);
    assert.deepEqual(result.missingMetadata, []);
    assert.deepEqual(result.health, { riskFlags: [], protectiveHits: 2 });
    assert.deepEqual(result.healthHints, ["Contains several nutrient-dense components."]);
  });

  it("reports missing metadata and category for a minimal recipe", () => {
    const [recipe] = parse("Titel: Suppe\n\nZutaten:\n- Wasser\n\nZubereitung:\n1. Kochen", {
      separator: "/",
    });

    const result = analyze(recipe);

    assert.deepEqual(result.issues, []);
    assert.deepEqual(result.warnings, ["MISSING_METADATA", "MISSING_CATEGORY"]);
    assert.equal(result.score, 86);
    assert.deepEqual(result.missingMetadata, ["servings", "time", "difficulty"]);
    assert.deepEqual(result.messages, ["Missing metadata: servings, time, difficulty", "Category is missing"]);
    assert.deepEqual(result.healthHints, ["Consider adding fibre-rich ingredients or fresh herbs."]);
  });

  it("flags an empty fallback recipe", () => {
    const result = analyze(
      makeRecipe({
        title: "",
        category: "",
        servings: "",
        time: "",
        difficulty: "",
        ingredients: [],
        steps: [],
        parseMode: "fallback",
      }),
    );

    assert.deepEqual(result.issues, ["EMPTY_TITLE", "NO_INGREDIENTS", "NO_STEPS"]);
    assert.deepEqual(result.warnings, ["UNSTRUCTURED_SOURCE", "MISSING_METADATA", "MISSING_CATEGORY"]);
    assert.equal(result.score, 19);
    assert.deepEqual(result.messages.slice(0, 3), [
      "Title is missing or unclear",
      "No ingredients found",
      "No preparation steps found",
    ]);
    assert.deepEqual(result.healthHints, []);
  });

  it("treats placeholder titles as missing", () => {
    assert.deepEqual(analyze(makeRecipe({ title: "Unbekannt" })).issues, ["EMPTY_TITLE"]);
    assert.deepEqual(analyze(makeRecipe({ title: "  " })).issues, ["EMPTY_TITLE"]);
  });

  it("lists image links without an http(s) scheme", () => {
    const result = analyze(
      makeRecipe({ images: ["https://example.com/ok.jpg", "ftp://example.com/a.jpg", "bild.jpg"] }),
    );

    assert.deepEqual(result.warnings, ["SUSPECT_IMAGE_URL"]);
    assert.deepEqual(result.messages, ["Image link without http(s) scheme: ftp://example.com/a.jpg, bild.jpg"]);
    assert.equal(result.score, 93);
  });

  it("warns when most ingredients lack a quantity", () => {
    const result = analyze(
      makeRecipe({ ingredients: ["Salz", "Pfeffer", "Öl", "Mehl", "200 g Butter"] }),
    );

    assert.deepEqual(result.warnings, ["VAGUE_QUANTITIES"]);
    assert.deepEqual(result.messages, ["4 of 5 ingredients have no clear quantity"]);
  });

  it("recognizes quantity words", () => {
    assert.equal(hasQuantity("1 Prise Salz"), true);
    assert.equal(hasQuantity("Prise Salz"), true);
    assert.equal(hasQuantity("½ Zitrone"), true);
    assert.equal(hasQuantity("Salz"), false);
    assert.equal(hasQuantity("Öl"), false);
  });

  it("adds health hints without changing the score", () => {
    const result = analyze(
      makeRecipe({
        title: "Spaghetti Carbonara",
        ingredients: ["100 g Pancetta", "200 g Spaghetti", "2 EL Zucker"],
        steps: ["In Öl ausbacken"],
      }),
    );

    assert.equal(result.score, 100);
    assert.deepEqual(result.health, {
      riskFlags: ["processed_meat", "high_sugar", "deep_frying"],
      protectiveHits: 0,
    });
    assert.deepEqual(result.healthHints, [
      "Processed meat detected; a plant-based alternative may be worth considering.",
      "Check the amount of sugar and reduce it where possible.",
      "Deep-fried preparation; baking or pan-roasting uses less fat.",
      "Consider adding fibre-rich ingredients or fresh herbs.",
    ]);
  });

  it("is deterministic and returns a frozen result", () => {
    const recipe = makeRecipe({ category: "", images: ["bild.jpg"] });

    const first = analyze(recipe);
    const second = analyze(recipe);

    assert.deepEqual(first, second);
    assert.equal(Object.isFrozen(first), true);
    assert.equal(Object.isFrozen(first.warnings), true);
  });

  it("clamps the score to 0..100", () => {
    assert.equal(computeScore(0, 0), 100);
    assert.equal(computeScore(1, 2), 66);
    assert.equal(computeScore(5, 3), 0);
  });
});
