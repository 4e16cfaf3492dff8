import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { normalize } from "../src/pipeline/normalize";
import { segment } from "../src/pipeline/segment";
import { parse } from "../src/pipeline/parse";
import { parseStructured } from "../src/pipeline/structured";
import { classifyLine, parseFallback } from "../src/pipeline/fallback";
import { matchHeader, stripListMarker } from "../src/pipeline/headers";
import { parseCategoryMapping } from "../src/pipeline/category";
import { route } from "../src/pipeline/route";
import { RecipeBlock } from "../src/pipeline/types";

const config = { separator: "/" };

function firstBlock(text: string): RecipeBlock {
  const [block] = segment(normalize(text).lines).blocks;
  assert.ok(block, "expected one block");
  return block;
}

describe("headers", () => {
  it("matches header words case-insensitively with an optional colon", () => {
    assert.deepEqual(matchHeader("ZUTATEN"), { field: "ingredients", inline: "" });
    assert.deepEqual(matchHeader("Zeit: 30 Minuten"), { field: "time", inline: "30 Minuten" });
    assert.deepEqual(matchHeader("Anleitung:"), { field: "steps", inline: "" });
  });

  it("does not treat prose starting with a header word as a header", () => {
    assert.equal(matchHeader("Zutaten mischen und backen"), null);
    assert.equal(matchHeader("Tipp: mehr Salz"), null);
  });

  it("strips bullet and ordinal markers", () => {
    assert.equal(stripListMarker("- 200 g Mehl"), "200 g Mehl");
    assert.equal(stripListMarker("• Butter"), "Butter");
    assert.equal(stripListMarker("3) Backen"), "Backen");
    assert.equal(stripListMarker("1 Zwiebel"), "1 Zwiebel");
  });
});

describe("parse", () => {
  it("parses a headed recipe", () => {
    const recipes = parse("Titel: Suppe\n\nZutaten:\n- Wasser\n\nZubereitung:\n1. Kochen", config);

    assert.deepEqual(recipes, [
      {
        title: "Suppe",
        category: "",
        servings: "",
        time: "",
        difficulty: "",
        ingredients: ["Wasser"],
        steps: ["Kochen"],
        images: [],
        parseMode: "structured",
        source: { startLine: 1, endLine: 7 },
      },
    ]);
  });

  it("takes the first line as title when no title header exists", () => {
    const text = [
      "",
      "Schokoladenkuchen",
      "",
      "Zutaten:",
      "- 200g Mehl",
      "- 100g Zucker",
      "- 2 Eier",
      "",
      "Zubereitung:",
      "1. Zutaten mischen.",
      "2. 30 Minuten backen.",
      "",
      "",
      "Pfannkuchen",
      "",
      "Zutaten:",
      "* 250ml Milch",
      "* 2 Eier",
      "* 150g Mehl",
      "",
      "Zubereitung:",
      "- Mischen",
      "- In der Pfanne braten",
      "",
    ].join("\n");

    const recipes = parse(text, config);

    assert.equal(recipes.length, 2);
    assert.deepEqual(
      recipes.map((recipe) => [recipe.title, recipe.parseMode, recipe.source.startLine, recipe.source.endLine]),
      [
        ["Schokoladenkuchen", "structured", 2, 11],
        ["Pfannkuchen", "structured", 14, 23],
      ],
    );
    assert.deepEqual(recipes[0].ingredients, ["200g Mehl", "100g Zucker", "2 Eier"]);
    assert.deepEqual(recipes[0].steps, ["Zutaten mischen.", "30 Minuten backen."]);
    assert.deepEqual(recipes[1].ingredients, ["250ml Milch", "2 Eier", "150g Mehl"]);
    assert.deepEqual(recipes[1].steps, ["Mischen", "In der Pfanne braten"]);
  });

  it("accepts header synonyms and headers on their own line", () => {
    const text = [
      "Titel: Chili",
      "KATEGORIE",
      "Mexikanisch",
      "Dauer: 1 Stunde",
      "zutaten",
      "- 500 g Bohnen",
      "Anleitung",
      "1. Kochen",
    ].join("\n");

    const [recipe] = parse(text, config);

    assert.equal(recipe.category, "Mexikanisch");
    assert.equal(recipe.time, "1 Stunde");
    assert.deepEqual(recipe.ingredients, ["500 g Bohnen"]);
    assert.deepEqual(recipe.steps, ["Kochen"]);
  });

  it("keeps unknown header-like lines as content of the open field", () => {
    const text = [
      "Titel: Brot",
      "Zutaten:",
      "- 500 g Mehl",
      "Tipp:",
      "- Salz nach Geschmack",
      "Zubereitung:",
      "1. Backen",
    ].join("\n");

    const [recipe] = parse(text, config);

    assert.deepEqual(recipe.ingredients, ["500 g Mehl", "Tipp:", "Salz nach Geschmack"]);
  });

  it("takes a scalar value from the line after a bare header", () => {
    const [recipe] = parse("Titel: Auflauf\nKategorie:\nAufläufe\nZutaten:\n- Nudeln", config);

    assert.equal(recipe.parseMode, "structured");
    assert.equal(recipe.category, "Aufläufe");
    assert.deepEqual(recipe.steps, []);
  });

  it("keeps only the first line of scalar fields", () => {
    const text = [
      "Titel: Chili con Carne",
      "Ein Klassiker aus Texas",
      "Kategorie:",
      "Asiatisch/Curry",
      "scharf",
      "Portionen: 4",
      "Zutaten:",
      "- 500 g Hackfleisch",
      "Zubereitung:",
      "1. Anbraten",
    ].join("\n");

    const [recipe] = parse(text, config);
    const routed = route(recipe, parseCategoryMapping("asiatisch/curry=Currys"), {
      separator: "/",
      titlePrefix: true,
      defaultSection: "Inbox",
    });

    assert.equal(recipe.parseMode, "structured");
    assert.equal(recipe.title, "Chili con Carne");
    assert.equal(recipe.category, "Asiatisch");
    assert.equal(recipe.subcategory, "Curry");
    assert.equal(recipe.servings, "4");
    assert.equal(routed.destination, "Currys");
    assert.equal(routed.displayTitle, "[Curry] Chili con Carne");
  });

  it("splits category and subcategory on the configured separator", () => {
    const [recipe] = parse("Titel: Tee\nKategorie: Getränke>Heiß\nZubereitung:\n1. Aufgießen", {
      separator: ">",
    });

    assert.equal(recipe.category, "Getränke");
    assert.equal(recipe.subcategory, "Heiß");
  });

  it("keeps steps in source order even when ordinals disagree", () => {
    const [recipe] = parse("Titel: Test\nZubereitung:\n2. Zweiter\n1. Erster", config);
    assert.deepEqual(recipe.steps, ["Zweiter", "Erster"]);
  });

  it("returns no recipes for empty input", () => {
    assert.deepEqual(parse("", config), []);
    assert.deepEqual(parse("\n  \n\n", config), []);
  });

  it("reports blocks handed to the fallback parser", () => {
    const reasons: string[] = [];

    const [recipe] = parse("Nur Text ohne Struktur hier drin", config, {
      onFallback: (_block, reason) => reasons.push(reason),
    });

    assert.deepEqual(reasons, ["no recognized headers"]);
    assert.equal(recipe.parseMode, "fallback");
    assert.equal(recipe.title, "Nur Text ohne Struktur hier drin");
  });
});

describe("parseStructured", () => {
  it("rejects blocks without headers", () => {
    assert.deepEqual(parseStructured(firstBlock("Nur ein Satz ohne Struktur."), config), {
      ok: false,
      reason: "no recognized headers",
    });
  });

  it("rejects blocks without a title", () => {
    assert.deepEqual(parseStructured(firstBlock("Zutaten:\n- Mehl"), config), {
      ok: false,
      reason: "title missing",
    });
  });

  it("rejects blocks with neither ingredients nor steps", () => {
    assert.deepEqual(parseStructured(firstBlock("Titel: Leer\nPortionen: 2"), config), {
      ok: false,
      reason: "neither ingredients nor steps found",
    });
  });
});

describe("parseFallback", () => {
  it("classifies lines", () => {
    assert.equal(classifyLine("https://example.com/bild.png"), "image");
    assert.equal(classifyLine("3: Servieren"), "step");
    assert.equal(classifyLine("2) Schmoren"), "step");
    assert.equal(classifyLine("• Butter"), "ingredient");
    assert.equal(classifyLine("2 Zwiebeln"), "ingredient");
    assert.equal(classifyLine("½ TL Salz"), "ingredient");
    assert.equal(classifyLine("Frische Petersilie"), "ingredient");
    assert.equal(classifyLine("Tipp: mehr Salz"), "ignored");
    assert.equal(classifyLine("Den Teig gut durchkneten und ruhen lassen."), "ignored");
  });

  it("infers fields from an unstructured block", () => {
    const text = [
      "Titel: Gulasch",
      "- 500 g Rindfleisch",
      "2 Zwiebeln",
      "1. Anbraten",
      "2) Schmoren",
      "https://example.com/gulasch.jpg",
      "Das ist ein sehr langer Satz ohne Struktur hier.",
    ].join("\n");

    const recipes = parse(text, config);

    assert.deepEqual(recipes, [
      {
        title: "Gulasch",
        category: "",
        servings: "",
        time: "",
        difficulty: "",
        ingredients: ["500 g Rindfleisch", "2 Zwiebeln"],
        steps: ["Anbraten", "Schmoren"],
        images: ["https://example.com/gulasch.jpg"],
        parseMode: "fallback",
        source: { startLine: 1, endLine: 7 },
      },
    ]);
  });

  it("fills metadata from inline headers", () => {
    const text = [
      "Omelett",
      "Portionen: 2",
      "Zeit: 10 Minuten",
      "Kategorie: Frühstück/Eier",
      "3 Eier",
      "Salz",
      "1. Verquirlen",
      "2. Braten",
    ].join("\n");

    const [recipe] = parse(text, config);

    assert.equal(recipe.parseMode, "fallback");
    assert.equal(recipe.title, "Omelett");
    assert.equal(recipe.servings, "2");
    assert.equal(recipe.time, "10 Minuten");
    assert.equal(recipe.category, "Frühstück");
    assert.equal(recipe.subcategory, "Eier");
    assert.deepEqual(recipe.ingredients, ["3 Eier", "Salz"]);
    assert.deepEqual(recipe.steps, ["Verquirlen", "Braten"]);
  });

  it("reads values on the line after bare scalar headers", () => {
    const text = [
      "Titel:",
      "Kategorie:",
      "Suppen",
      "Portionen:",
      "4",
      "Zeit:",
      "30 Minuten",
      "Zutaten:",
      "- Wasser",
      "Zubereitung:",
      "1. Kochen",
    ].join("\n");

    const [recipe] = parse(text, config);

    assert.equal(recipe.parseMode, "fallback");
    assert.equal(recipe.title, "");
    assert.equal(recipe.category, "Suppen");
    assert.equal(recipe.servings, "4");
    assert.equal(recipe.time, "30 Minuten");
    assert.deepEqual(recipe.ingredients, ["Wasser"]);
    assert.deepEqual(recipe.steps, ["Kochen"]);
  });

  it("leaves the title empty when the block starts with a bare header", () => {
    const recipe = parseFallback(firstBlock("Zutaten:\nZubereitung:"), config);

    assert.equal(recipe.title, "");
    assert.deepEqual(recipe.ingredients, []);
    assert.deepEqual(recipe.steps, []);
  });

  it("returns an empty recipe for an empty block", () => {
    const block: RecipeBlock = { startLine: 4, endLine: 4, lines: [], boundary: "blank-lines" };

    assert.deepEqual(parseFallback(block, config), {
      title: "",
      category: "",
      servings: "",
      time: "",
      difficulty: "",
      ingredients: [],
      steps: [],
      images: [],
      parseMode: "fallback",
      source: { startLine: 4, endLine: 4 },
    });
  });
});
