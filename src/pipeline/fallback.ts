import { splitCategory } from "./category";
import { isListField, ListField, matchHeader, ScalarField, stripListMarker } from "./headers";
import { ParseConfig, Recipe, RecipeBlock } from "./types";

const urlLine = /^[a-z][a-z0-9+.-]*:\/\/\S+$/i;
const stepLine = /^\d+(?:\s*[.):]|\s+[-–])\s+\S/;
const bulletLine = /^[-*•–]\s*\S/;
const quantityStart = /^(?:\d+(?:[.,/]\d+)?|[¼½¾⅓⅔⅛])\s*\p{L}/u;
const labelLine = /^\p{L}[\p{L} ]*:\s/u;
const sentenceEnd = /[.!?]$/;
const MAX_PHRASE_WORDS = 4;

export type LineKind = "image" | "step" | "ingredient" | "ignored";

/** Classifies one non-header line of an unstructured block. */
export function classifyLine(text: string): LineKind {
  const trimmed = text.trim();
  if (!trimmed || trimmed.endsWith(":") || labelLine.test(trimmed)) {
    return "ignored";
  }
  if (urlLine.test(trimmed)) {
    return "image";
  }
  if (stepLine.test(trimmed)) {
    return "step";
  }
  if (bulletLine.test(trimmed) || quantityStart.test(trimmed)) {
    return "ingredient";
  }
  const words = trimmed.split(/\s+/);
  if (words.length <= MAX_PHRASE_WORDS && !sentenceEnd.test(trimmed)) {
    return "ingredient";
  }
  return "ignored";
}

function stripStepMarker(text: string): string {
  return text.trim().replace(/^\d+(?:\s*[.):]|\s+[-–])\s+/, "").trim();
}

/**
 * Heuristic parser for blocks the header-driven parser rejected. Never throws: the
 * worst case is a recipe with an empty title and empty lists.
 */
export function parseFallback(block: RecipeBlock, config: ParseConfig): Recipe {
  const scalars: Record<Exclude<ScalarField, "title">, string> = {
    category: "",
    servings: "",
    time: "",
    difficulty: "",
  };
  const lists: Record<ListField, string[]> = {
    ingredients: [],
    steps: [],
    images: [],
  };
  let title: string | undefined;
  // Set by a bare scalar header; the next non-header line is its value.
  let pending: ScalarField | undefined;

  for (const line of block.lines) {
    const text = line.text.trim();
    if (!text) {
      continue;
    }

    const header = matchHeader(text);
    if (title === undefined) {
      if (!header) {
        title = text;
        continue;
      }
      title = header.field === "title" ? header.inline : "";
    }

    if (header) {
      pending = undefined;
      if (!header.inline) {
        if (!isListField(header.field)) {
          pending = header.field;
        }
        continue;
      }
      if (header.field === "title") {
        continue;
      }
      if (isListField(header.field)) {
        lists[header.field].push(stripListMarker(header.inline));
      } else if (!scalars[header.field]) {
        scalars[header.field] = header.inline;
      }
      continue;
    }

    if (pending) {
      if (pending === "title") {
        title = title || text;
      } else if (!scalars[pending]) {
        scalars[pending] = text;
      }
      pending = undefined;
      continue;
    }

    switch (classifyLine(text)) {
      case "image":
        lists.images.push(text);
        break;
      case "step":
        lists.steps.push(stripStepMarker(text));
        break;
      case "ingredient":
        lists.ingredients.push(stripListMarker(text));
        break;
      case "ignored":
        break;
    }
  }

  return {
    title: title ?? "",
    ...splitCategory(scalars.category, config.separator),
    servings: scalars.servings,
    time: scalars.time,
    difficulty: scalars.difficulty,
    ingredients: lists.ingredients.filter(Boolean),
    steps: lists.steps.filter(Boolean),
    images: lists.images,
    parseMode: "fallback",
    source: {
      startLine: block.startLine,
      endLine: block.endLine,
    },
  };
}
