import { splitCategory } from "./category";
import { FieldKey, matchHeader, ScanState, stripListMarker } from "./headers";
import { ParseConfig, Recipe, RecipeBlock } from "./types";

export type StructuredParseResult =
  | { ok: true; recipe: Recipe }
  | { ok: false; reason: string };

type FieldBuffers = Record<FieldKey, string[]>;

function emptyBuffers(): FieldBuffers {
  return {
    title: [],
    category: [],
    servings: [],
    time: [],
    difficulty: [],
    ingredients: [],
    steps: [],
    images: [],
  };
}

/** A scalar field keeps its first non-blank line; later lines under the header are dropped. */
function scalar(values: string[]): string {
  return values.find((value) => value.trim().length > 0)?.trim() ?? "";
}

function list(values: string[]): string[] {
  return values.map((value) => stripListMarker(value)).filter(Boolean);
}

export function parseStructured(block: RecipeBlock, config: ParseConfig): StructuredParseResult {
  const buffers = emptyBuffers();
  const preamble: string[] = [];
  let state: ScanState = "none";
  let headerCount = 0;
  let sawTitleHeader = false;

  for (const line of block.lines) {
    const text = line.text.trim();
    if (!text) {
      continue;
    }

    const header = matchHeader(text);
    if (header) {
      state = header.field;
      headerCount += 1;
      if (header.field === "title") {
        sawTitleHeader = true;
      }
      if (header.inline) {
        buffers[header.field].push(header.inline);
      }
      continue;
    }

    if (state === "none") {
      preamble.push(text);
      continue;
    }
    buffers[state].push(text);
  }

  if (headerCount === 0) {
    return { ok: false, reason: "no recognized headers" };
  }

  const title = sawTitleHeader ? scalar(buffers.title) : (preamble[0] ?? "");
  const ingredients = list(buffers.ingredients);
  const steps = list(buffers.steps);

  if (!title) {
    return { ok: false, reason: "title missing" };
  }
  if (ingredients.length === 0 && steps.length === 0) {
    return { ok: false, reason: "neither ingredients nor steps found" };
  }

  return {
    ok: true,
    recipe: {
      title,
      ...splitCategory(scalar(buffers.category), config.separator),
      servings: scalar(buffers.servings),
      time: scalar(buffers.time),
      difficulty: scalar(buffers.difficulty),
      ingredients,
      steps,
      images: list(buffers.images),
      parseMode: "structured",
      source: {
        startLine: block.startLine,
        endLine: block.endLine,
      },
    },
  };
}
