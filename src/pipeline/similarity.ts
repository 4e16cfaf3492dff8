import { foldGerman } from "./headers";
import { Recipe, SimilarCandidate } from "./types";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.5;

const STOP_WORDS = new Set([
  "und",
  "mit",
  "oder",
  "der",
  "die",
  "das",
  "den",
  "dem",
  "ein",
  "eine",
  "für",
  "von",
  "nach",
  "etwas",
  "prise",
  "stück",
  "dose",
  "tasse",
  "bund",
]);

const PASTA_WORDS = [
  "pasta",
  "nudel",
  "nudeln",
  "spaghetti",
  "penne",
  "makkaroni",
  "maccheroni",
  "tagliatelle",
  "fusilli",
  "linguine",
  "rigatoni",
];

const SYNONYMS = new Map<string, string>(PASTA_WORDS.map((word) => [word, "pasta"]));

// Sauce, Soße and Sosse, alone or as the tail of a compound (Tomatensoße).
const SAUCE_SUFFIX = /(?:sauce|sosse)$/;

export function canonicalToken(token: string): string {
  const folded = foldGerman(token).replace(SAUCE_SUFFIX, "sosse");
  return SYNONYMS.get(folded) ?? folded;
}

export function tokenize(recipe: Pick<Recipe, "title" | "ingredients">): Set<string> {
  const text = [recipe.title, ...recipe.ingredients].join(" ").toLowerCase();
  const tokens = text
    .split(/[^\p{L}]+/u)
    .filter((token) => token.length >= 3 && !STOP_WORDS.has(token))
    .map((token) => canonicalToken(token));
  return new Set(tokens);
}

export function jaccard(left: ReadonlySet<string>, right: ReadonlySet<string>): number {
  if (left.size === 0 && right.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) {
      shared += 1;
    }
  }
  return shared / (left.size + right.size - shared);
}

/** Pairs (a < b) whose title/ingredient vocabulary overlaps at least `threshold`. */
export function findSimilarCandidates(
  recipes: ReadonlyArray<Pick<Recipe, "title" | "ingredients">>,
  threshold = DEFAULT_SIMILARITY_THRESHOLD,
): SimilarCandidate[] {
  const tokenSets = recipes.map((recipe) => tokenize(recipe));
  const candidates: SimilarCandidate[] = [];

  for (let a = 0; a < recipes.length; a += 1) {
    for (let b = a + 1; b < recipes.length; b += 1) {
      const similarity = Math.round(jaccard(tokenSets[a], tokenSets[b]) * 1000) / 1000;
      if (similarity >= threshold) {
        candidates.push({
          a,
          b,
          titles: [recipes[a].title, recipes[b].title],
          similarity,
        });
      }
    }
  }

  return candidates;
}
