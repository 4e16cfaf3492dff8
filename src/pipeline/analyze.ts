import {
  AnalysisResult,
  HealthInfo,
  IssueCode,
  MetadataField,
  Recipe,
  RiskFlag,
  WarningCode,
} from "./types";

export const MAX_SCORE = 100;
export const ISSUE_WEIGHT = 20;
export const WARNING_WEIGHT = 7;

export const HEALTH_DISCLAIMER =
  "Health hints are generated from keyword heuristics and are not medical advice.";

type Finding =
  | { kind: "issue"; code: IssueCode; message: string }
  | { kind: "warning"; code: WarningCode; message: string };

type QualityRule = (recipe: Recipe) => Finding | null;

const PLACEHOLDER_TITLES = new Set(["unbekannt", "unknown", "untitled", "ohne titel", "rezept"]);
const METADATA_FIELDS: readonly MetadataField[] = ["servings", "time", "difficulty"];
const IMAGE_SCHEME = /^https?:\/\/\S+$/i;

const QUANTITY_NUMBER = /(?:^|[^\p{L}\p{N}])(?:\d|[¼½¾⅓⅔⅛])/u;
const QUANTITY_WORD =
  /(?:^|[^\p{L}])(?:prise|prisen|etwas|bund|handvoll|schuss|msp|tl|el|stück)(?![\p{L}])/iu;

export function hasQuantity(ingredient: string): boolean {
  return QUANTITY_NUMBER.test(ingredient) || QUANTITY_WORD.test(ingredient);
}

export function missingMetadata(recipe: Recipe): MetadataField[] {
  return METADATA_FIELDS.filter((field) => recipe[field].trim().length === 0);
}

// Evaluated in this order; the order of codes in a result follows it.
const RULES: readonly QualityRule[] = [
  (recipe) => {
    const title = recipe.title.trim();
    return !title || PLACEHOLDER_TITLES.has(title.toLowerCase())
      ? { kind: "issue", code: "EMPTY_TITLE", message: "Title is missing or unclear" }
      : null;
  },
  (recipe) =>
    recipe.ingredients.length === 0
      ? { kind: "issue", code: "NO_INGREDIENTS", message: "No ingredients found" }
      : null,
  (recipe) =>
    recipe.steps.length === 0
      ? { kind: "issue", code: "NO_STEPS", message: "No preparation steps found" }
      : null,
  (recipe) =>
    recipe.parseMode === "fallback"
      ? {
          kind: "warning",
          code: "UNSTRUCTURED_SOURCE",
          message: "No usable headers; fields were inferred heuristically",
        }
      : null,
  (recipe) => {
    const suspect = recipe.images.filter((url) => !IMAGE_SCHEME.test(url.trim()));
    return suspect.length > 0
      ? {
          kind: "warning",
          code: "SUSPECT_IMAGE_URL",
          message: `Image link without http(s) scheme: ${suspect.join(", ")}`,
        }
      : null;
  },
  (recipe) => {
    const missing = missingMetadata(recipe);
    return missing.length > 0
      ? { kind: "warning", code: "MISSING_METADATA", message: `Missing metadata: ${missing.join(", ")}` }
      : null;
  },
  (recipe) =>
    recipe.category.trim().length === 0
      ? { kind: "warning", code: "MISSING_CATEGORY", message: "Category is missing" }
      : null,
  (recipe) => {
    const total = recipe.ingredients.length;
    const vague = recipe.ingredients.filter((ingredient) => !hasQuantity(ingredient)).length;
    return total > 0 && vague > Math.max(2, Math.floor(total / 2))
      ? {
          kind: "warning",
          code: "VAGUE_QUANTITIES",
          message: `${vague} of ${total} ingredients have no clear quantity`,
        }
      : null;
  },
];

const RISK_KEYWORDS: ReadonlyArray<[RiskFlag, readonly string[]]> = [
  ["processed_meat", ["pancetta", "speck", "salami", "wurst", "schinken", "bacon"]],
  ["red_meat", ["rind", "schwein", "hackfleisch", "lamm"]],
  ["high_sugar", ["zucker", "sirup", "karamell"]],
  ["deep_frying", ["frittier", "fritteuse", "ausbacken", "paniert", "panieren"]],
];

const RISK_HINTS: Readonly<Record<RiskFlag, string>> = {
  processed_meat: "Processed meat detected; a plant-based alternative may be worth considering.",
  red_meat: "Red meat detected; smaller portions or legumes could balance the dish.",
  high_sugar: "Check the amount of sugar and reduce it where possible.",
  deep_frying: "Deep-fried preparation; baking or pan-roasting uses less fat.",
};

const PROTECTIVE_KEYWORDS: readonly string[] = [
  "brokkoli",
  "beeren",
  "hafer",
  "linsen",
  "hülsenfrüchte",
  "bohnen",
  "spinat",
  "kurkuma",
  "nüsse",
  "leinsamen",
];

export function assessHealth(recipe: Recipe): { health: HealthInfo; hints: string[] } {
  const ingredientText = recipe.ingredients.join(" | ").toLowerCase();
  const scanText = `${ingredientText} | ${recipe.steps.join(" | ").toLowerCase()}`;

  const riskFlags = RISK_KEYWORDS.filter(([, needles]) =>
    needles.some((needle) => scanText.includes(needle)),
  ).map(([flag]) => flag);
  const protectiveHits = PROTECTIVE_KEYWORDS.filter((needle) => ingredientText.includes(needle)).length;

  const hints = riskFlags.map((flag) => RISK_HINTS[flag]);
  if (protectiveHits >= 2) {
    hints.push("Contains several nutrient-dense components.");
  } else if (recipe.ingredients.length > 0) {
    hints.push("Consider adding fibre-rich ingredients or fresh herbs.");
  }

  return { health: { riskFlags, protectiveHits }, hints };
}

export function computeScore(issueCount: number, warningCount: number): number {
  const raw = MAX_SCORE - ISSUE_WEIGHT * issueCount - WARNING_WEIGHT * warningCount;
  return Math.max(0, Math.min(MAX_SCORE, raw));
}

export function analyze(recipe: Recipe): AnalysisResult {
  const issues: IssueCode[] = [];
  const warnings: WarningCode[] = [];
  const issueMessages: string[] = [];
  const warningMessages: string[] = [];

  for (const rule of RULES) {
    const finding = rule(recipe);
    if (!finding) {
      continue;
    }
    if (finding.kind === "issue") {
      issues.push(finding.code);
      issueMessages.push(finding.message);
    } else {
      warnings.push(finding.code);
      warningMessages.push(finding.message);
    }
  }

  const { health, hints } = assessHealth(recipe);

  return Object.freeze({
    score: computeScore(issues.length, warnings.length),
    issues: Object.freeze(issues),
    warnings: Object.freeze(warnings),
    healthHints: Object.freeze(hints),
    messages: Object.freeze([...issueMessages, ...warningMessages]),
    missingMetadata: Object.freeze(missingMetadata(recipe)),
    health: Object.freeze(health),
  });
}
