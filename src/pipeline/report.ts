import { HEALTH_DISCLAIMER } from "./analyze";
import { DEFAULT_SIMILARITY_THRESHOLD, findSimilarCandidates } from "./similarity";
import { AnalysisResult, Report, ReportItem, RoutedRecipe } from "./types";

export type ReportOptions = {
  similarityThreshold?: number;
};

function toItem(recipe: RoutedRecipe, analysis: AnalysisResult, index: number): ReportItem {
  return {
    index,
    title: recipe.title,
    displayTitle: recipe.displayTitle,
    destination: recipe.destination,
    parseMode: recipe.parseMode,
    category: recipe.category,
    ...(recipe.subcategory ? { subcategory: recipe.subcategory } : {}),
    servings: recipe.servings,
    time: recipe.time,
    difficulty: recipe.difficulty,
    ingredients: recipe.ingredients,
    steps: recipe.steps,
    images: recipe.images,
    source: recipe.source,
    analysis,
  };
}

export function buildReport(
  recipes: readonly RoutedRecipe[],
  results: readonly AnalysisResult[],
  options: ReportOptions = {},
): Report {
  if (recipes.length !== results.length) {
    throw new Error(
      `Cannot build report: ${recipes.length} recipe(s) but ${results.length} analysis result(s)`,
    );
  }

  const items = recipes.map((recipe, index) => toItem(recipe, results[index], index));
  const similarCandidates = findSimilarCandidates(
    recipes,
    options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD,
  );

  const sectionCounts = new Map<string, number>();
  for (const recipe of recipes) {
    sectionCounts.set(recipe.destination, (sectionCounts.get(recipe.destination) ?? 0) + 1);
  }

  const totalScore = results.reduce((sum, result) => sum + result.score, 0);
  const structuredCount = recipes.filter((recipe) => recipe.parseMode === "structured").length;

  return {
    summary: {
      count: items.length,
      averageScore: items.length > 0 ? Math.round((totalScore / items.length) * 10) / 10 : 0,
      totalIssues: results.reduce((sum, result) => sum + result.issues.length, 0),
      totalWarnings: results.reduce((sum, result) => sum + result.warnings.length, 0),
      structuredCount,
      fallbackCount: recipes.length - structuredCount,
      sections: [...sectionCounts].map(([section, count]) => ({ section, count })),
      similarCandidates: similarCandidates.length,
    },
    items,
    similarCandidates,
    healthDisclaimer: HEALTH_DISCLAIMER,
  };
}

export function serializeReport(report: Report): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}
