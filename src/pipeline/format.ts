import { CANONICAL_HEADERS } from "./headers";
import { Recipe } from "./types";

/** Writes a recipe back in the canonical header layout the structured parser reads. */
export function formatRecipe(recipe: Recipe, separator = "/"): string {
  const lines = [`${CANONICAL_HEADERS.title}: ${recipe.title}`];

  const category = recipe.subcategory
    ? `${recipe.category}${separator}${recipe.subcategory}`
    : recipe.category;
  const scalars: Array<[string, string]> = [
    [CANONICAL_HEADERS.category, category],
    [CANONICAL_HEADERS.servings, recipe.servings],
    [CANONICAL_HEADERS.time, recipe.time],
    [CANONICAL_HEADERS.difficulty, recipe.difficulty],
  ];
  for (const [header, value] of scalars) {
    if (value) {
      lines.push(`${header}: ${value}`);
    }
  }

  if (recipe.ingredients.length > 0) {
    lines.push("", `${CANONICAL_HEADERS.ingredients}:`, ...recipe.ingredients.map((item) => `- ${item}`));
  }
  if (recipe.steps.length > 0) {
    lines.push("", `${CANONICAL_HEADERS.steps}:`, ...recipe.steps.map((step, index) => `${index + 1}. ${step}`));
  }
  if (recipe.images.length > 0) {
    lines.push("", `${CANONICAL_HEADERS.images}:`, ...recipe.images.map((url) => `- ${url}`));
  }

  return lines.join("\n");
}

export function formatRecipes(recipes: readonly Recipe[], separator = "/"): string {
  return `${recipes.map((recipe) => formatRecipe(recipe, separator)).join("\n\n\n")}\n`;
}
