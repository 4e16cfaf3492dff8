import { mappingKey, splitCategory } from "./category";
import { CategoryMapping, Recipe, RouteConfig, RoutedRecipe } from "./types";

export const DEFAULT_SECTION = "Inbox";

export function resolveDestination(
  category: string,
  subcategory: string | undefined,
  mapping: CategoryMapping,
  config: Pick<RouteConfig, "separator" | "defaultSection">,
): string {
  if (!category) {
    return config.defaultSection;
  }
  if (subcategory) {
    const exact = mapping.get(mappingKey(`${category}${config.separator}${subcategory}`));
    if (exact) {
      return exact;
    }
  }
  return mapping.get(mappingKey(category)) ?? category;
}

/**
 * Resolves the destination section and display title. The parsed `title` is left
 * as it was so routed and unrouted recipes stay comparable.
 */
export function route(recipe: Recipe, mapping: CategoryMapping, config: RouteConfig): RoutedRecipe {
  let category = recipe.category.trim();
  let subcategory = recipe.subcategory?.trim() || undefined;
  if (!subcategory && category.includes(config.separator)) {
    ({ category, subcategory } = splitCategory(category, config.separator));
  }

  const destination = resolveDestination(category, subcategory, mapping, config);
  const displayTitle =
    config.titlePrefix && subcategory ? `[${subcategory}] ${recipe.title}` : recipe.title;

  return {
    ...recipe,
    ingredients: [...recipe.ingredients],
    steps: [...recipe.steps],
    images: [...recipe.images],
    destination,
    displayTitle,
  };
}
