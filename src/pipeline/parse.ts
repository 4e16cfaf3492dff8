import { parseFallback } from "./fallback";
import { normalize } from "./normalize";
import { segment } from "./segment";
import { parseStructured } from "./structured";
import { ParseConfig, Recipe, RecipeBlock } from "./types";

export type ParseHooks = {
  /** Called when a block is handed to the fallback parser. */
  onFallback?: (block: RecipeBlock, reason: string) => void;
};

export function parseBlock(block: RecipeBlock, config: ParseConfig, hooks: ParseHooks = {}): Recipe {
  const structured = parseStructured(block, config);
  if (structured.ok) {
    return structured.recipe;
  }
  hooks.onFallback?.(block, structured.reason);
  return parseFallback(block, config);
}

export function parseBlocks(
  blocks: readonly RecipeBlock[],
  config: ParseConfig,
  hooks: ParseHooks = {},
): Recipe[] {
  const recipes: Recipe[] = [];
  for (const block of blocks) {
    recipes.push(parseBlock(block, config, hooks));
  }
  return recipes;
}

export function parse(rawText: string, config: ParseConfig, hooks: ParseHooks = {}): Recipe[] {
  const { lines } = normalize(rawText);
  const { blocks } = segment(lines, { minBlankLines: config.minBlankLines });
  return parseBlocks(blocks, config, hooks);
}
