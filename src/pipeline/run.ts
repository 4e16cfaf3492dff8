import { analyze } from "./analyze";
import { normalize } from "./normalize";
import { parseBlocks, ParseHooks } from "./parse";
import { buildReport } from "./report";
import { route } from "./route";
import { segment } from "./segment";
import {
  AnalysisResult,
  CategoryMapping,
  ParseConfig,
  RecipeBlock,
  Report,
  RouteConfig,
  RoutedRecipe,
} from "./types";

export type PipelineOptions = {
  parse: ParseConfig;
  route: RouteConfig;
  mapping: CategoryMapping;
  similarityThreshold?: number;
  hooks?: ParseHooks;
};

export type PipelineResult = {
  blocks: RecipeBlock[];
  recipes: RoutedRecipe[];
  results: AnalysisResult[];
  report: Report;
};

export function runPipeline(text: string, options: PipelineOptions): PipelineResult {
  const { lines } = normalize(text);
  const { blocks } = segment(lines, { minBlankLines: options.parse.minBlankLines });
  const parsed = parseBlocks(blocks, options.parse, options.hooks);
  const recipes = parsed.map((recipe) => route(recipe, options.mapping, options.route));
  const results = recipes.map((recipe) => analyze(recipe));
  const report = buildReport(recipes, results, {
    similarityThreshold: options.similarityThreshold,
  });

  return { blocks, recipes, results, report };
}
