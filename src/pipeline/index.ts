export { normalize } from "./normalize";
export { segment } from "./segment";
export { parse, parseBlock, parseBlocks } from "./parse";
export type { ParseHooks } from "./parse";
export { parseStructured } from "./structured";
export { parseFallback, classifyLine } from "./fallback";
export { splitCategory, parseCategoryMapping, loadCategoryMapping } from "./category";
export { route, resolveDestination, DEFAULT_SECTION } from "./route";
export { analyze, HEALTH_DISCLAIMER } from "./analyze";
export { findSimilarCandidates } from "./similarity";
export { buildReport, serializeReport } from "./report";
export { formatRecipe, formatRecipes } from "./format";
export { validateReport } from "./validate";
export { emit, createDirectorySink, toImportEntries } from "./emit";
export type { ImportSink } from "./emit";
export { runPipeline } from "./run";
export type { PipelineOptions, PipelineResult } from "./run";
export * from "./types";
