#!/usr/bin/env node
import { Command } from "commander";
import { promises as fs } from "fs";
import path from "path";
import { loadInput } from "./adapters";
import { AppConfig, ConfigOverrides, loadEnvFile, resolveConfig } from "./config";
import { ConfigError, describeError } from "./lib/errors";
import { createLogger, Logger } from "./lib/log";
import {
  createDirectorySink,
  formatRecipes,
  loadCategoryMapping,
  PipelineResult,
  Report,
  runPipeline,
  serializeReport,
  toImportEntries,
  validateReport,
} from "./pipeline";

export type CommandOptions = ConfigOverrides & {
  debugSegmentation?: boolean;
  env?: NodeJS.ProcessEnv;
};

type PreparedRun = {
  config: AppConfig;
  logger: Logger;
  inputPath: string;
  result: PipelineResult;
};

async function prepare(inputPath: string | undefined, options: CommandOptions): Promise<PreparedRun> {
  const { env, debugSegmentation, ...overrides } = options;
  const config = resolveConfig(env ?? process.env, {
    ...overrides,
    inputPath: inputPath ?? overrides.inputPath,
  });
  const logger = createLogger(config.logLevel);
  const mapping = await loadCategoryMapping({
    inline: config.categoryMap,
    file: config.categoryMapFile,
  });
  if (!config.inputPath) {
    throw new ConfigError("No input file: pass a path or set REZEPTE_INPUT_FILE", "inputPath");
  }

  const adapterOutput = await loadInput(config.inputPath);
  const result = runPipeline(adapterOutput.text, {
    parse: { separator: config.separator, minBlankLines: config.minBlankLines },
    route: {
      separator: config.separator,
      titlePrefix: config.titlePrefix,
      defaultSection: config.defaultSection,
    },
    mapping,
    similarityThreshold: config.similarityThreshold,
    hooks: {
      onFallback: (block, reason) => {
        logger.debug(`Lines ${block.startLine}-${block.endLine}: fallback parser (${reason})`);
      },
    },
  });

  if (debugSegmentation) {
    console.log("Segmentation debug:");
    for (const block of result.blocks) {
      console.log(`- Lines ${block.startLine}-${block.endLine}: ${block.boundary}`);
    }
  }

  result.recipes.forEach((recipe, index) => {
    const analysis = result.results[index];
    const label = recipe.title || `Lines ${recipe.source.startLine}-${recipe.source.endLine}`;
    analysis.messages.forEach((message, messageIndex) => {
      if (messageIndex < analysis.issues.length) {
        logger.warn(`${label}: ${message}`);
      } else {
        logger.debug(`${label}: ${message}`);
      }
    });
  });

  return { config, logger, inputPath: config.inputPath, result };
}

function summaryLines(report: Report): string[] {
  const { summary } = report;
  return [
    `Recipes found: ${summary.count}`,
    `Structured: ${summary.structuredCount}`,
    `Fallback: ${summary.fallbackCount}`,
    `Average quality score: ${summary.averageScore}`,
    `Issues: ${summary.totalIssues}`,
    `Warnings: ${summary.totalWarnings}`,
    `Similar candidates: ${summary.similarCandidates}`,
  ];
}

function assertValidReport(report: Report): void {
  const validation = validateReport(report);
  if (!validation.ok) {
    throw new Error(`Report failed schema validation:\n- ${validation.errors.join("\n- ")}`);
  }
}

async function writeFile(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf-8");
}

export type ParseCommandOptions = CommandOptions & {
  canonical?: boolean;
};

/** Dry run: parse and report per-recipe counts, nothing is written. */
export async function parseCommand(
  inputPath: string | undefined,
  options: ParseCommandOptions = {},
): Promise<PipelineResult> {
  const { canonical, ...rest } = options;
  const { config, logger, result } = await prepare(inputPath, rest);

  if (canonical) {
    process.stdout.write(formatRecipes(result.recipes, config.separator));
    return result;
  }

  for (const recipe of result.recipes) {
    logger.info(
      `Parsed recipe: ${recipe.title || "(untitled)"} | category=${recipe.category || "-"} | ` +
        `${recipe.ingredients.length} ingredients, ${recipe.steps.length} steps (${recipe.parseMode})`,
    );
  }
  logger.info(summaryLines(result.report).join("\n"));
  return result;
}

export type AnalyzeCommandOptions = CommandOptions & {
  report?: string;
};

export async function analyzeCommand(
  inputPath: string | undefined,
  options: AnalyzeCommandOptions = {},
): Promise<Report> {
  const { report: reportPath, ...rest } = options;
  const { logger, inputPath: resolvedInput, result } = await prepare(inputPath, rest);
  assertValidReport(result.report);

  const serialized = serializeReport(result.report);
  if (!reportPath) {
    process.stdout.write(serialized);
    return result.report;
  }

  await writeFile(reportPath, serialized);
  logger.info(summaryLines(result.report).join("\n"));
  logger.info(`Analyzed ${result.report.summary.count} recipe(s) from ${resolvedInput}; report: ${reportPath}`);
  return result.report;
}

export type ImportCommandOptions = CommandOptions & {
  out: string;
};

export async function importCommand(
  inputPath: string | undefined,
  options: ImportCommandOptions,
): Promise<Report> {
  const { out, ...rest } = options;
  const { logger, inputPath: resolvedInput, result } = await prepare(inputPath, rest);
  assertValidReport(result.report);

  const sink = createDirectorySink(out);
  await sink.write(toImportEntries(result.recipes));
  await writeFile(path.join(out, "report.json"), serializeReport(result.report));

  const sectionCount = result.report.summary.sections.length;
  logger.info(summaryLines(result.report).join("\n"));
  logger.info(
    `Imported ${result.recipes.length} recipe(s) into ${sectionCount} section(s) from ${resolvedInput}.`,
  );
  return result.report;
}

type RawCommonOptions = {
  categoryMap?: string;
  categoryMapFile?: string;
  separator?: string;
  titlePrefix?: boolean;
  defaultSection?: string;
  similarityThreshold?: number;
  logLevel?: string;
  debugSegmentation?: boolean;
};

function withCommonOptions(command: Command): Command {
  return command
    .option("--category-map <mapping>", "Category mapping as JSON or key=value;key2=value2")
    .option("--category-map-file <file>", "File holding the category mapping")
    .option("--separator <separator>", "Category/subcategory separator")
    .option("--title-prefix", "Prefix page titles with [Subcategory]")
    .option("--default-section <name>", "Section for recipes without a category")
    .option("--similarity-threshold <n>", "Minimum similarity for duplicate candidates", parseFloat)
    .option("--log-level <level>", "debug, info, warn or error")
    .option("--debug-segmentation", "Log segmentation debug details");
}

export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError ? 2 : 1;
}

const program = new Command();

if (require.main === module) {
  loadEnvFile();

  program
    .name("rezept-pipeline")
    .description("Parse, route and analyze recipes from a flat text file");

  withCommonOptions(
    program
      .command("parse")
      .description("Parse only and log what was found")
      .argument("[inputPath]", "Recipe text file (default: REZEPTE_INPUT_FILE)")
      .option("--canonical", "Print the recipes in the canonical header layout"),
  ).action(async (inputPath: string | undefined, options: RawCommonOptions & { canonical?: boolean }) => {
    await parseCommand(inputPath, options);
  });

  withCommonOptions(
    program
      .command("analyze")
      .description("Write the quality report")
      .argument("[inputPath]", "Recipe text file (default: REZEPTE_INPUT_FILE)")
      .option("--report <file>", "Report file (default: stdout)"),
  ).action(async (inputPath: string | undefined, options: RawCommonOptions & { report?: string }) => {
    await analyzeCommand(inputPath, options);
  });

  withCommonOptions(
    program
      .command("import")
      .description("Route recipes into sections and write them with the report")
      .argument("[inputPath]", "Recipe text file (default: REZEPTE_INPUT_FILE)")
      .requiredOption("--out <outDir>", "Output directory"),
  ).action(async (inputPath: string | undefined, options: RawCommonOptions & { out: string }) => {
    await importCommand(inputPath, options);
  });

  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(describeError(error));
    process.exitCode = exitCodeFor(error);
  });
}
