import dotenv from "dotenv";
import { z } from "zod";

import { ConfigError } from "./lib/errors";
import { LOG_LEVELS } from "./lib/log";
import { DEFAULT_SECTION } from "./pipeline/route";
import { DEFAULT_MIN_BLANK_LINES } from "./pipeline/segment";
import { DEFAULT_SIMILARITY_THRESHOLD } from "./pipeline/similarity";

const separatorSchema = z
  .string()
  .min(1, "must not be empty")
  .refine((value) => !/[\s=;]/.test(value), "must not contain whitespace, '=' or ';'");

const AppConfigSchema = z.object({
  inputPath: z.string().min(1).optional(),
  defaultSection: z.string().trim().min(1).default(DEFAULT_SECTION),
  categoryMap: z.string().optional(),
  categoryMapFile: z.string().min(1).optional(),
  separator: separatorSchema.default("/"),
  titlePrefix: z.boolean().default(false),
  similarityThreshold: z.number().gt(0).lte(1).default(DEFAULT_SIMILARITY_THRESHOLD),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  minBlankLines: z.number().int().min(1).default(DEFAULT_MIN_BLANK_LINES),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type ConfigOverrides = {
  inputPath?: string;
  defaultSection?: string;
  categoryMap?: string;
  categoryMapFile?: string;
  separator?: string;
  titlePrefix?: boolean;
  similarityThreshold?: number;
  logLevel?: string;
};

const ENV_NAMES: Readonly<Record<string, string>> = {
  inputPath: "REZEPTE_INPUT_FILE",
  defaultSection: "REZEPTE_SECTION",
  categoryMap: "REZEPTE_CATEGORY_MAP",
  categoryMapFile: "REZEPTE_CATEGORY_MAP_FILE",
  separator: "REZEPTE_SUBCATEGORY_SEPARATOR",
  titlePrefix: "REZEPTE_TITLE_PREFIX",
  similarityThreshold: "REZEPTE_SIMILARITY_THRESHOLD",
  logLevel: "REZEPTE_LOG_LEVEL",
};

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

function parseFlag(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  throw new ConfigError(`${name} must be one of true/false/1/0/yes/no, got "${value}"`, name);
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const threshold = envValue(env, ENV_NAMES.similarityThreshold);
  // Untrimmed: whitespace separators are rejected below.
  const separator = env[ENV_NAMES.separator];
  return {
    inputPath: envValue(env, ENV_NAMES.inputPath),
    defaultSection: envValue(env, ENV_NAMES.defaultSection),
    categoryMap: envValue(env, ENV_NAMES.categoryMap),
    categoryMapFile: envValue(env, ENV_NAMES.categoryMapFile),
    separator: separator === undefined || separator === "" ? undefined : separator,
    titlePrefix: parseFlag(ENV_NAMES.titlePrefix, envValue(env, ENV_NAMES.titlePrefix)),
    similarityThreshold: threshold === undefined ? undefined : Number(threshold),
    logLevel: envValue(env, ENV_NAMES.logLevel)?.toLowerCase(),
  };
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/** Loads `.env` into `process.env` without overriding variables already set. */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : {});
}

/**
 * Environment first, CLI overrides on top. Any invalid value aborts with a
 * ConfigError before input is read.
 */
export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  const merged = {
    ...withoutUndefined(fromEnv(env)),
    ...withoutUndefined(overrides),
  };

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => {
      const key = issue.path.join(".");
      const envName = ENV_NAMES[key];
      return `${envName ? `${key} (${envName})` : key}: ${issue.message}`;
    });
    throw new ConfigError(
      `Invalid configuration: ${details.join("; ")}`,
      parsed.error.issues[0]?.path.join("."),
    );
  }
  return parsed.data;
}
