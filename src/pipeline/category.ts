import { promises as fs } from "fs";

import { ConfigError, describeError } from "../lib/errors";
import { CategoryMapping } from "./types";
import { checkCategoryMapping } from "./validate";

export type CategoryParts = {
  category: string;
  subcategory?: string;
};

/** Splits on the first separator occurrence; an empty sub part means no subcategory. */
export function splitCategory(value: string, separator: string): CategoryParts {
  const index = value.indexOf(separator);
  if (index < 0) {
    return { category: value.trim() };
  }
  const category = value.slice(0, index).trim();
  const subcategory = value.slice(index + separator.length).trim();
  return subcategory ? { category, subcategory } : { category };
}

export function mappingKey(value: string): string {
  return value.trim().toLowerCase();
}

function addEntry(mapping: Map<string, string>, rawKey: string, rawValue: string, source: string) {
  const key = mappingKey(rawKey);
  const value = rawValue.trim();
  if (!key || !value) {
    throw new ConfigError(`Category mapping entry "${source}" needs a key and a section name`, "categoryMap");
  }
  mapping.set(key, value);
}

function parseJsonMapping(text: string): Map<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Category mapping is not valid JSON: ${describeError(error)}`, "categoryMap");
  }

  const check = checkCategoryMapping(parsed);
  if (!check.ok) {
    throw new ConfigError(`Invalid category mapping: ${check.errors.join("; ")}`, "categoryMap");
  }

  const mapping = new Map<string, string>();
  for (const [key, value] of Object.entries(check.mapping)) {
    addEntry(mapping, key, value, `${key}=${value}`);
  }
  return mapping;
}

function parseKeyValueMapping(text: string): Map<string, string> {
  const mapping = new Map<string, string>();
  const segments = text
    .split(";")
    .map((segment) => segment.trim())
    .filter(Boolean);

  for (const segment of segments) {
    const separatorIndex = segment.indexOf("=");
    if (separatorIndex < 0) {
      throw new ConfigError(`Malformed category mapping entry "${segment}": expected key=value`, "categoryMap");
    }
    addEntry(mapping, segment.slice(0, separatorIndex), segment.slice(separatorIndex + 1), segment);
  }
  return mapping;
}

/**
 * Accepts either a JSON object (`{"suppe":"Suppen"}`) or `key=value;key2=value2`.
 * Keys are matched case-insensitively.
 */
export function parseCategoryMapping(input: string): CategoryMapping {
  const trimmed = input.trim();
  if (!trimmed) {
    return new Map();
  }
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    return parseJsonMapping(trimmed);
  }
  return parseKeyValueMapping(trimmed);
}

export type CategoryMappingSource = {
  inline?: string;
  file?: string;
};

/** Inline entries override entries read from the file. */
export async function loadCategoryMapping(source: CategoryMappingSource): Promise<CategoryMapping> {
  const merged = new Map<string, string>();

  if (source.file) {
    let raw: string;
    try {
      raw = await fs.readFile(source.file, "utf-8");
    } catch (error) {
      throw new ConfigError(
        `Cannot read category mapping file ${source.file}: ${describeError(error)}`,
        "categoryMapFile",
      );
    }
    for (const [key, value] of parseCategoryMapping(raw)) {
      merged.set(key, value);
    }
  }

  if (source.inline) {
    for (const [key, value] of parseCategoryMapping(source.inline)) {
      merged.set(key, value);
    }
  }

  return merged;
}
