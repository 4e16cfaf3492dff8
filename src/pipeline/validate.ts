import Ajv, { ErrorObject, ValidateFunction } from "ajv";

import { Report, ValidationResult } from "./types";

const stringArray = { type: "array", items: { type: "string" } } as const;

const analysisSchema = {
  type: "object",
  required: ["score", "issues", "warnings", "healthHints", "messages", "missingMetadata", "health"],
  properties: {
    score: { type: "integer", minimum: 0, maximum: 100 },
    issues: {
      type: "array",
      uniqueItems: true,
      items: { enum: ["EMPTY_TITLE", "NO_INGREDIENTS", "NO_STEPS"] },
    },
    warnings: {
      type: "array",
      uniqueItems: true,
      items: {
        enum: [
          "UNSTRUCTURED_SOURCE",
          "SUSPECT_IMAGE_URL",
          "MISSING_METADATA",
          "MISSING_CATEGORY",
          "VAGUE_QUANTITIES",
        ],
      },
    },
    healthHints: stringArray,
    messages: stringArray,
    missingMetadata: stringArray,
    health: {
      type: "object",
      required: ["riskFlags", "protectiveHits"],
      properties: {
        riskFlags: stringArray,
        protectiveHits: { type: "integer", minimum: 0 },
      },
    },
  },
} as const;

const reportSchema = {
  type: "object",
  required: ["summary", "items", "similarCandidates", "healthDisclaimer"],
  properties: {
    summary: {
      type: "object",
      required: [
        "count",
        "averageScore",
        "totalIssues",
        "totalWarnings",
        "structuredCount",
        "fallbackCount",
        "sections",
        "similarCandidates",
      ],
      properties: {
        count: { type: "integer", minimum: 0 },
        averageScore: { type: "number", minimum: 0, maximum: 100 },
        totalIssues: { type: "integer", minimum: 0 },
        totalWarnings: { type: "integer", minimum: 0 },
        structuredCount: { type: "integer", minimum: 0 },
        fallbackCount: { type: "integer", minimum: 0 },
        sections: {
          type: "array",
          items: {
            type: "object",
            required: ["section", "count"],
            properties: {
              section: { type: "string", minLength: 1 },
              count: { type: "integer", minimum: 1 },
            },
          },
        },
        similarCandidates: { type: "integer", minimum: 0 },
      },
    },
    items: {
      type: "array",
      items: {
        type: "object",
        required: [
          "index",
          "title",
          "displayTitle",
          "destination",
          "parseMode",
          "ingredients",
          "steps",
          "images",
          "analysis",
        ],
        properties: {
          index: { type: "integer", minimum: 0 },
          title: { type: "string" },
          displayTitle: { type: "string" },
          destination: { type: "string", minLength: 1 },
          parseMode: { enum: ["structured", "fallback"] },
          ingredients: stringArray,
          steps: stringArray,
          images: stringArray,
          analysis: analysisSchema,
        },
      },
    },
    similarCandidates: {
      type: "array",
      items: {
        type: "object",
        required: ["a", "b", "similarity"],
        properties: {
          a: { type: "integer", minimum: 0 },
          b: { type: "integer", minimum: 0 },
          similarity: { type: "number", minimum: 0, maximum: 1 },
        },
      },
    },
    healthDisclaimer: { type: "string", minLength: 1 },
  },
  additionalProperties: false,
} as const;

const categoryMappingSchema = {
  type: "object",
  propertyNames: { minLength: 1 },
  additionalProperties: { type: "string", minLength: 1 },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** `/items/0/analysis` plus a missing property becomes `$.items[0].analysis.score`. */
function errorLocation(error: ErrorObject): string {
  const pointer = error.instancePath.split("/").slice(1);
  const missing: unknown = error.params.missingProperty;
  const keys = typeof missing === "string" ? [...pointer, missing] : pointer;

  return keys.reduce((location, rawKey) => {
    const key = rawKey.replace(/~1/g, "/").replace(/~0/g, "~");
    if (/^\d+$/.test(key)) {
      return `${location}[${key}]`;
    }
    return IDENTIFIER.test(key) ? `${location}.${key}` : `${location}[${JSON.stringify(key)}]`;
  }, "$");
}

function describeAjvError(error: ErrorObject): string {
  return `${errorLocation(error)} ${error.message ?? "is invalid"}`;
}

function toResult(validateSchema: ValidateFunction, value: unknown): ValidationResult {
  if (validateSchema(value)) {
    return { ok: true, errors: [] };
  }
  const errors = (validateSchema.errors ?? []).map((error) => describeAjvError(error));
  return { ok: false, errors };
}

const validateReportSchema = ajv.compile(reportSchema);
const validateMappingSchema = ajv.compile<Record<string, string>>(categoryMappingSchema);

export function validateReport(report: Report): ValidationResult {
  return toResult(validateReportSchema, report);
}

export type MappingCheck =
  | { ok: true; mapping: Record<string, string> }
  | { ok: false; errors: string[] };

export function checkCategoryMapping(value: unknown): MappingCheck {
  if (validateMappingSchema(value)) {
    return { ok: true, mapping: value };
  }
  return { ok: false, errors: toResult(validateMappingSchema, value).errors };
}
