export type Line = { n: number; text: string };

export type NormalizedText = {
  fullText: string;
  lines: Line[];
};

export type BoundaryKind = "title-header" | "blank-lines";

export type RecipeBlock = {
  startLine: number;
  endLine: number;
  lines: Line[];
  boundary: BoundaryKind;
};

export type SegmentedText = {
  blocks: RecipeBlock[];
};

export type ParseMode = "structured" | "fallback";

export type Recipe = {
  title: string;
  category: string;
  subcategory?: string;
  servings: string;
  time: string;
  difficulty: string;
  ingredients: string[];
  steps: string[];
  images: string[];
  parseMode: ParseMode;
  source: {
    startLine: number;
    endLine: number;
  };
};

export type RoutedRecipe = Recipe & {
  destination: string;
  displayTitle: string;
};

export type ParseConfig = {
  separator: string;
  minBlankLines?: number;
};

export type RouteConfig = {
  separator: string;
  titlePrefix: boolean;
  defaultSection: string;
};

export type CategoryMapping = ReadonlyMap<string, string>;

export type IssueCode = "EMPTY_TITLE" | "NO_INGREDIENTS" | "NO_STEPS";

export type WarningCode =
  | "UNSTRUCTURED_SOURCE"
  | "SUSPECT_IMAGE_URL"
  | "MISSING_METADATA"
  | "MISSING_CATEGORY"
  | "VAGUE_QUANTITIES";

export type MetadataField = "servings" | "time" | "difficulty";

export type RiskFlag = "processed_meat" | "red_meat" | "high_sugar" | "deep_frying";

export type HealthInfo = {
  riskFlags: RiskFlag[];
  protectiveHits: number;
};

export type AnalysisResult = {
  readonly score: number;
  readonly issues: readonly IssueCode[];
  readonly warnings: readonly WarningCode[];
  readonly healthHints: readonly string[];
  readonly messages: readonly string[];
  readonly missingMetadata: readonly MetadataField[];
  readonly health: Readonly<HealthInfo>;
};

export type ReportItem = {
  index: number;
  title: string;
  displayTitle: string;
  destination: string;
  parseMode: ParseMode;
  category: string;
  subcategory?: string;
  servings: string;
  time: string;
  difficulty: string;
  ingredients: string[];
  steps: string[];
  images: string[];
  source: Recipe["source"];
  analysis: AnalysisResult;
};

export type SimilarCandidate = {
  a: number;
  b: number;
  titles: [string, string];
  similarity: number;
};

/** Recipes routed to one section; summaries list these in first-seen order. */
export type SectionCount = {
  section: string;
  count: number;
};

export type ReportSummary = {
  count: number;
  averageScore: number;
  totalIssues: number;
  totalWarnings: number;
  structuredCount: number;
  fallbackCount: number;
  sections: SectionCount[];
  similarCandidates: number;
};

export type Report = {
  summary: ReportSummary;
  items: ReportItem[];
  similarCandidates: SimilarCandidate[];
  healthDisclaimer: string;
};

export type ValidationResult = {
  ok: boolean;
  errors: string[];
};

export type ImportEntry = {
  section: string;
  title: string;
  ingredients: string[];
  steps: string[];
  metadata: {
    category: string;
    subcategory?: string;
    servings: string;
    time: string;
    difficulty: string;
    images: string[];
    sourceLines: {
      start: number;
      end: number;
    };
  };
};

export type AdapterOutput = {
  kind: "text";
  text: string;
  meta: {
    sourcePath: string;
  };
};
