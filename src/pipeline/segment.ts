import { isBlank, TITLE_HEADER } from "./headers";
import { BoundaryKind, Line, RecipeBlock, SegmentedText } from "./types";

export type SegmentOptions = {
  /** Consecutive blank lines that separate recipes when no title header is present. */
  minBlankLines?: number;
};

export const DEFAULT_MIN_BLANK_LINES = 2;

function toBlock(lines: Line[], boundary: BoundaryKind): RecipeBlock | null {
  let start = 0;
  let end = lines.length - 1;
  while (start <= end && isBlank(lines[start].text)) {
    start += 1;
  }
  while (end >= start && isBlank(lines[end].text)) {
    end -= 1;
  }
  if (start > end) {
    return null;
  }

  const trimmed = lines.slice(start, end + 1);
  return {
    startLine: trimmed[0].n,
    endLine: trimmed[trimmed.length - 1].n,
    lines: trimmed,
    boundary,
  };
}

function splitAtTitleHeaders(lines: Line[], starts: number[]): Line[][] {
  return starts.map((startIndex, index) => {
    const next = starts[index + 1];
    return lines.slice(startIndex, next ?? lines.length);
  });
}

function splitAtBlankRuns(lines: Line[], minBlankLines: number): Line[][] {
  const groups: Line[][] = [];
  let current: Line[] = [];
  let blankRun = 0;

  for (const line of lines) {
    if (isBlank(line.text)) {
      blankRun += 1;
      current.push(line);
      continue;
    }
    if (blankRun >= minBlankLines && current.some((entry) => !isBlank(entry.text))) {
      groups.push(current);
      current = [];
    }
    blankRun = 0;
    current.push(line);
  }
  groups.push(current);

  return groups;
}

export function segment(lines: Line[], options: SegmentOptions = {}): SegmentedText {
  if (lines.length === 0) {
    return { blocks: [] };
  }

  const minBlankLines = Math.max(1, options.minBlankLines ?? DEFAULT_MIN_BLANK_LINES);
  const titleStarts = lines
    .map((line, index) => (TITLE_HEADER.test(line.text) ? index : -1))
    .filter((index) => index >= 0);

  // Text before the first title header belongs to no recipe.
  const boundary: BoundaryKind = titleStarts.length > 0 ? "title-header" : "blank-lines";
  const groups =
    titleStarts.length > 0
      ? splitAtTitleHeaders(lines, titleStarts)
      : splitAtBlankRuns(lines, minBlankLines);

  const blocks: RecipeBlock[] = [];
  for (const group of groups) {
    const block = toBlock(group, boundary);
    if (block) {
      blocks.push(block);
    }
  }

  return { blocks };
}
