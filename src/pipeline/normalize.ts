import { Line, NormalizedText } from "./types";

export function normalize(input: string): NormalizedText {
  const normalized = input.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  if (normalized.length === 0) {
    return { fullText: "", lines: [] };
  }

  const lines: Line[] = normalized.split("\n").map((text, index) => ({
    n: index + 1,
    text: text.replace(/\s+$/, ""),
  }));

  return {
    fullText: normalized,
    lines,
  };
}
