export type FieldKey =
  | "title"
  | "category"
  | "servings"
  | "time"
  | "difficulty"
  | "ingredients"
  | "steps"
  | "images";

/** Which field the scanner is currently filling; `none` before the first header. */
export type ScanState = FieldKey | "none";

export type ScalarField = "title" | "category" | "servings" | "time" | "difficulty";
export type ListField = "ingredients" | "steps" | "images";

export const HEADER_WORDS: Readonly<Record<FieldKey, readonly string[]>> = {
  title: ["titel", "title"],
  category: ["kategorie"],
  servings: ["portionen", "servieren"],
  time: ["zeit", "dauer", "zubereitungszeit"],
  difficulty: ["schwierigkeit", "schwierigkeitsgrad"],
  ingredients: ["zutaten"],
  steps: ["zubereitung", "anleitung"],
  images: ["bilder", "bild", "foto", "fotos", "image", "images"],
};

export const CANONICAL_HEADERS: Readonly<Record<FieldKey, string>> = {
  title: "Titel",
  category: "Kategorie",
  servings: "Portionen",
  time: "Zeit",
  difficulty: "Schwierigkeit",
  ingredients: "Zutaten",
  steps: "Zubereitung",
  images: "Bilder",
};

const headerLookup = new Map<string, FieldKey>(
  Object.entries(HEADER_WORDS).flatMap(([field, words]) =>
    words.map((word): [string, FieldKey] => [word, toFieldKey(field)]),
  ),
);

function toFieldKey(value: string): FieldKey {
  switch (value) {
    case "title":
    case "category":
    case "servings":
    case "time":
    case "difficulty":
    case "ingredients":
    case "steps":
    case "images":
      return value;
    default:
      throw new Error(`Unknown header field: ${value}`);
  }
}

export function isListField(field: FieldKey): field is ListField {
  return field === "ingredients" || field === "steps" || field === "images";
}

export const TITLE_HEADER = /^\s*(?:titel|title)\s*:/i;

const HEADER_LINE = /^\s*(\p{L}+)\s*(:)?\s*(.*)$/u;

export type HeaderMatch = {
  field: FieldKey;
  inline: string;
};

/**
 * Recognizes a header line. A header word may stand alone (colon optional) or be
 * followed by a colon and an inline value, e.g. `Zeit: 30 Minuten`.
 */
export function matchHeader(text: string): HeaderMatch | null {
  const match = text.match(HEADER_LINE);
  if (!match) {
    return null;
  }
  const [, word, colon, rest] = match;
  const field = headerLookup.get(word.toLowerCase());
  if (!field) {
    return null;
  }
  const inline = rest.trim();
  if (!colon && inline.length > 0) {
    return null;
  }
  return { field, inline };
}

const bulletMarker = /^[-*•–]\s*(?=\S)/;
const ordinalMarker = /^\d+[.)]\s+/;

export function stripListMarker(text: string): string {
  return text.trim().replace(bulletMarker, "").replace(ordinalMarker, "").trim();
}

export function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

const TRANSLITERATIONS: Readonly<Record<string, string>> = {
  ä: "ae",
  ö: "oe",
  ü: "ue",
  ß: "ss",
};

/** Lower-cases and spells out German umlauts and ß. */
export function foldGerman(value: string): string {
  return value.toLowerCase().replace(/[äöüß]/g, (char) => TRANSLITERATIONS[char] ?? char);
}
