import { promises as fs } from "fs";
import path from "path";
import { foldGerman } from "./headers";
import { ImportEntry, RoutedRecipe } from "./types";

/** Destination for routed recipes; the directory sink below is the local one. */
export interface ImportSink {
  write(entries: readonly ImportEntry[]): Promise<void>;
}

export function slugify(value: string, fallback = "recipe"): string {
  return (
    foldGerman(value)
      .normalize("NFKD")
      .replace(/[\u0300-\u036f]/g, "")
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/(^-|-$)+/g, "")
      .slice(0, 80) || fallback
  );
}

export function toImportEntries(recipes: readonly RoutedRecipe[]): ImportEntry[] {
  return recipes.map((recipe) => ({
    section: recipe.destination,
    title: recipe.displayTitle,
    ingredients: [...recipe.ingredients],
    steps: [...recipe.steps],
    metadata: {
      category: recipe.category,
      ...(recipe.subcategory ? { subcategory: recipe.subcategory } : {}),
      servings: recipe.servings,
      time: recipe.time,
      difficulty: recipe.difficulty,
      images: [...recipe.images],
      sourceLines: {
        start: recipe.source.startLine,
        end: recipe.source.endLine,
      },
    },
  }));
}

export type IndexEntry = { section: string; title: string; path: string };

export async function emit(entries: readonly ImportEntry[], outDir: string): Promise<IndexEntry[]> {
  const sectionsDir = path.join(outDir, "sections");
  await fs.mkdir(sectionsDir, { recursive: true });

  const slugCounts = new Map<string, number>();
  const indexPayload: IndexEntry[] = [];

  for (const entry of entries) {
    const sectionSlug = slugify(entry.section, "section");
    const baseSlug = slugify(entry.title);
    const countKey = `${sectionSlug}/${baseSlug}`;
    const nextCount = (slugCounts.get(countKey) ?? 0) + 1;
    slugCounts.set(countKey, nextCount);
    const resolvedSlug = nextCount === 1 ? baseSlug : `${baseSlug}-${nextCount}`;
    const relativePath = `sections/${sectionSlug}/${resolvedSlug}.json`;

    indexPayload.push({
      section: entry.section,
      title: entry.title,
      path: relativePath,
    });

    await fs.mkdir(path.join(sectionsDir, sectionSlug), { recursive: true });
    await fs.writeFile(path.join(outDir, relativePath), JSON.stringify(entry, null, 2), "utf-8");
  }

  await fs.writeFile(path.join(outDir, "index.json"), JSON.stringify(indexPayload, null, 2), "utf-8");
  return indexPayload;
}

export function createDirectorySink(outDir: string): ImportSink {
  return {
    write: async (entries) => {
      await emit(entries, outDir);
    },
  };
}
