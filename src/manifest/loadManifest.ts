import { promises as fs } from "fs";
import type { Category } from "../types/category";
import { type CorpusManifest, CorpusManifestSchema, type ManifestItem, ManifestItemSchema } from "./manifestSchema";

/** relpath -> category, iterated in manifest order. */
export type CategoryMap = Map<string, Category | null>;

function warn(message: string): void {
  console.error(`[corpus-gate] warning: ${message}`);
}

export function decodeManifest(raw: unknown): CorpusManifest | null {
  const parsed = CorpusManifestSchema.safeParse(raw);
  if (!parsed.success) return null;

  const items: ManifestItem[] = [];
  let skipped = 0;
  for (const rawItem of parsed.data.items) {
    const item = ManifestItemSchema.safeParse(rawItem);
    if (item.success) {
      items.push(item.data);
    } else {
      skipped += 1;
    }
  }

  return {
    version: parsed.data.version,
    generated_from: parsed.data.generated_from,
    items,
    skipped_items: skipped
  };
}

/**
 * Reads the corpus manifest. A missing, unreadable or malformed manifest
 * yields null so the run proceeds with every file unlabeled.
 */
export async function loadCorpusManifest(manifestPath: string): Promise<CorpusManifest | null> {
  let content: string;
  try {
    content = await fs.readFile(manifestPath, "utf8");
  } catch {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    warn(`manifest is not valid JSON (${manifestPath}): ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  const manifest = decodeManifest(raw);
  if (!manifest) {
    warn(`manifest has an unexpected shape, ignoring it: ${manifestPath}`);
    return null;
  }
  if (manifest.skipped_items > 0) {
    warn(`skipped ${manifest.skipped_items} malformed manifest item(s)`);
  }
  return manifest;
}

export function categoryMapFromManifest(manifest: CorpusManifest | null): CategoryMap {
  const map: CategoryMap = new Map();
  if (!manifest) return map;
  for (const item of manifest.items) {
    map.set(item.relpath, item.category);
  }
  return map;
}

export async function loadCategoryMap(manifestPath: string): Promise<CategoryMap> {
  return categoryMapFromManifest(await loadCorpusManifest(manifestPath));
}
