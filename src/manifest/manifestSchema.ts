import { z } from "zod";
import { normalizeCategory } from "../types/category";

// Lenient by construction: unknown keys are stripped and every optional field
// falls back to a default instead of rejecting the item.
const nullableString = z.string().nullable().catch(null);

const ManifestSourceSchema = z
  .object({
    url: nullableString,
    license_note: nullableString
  })
  .catch({ url: null, license_note: null });

export const ManifestItemSchema = z.object({
  relpath: z.string().min(1),
  id: nullableString,
  sha256: nullableString,
  size_bytes: z.number().int().nonnegative().nullable().catch(null),
  category: z.unknown().transform(normalizeCategory),
  flags: z.record(z.unknown()).catch({}),
  source: ManifestSourceSchema,
  notes: nullableString
});

export const CorpusManifestSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String).catch("unknown"),
  generated_from: nullableString,
  items: z.array(z.unknown()).catch([])
});

export type ManifestItem = z.infer<typeof ManifestItemSchema>;

export interface CorpusManifest {
  version: string;
  generated_from: string | null;
  items: ManifestItem[];
  skipped_items: number;
}
