import { z } from "zod";
import type { StructureStats } from "../types/runResult";

const BlockSchema = z.object({ type: z.unknown() });

const SectionSchema = z.object({
  content: z.array(BlockSchema).optional()
});

const StructuredDocumentSchema = z.object({
  sections: z.array(SectionSchema).optional()
});

/**
 * Counts sections, paragraphs and tables in a structured-output payload.
 * Returns null when the payload is not JSON or not shaped like a document.
 */
export function extractStructureStats(payload: Uint8Array | string): StructureStats | null {
  const text = typeof payload === "string" ? payload : Buffer.from(payload).toString("utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }

  const parsed = StructuredDocumentSchema.safeParse(raw);
  if (!parsed.success) return null;

  const sections = parsed.data.sections ?? [];
  let paragraphs = 0;
  let tables = 0;
  for (const section of sections) {
    for (const block of section.content ?? []) {
      if (block.type === "paragraph") paragraphs += 1;
      else if (block.type === "table") tables += 1;
    }
  }
  return { sections: sections.length, paragraphs, tables };
}
