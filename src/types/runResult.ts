import type { Category } from "./category";

export type ErrorKind = "encrypted" | "distribution" | "size_limit" | "timeout" | "parse_error";

export interface StructureStats {
  sections: number;
  paragraphs: number;
  tables: number;
}

export interface RunResult {
  relpath: string;
  category: Category | null;
  size_bytes: number;
  ok: boolean;
  error: ErrorKind | null;
  timing_ms: number;

  // Determinism of the structured JSON output, set only when ok.
  out_sha256_a: string | null;
  out_sha256_b: string | null;
  deterministic: boolean | null;

  md_sha256_a: string | null;
  md_sha256_b: string | null;
  md_deterministic: boolean | null;

  sections: number | null;
  paragraphs: number | null;
  tables: number | null;
}
