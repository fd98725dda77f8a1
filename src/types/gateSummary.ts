import type { PerBucket } from "./category";

export interface TimingPercentiles {
  p50: number;
  p95: number;
  p99: number;
}

export interface GateThresholds {
  min_corpus_size: number;
  min_success: {
    A: number;
    B: number;
    C: number;
  };
  min_deterministic_rate: number;
}

export type GateCheck = "corpus_size" | "success_A" | "success_B" | "success_C" | "deterministic_rate";

export interface GateFailure {
  check: GateCheck;
  actual: number;
  required: number;
}

export interface GateDecision {
  passed: boolean;
  failures: GateFailure[];
}

export interface GateSummary {
  timestamp: string;
  generated_at: string;
  total_files: number;
  ok: number;
  failed: number;
  per_category: {
    totals: PerBucket<number>;
    ok: PerBucket<number>;
    success_rate: PerBucket<number>;
  };
  deterministic_rate: number;
  markdown_deterministic_rate: number | null;
  timing_ms: TimingPercentiles;
  failures_by_type: Record<string, number>;
  thresholds: GateThresholds;
  gate: GateDecision;
  artifacts: {
    details_jsonl: string;
    summary_json: string;
  };
  notes: Record<string, string>;
}
