import type { Aggregate } from "../aggregate/aggregate";
import { CATEGORY_BUCKETS, type PerBucket } from "../types/category";
import type { GateDecision, GateSummary, GateThresholds } from "../types/gateSummary";
import { round4 } from "../utils/number";

export interface GateSummaryParams {
  timestamp: string;
  generatedAt: string;
  aggregate: Aggregate;
  thresholds: GateThresholds;
  decision: GateDecision;
  detailsPath: string;
  summaryPath: string;
}

function roundedRates(rates: PerBucket<number>): PerBucket<number> {
  const rounded: PerBucket<number> = { A: 0, B: 0, C: 0, unlabeled: 0 };
  for (const bucket of CATEGORY_BUCKETS) {
    rounded[bucket] = round4(rates[bucket]);
  }
  return rounded;
}

export function buildGateSummary(params: GateSummaryParams): GateSummary {
  const { aggregate } = params;
  return {
    timestamp: params.timestamp,
    generated_at: params.generatedAt,
    total_files: aggregate.total,
    ok: aggregate.ok,
    failed: aggregate.failed,
    per_category: {
      totals: aggregate.perCategory.totals,
      ok: aggregate.perCategory.ok,
      success_rate: roundedRates(aggregate.perCategory.successRate)
    },
    deterministic_rate: round4(aggregate.deterministicRate),
    markdown_deterministic_rate:
      aggregate.markdownDeterministicRate === null ? null : round4(aggregate.markdownDeterministicRate),
    timing_ms: aggregate.timing,
    failures_by_type: aggregate.failuresByType,
    thresholds: params.thresholds,
    // failures carry the unrounded rates the gate compared
    gate: params.decision,
    artifacts: {
      details_jsonl: params.detailsPath,
      summary_json: params.summaryPath
    },
    notes: {
      unlabeled:
        "Files without an A/B/C category in the manifest are counted under 'unlabeled' and are never gated."
    }
  };
}
