import { CATEGORY_BUCKETS, type PerBucket, bucketFor } from "../types/category";
import type { TimingPercentiles } from "../types/gateSummary";
import type { RunResult } from "../types/runResult";
import { rate } from "../utils/number";

export interface CategoryBreakdown {
  totals: PerBucket<number>;
  ok: PerBucket<number>;
  successRate: PerBucket<number>;
}

export interface Aggregate {
  total: number;
  ok: number;
  failed: number;
  perCategory: CategoryBreakdown;
  /** Deterministic successes over successes; 0 when nothing succeeded. */
  deterministicRate: number;
  /** Null when no record carries a markdown verdict. */
  markdownDeterministicRate: number | null;
  timing: TimingPercentiles;
  failuresByType: Record<string, number>;
}

function zeroBuckets(): PerBucket<number> {
  return { A: 0, B: 0, C: 0, unlabeled: 0 };
}

/**
 * Selects `round(p * (n - 1))` from the sorted values, clamped to the list.
 * All percentiles are 0 for an empty list.
 */
export function percentiles(values: number[]): TimingPercentiles {
  if (values.length === 0) return { p50: 0, p95: 0, p99: 0 };
  const sorted = [...values].sort((a, b) => a - b);
  const pick = (p: number): number => {
    const index = Math.max(0, Math.min(sorted.length - 1, Math.round(p * (sorted.length - 1))));
    return sorted[index];
  };
  return { p50: pick(0.5), p95: pick(0.95), p99: pick(0.99) };
}

export function categoryBreakdown(results: RunResult[]): CategoryBreakdown {
  const totals = zeroBuckets();
  const ok = zeroBuckets();
  for (const result of results) {
    const bucket = bucketFor(result.category);
    totals[bucket] += 1;
    if (result.ok) ok[bucket] += 1;
  }
  const successRate = zeroBuckets();
  for (const bucket of CATEGORY_BUCKETS) {
    successRate[bucket] = rate(ok[bucket], totals[bucket]);
  }
  return { totals, ok, successRate };
}

export function failureHistogram(results: RunResult[]): Record<string, number> {
  const histogram: Record<string, number> = {};
  for (const result of results) {
    if (result.ok) continue;
    const key = result.error ?? "unknown";
    histogram[key] = (histogram[key] ?? 0) + 1;
  }
  return histogram;
}

export function aggregateResults(results: RunResult[]): Aggregate {
  const succeeded = results.filter((result) => result.ok);
  const deterministic = succeeded.filter((result) => result.deterministic === true).length;

  const withMarkdown = succeeded.filter((result) => result.md_deterministic !== null);
  const markdownDeterministic = withMarkdown.filter((result) => result.md_deterministic === true).length;

  return {
    total: results.length,
    ok: succeeded.length,
    failed: results.length - succeeded.length,
    perCategory: categoryBreakdown(results),
    deterministicRate: rate(deterministic, succeeded.length),
    markdownDeterministicRate: withMarkdown.length > 0 ? rate(markdownDeterministic, withMarkdown.length) : null,
    timing: percentiles(succeeded.map((result) => result.timing_ms)),
    failuresByType: failureHistogram(results)
  };
}
