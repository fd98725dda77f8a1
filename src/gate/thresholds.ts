import type { Aggregate } from "../aggregate/aggregate";
import { CATEGORIES, type Category } from "../types/category";
import type { GateCheck, GateDecision, GateFailure, GateThresholds } from "../types/gateSummary";

const SUCCESS_CHECK: Record<Category, GateCheck> = {
  A: "success_A",
  B: "success_B",
  C: "success_C"
};

export const DEFAULT_THRESHOLDS: GateThresholds = {
  min_corpus_size: 100,
  min_success: {
    A: 0.95,
    B: 0.85,
    C: 0.8
  },
  min_deterministic_rate: 0.99
};

/**
 * Applies the thresholds to an aggregate. A category with no files cannot
 * fail the gate, and the unlabeled bucket is never checked.
 */
export function evaluateGate(aggregate: Aggregate, thresholds: GateThresholds): GateDecision {
  const failures: GateFailure[] = [];

  if (aggregate.total < thresholds.min_corpus_size) {
    failures.push({ check: "corpus_size", actual: aggregate.total, required: thresholds.min_corpus_size });
  }

  for (const category of CATEGORIES) {
    if (aggregate.perCategory.totals[category] === 0) continue;
    const actual = aggregate.perCategory.successRate[category];
    const required = thresholds.min_success[category];
    if (actual < required) {
      failures.push({ check: SUCCESS_CHECK[category], actual, required });
    }
  }

  if (aggregate.deterministicRate < thresholds.min_deterministic_rate) {
    failures.push({
      check: "deterministic_rate",
      actual: aggregate.deterministicRate,
      required: thresholds.min_deterministic_rate
    });
  }

  return { passed: failures.length === 0, failures };
}
