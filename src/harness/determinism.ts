export interface DeterminismVerdict {
  sha_a: string;
  sha_b: string;
  deterministic: boolean;
}

/**
 * Two independent outputs for the same input must be byte-identical. Takes
 * digests of the full streams so bytes past the capture limit still count.
 */
export function checkDeterminism(shaA: string, shaB: string): DeterminismVerdict {
  return { sha_a: shaA, sha_b: shaB, deterministic: shaA === shaB };
}
