export function rate(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

export function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}
