/**
 * Guarded division shared by AOV, the KPI average and segment prices.
 * A zero denominator or a non-finite quotient yields 0.
 */
export function safeDivide(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  const q = numerator / denominator;
  return Number.isFinite(q) ? q : 0;
}

export function finiteOrZero(x: number): number {
  return Number.isFinite(x) ? x : 0;
}
