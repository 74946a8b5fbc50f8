/**
 * @payadvance/engine — Advance fee.
 *
 * 5% of the advance, clamped to [MIN_FEE, MAX_FEE]. Small advances pay
 * proportionally more than 5%.
 */

export const FEE_RATE = 0.05;
export const MIN_FEE = 10;
export const MAX_FEE = 50;

/**
 * Fee charged on an advance. Zero unless the advance was approved.
 *
 * 100 → 10 (clamped up), 500 → 25, 2000 → 50 (clamped down)
 */
export function computeFee(advanceAmount: number, advanceApproved: boolean): number {
  if (!advanceApproved) {
    return 0;
  }
  return Math.max(MIN_FEE, Math.min(MAX_FEE, advanceAmount * FEE_RATE));
}
