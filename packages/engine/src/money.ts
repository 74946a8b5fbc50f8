/**
 * @payadvance/engine — Cent rounding and dollar formatting.
 *
 * Amounts are IEEE 754 doubles. Rounding to cents happens at fixed
 * points in the calculations (payment, totals, schedule rows), never
 * implicitly.
 */

/**
 * Round to 2 decimal places, ties to even on the scaled value.
 *
 * 88.8487 → 88.85
 * 0.125   → 0.12
 * 0.135   → 0.14
 */
export function roundCents(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let rounded: number;
  if (diff > 0.5) {
    rounded = floor + 1;
  } else if (diff < 0.5) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor : floor + 1;
  }

  // + 0 normalises -0
  return rounded / 100 + 0;
}

const DOLLARS = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Format an amount with thousands separators and two decimals.
 *
 * 1000 → "1,000.00"
 */
export function formatDollars(value: number): string {
  return DOLLARS.format(value);
}
