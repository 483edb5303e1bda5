/**
 * Small numeric helpers for performance metrics
 */

export function sum(values: readonly number[]): number {
  return values.reduce((acc, value) => acc + value, 0);
}

export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

// Deviations this small relative to the mean are rounding residue of a constant series
const RELATIVE_STD_TOLERANCE = 1e-10;

/**
 * Sample standard deviation (n - 1 denominator); 0 for fewer than two values or a constant series
 */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const avg = mean(values);
  const squared = values.reduce((acc, value) => acc + (value - avg) ** 2, 0);
  const deviation = Math.sqrt(squared / (values.length - 1));
  return deviation <= RELATIVE_STD_TOLERANCE * Math.abs(avg) ? 0 : deviation;
}

/**
 * Period-over-period fractional changes, skipping pairs whose base is zero
 */
export function pctChange(values: readonly number[]): number[] {
  const changes: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const previous = values[i - 1];
    if (previous !== 0) {
      changes.push(values[i] / previous - 1);
    }
  }
  return changes;
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
