/**
 * Descriptive statistics over plain number series.
 *
 * All functions are total: short or empty series return 0.
 */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Population variance
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return values.reduce((acc, value) => acc + (value - m) * (value - m), 0) / values.length;
}

/**
 * Least-squares slope of `values` against their index (0, 1, 2, ...).
 */
export function linearSlope(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;

  const xMean = (n - 1) / 2;
  const yMean = mean(values);

  let numerator = 0;
  let denominator = 0;
  for (let i = 0; i < n; i++) {
    numerator += (i - xMean) * (values[i] - yMean);
    denominator += (i - xMean) * (i - xMean);
  }

  return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Successive differences: values[i + 1] - values[i]
 */
export function differences(values: readonly number[]): number[] {
  const result: number[] = [];
  for (let i = 1; i < values.length; i++) {
    result.push(values[i] - values[i - 1]);
  }
  return result;
}
