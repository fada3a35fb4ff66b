/**
 * HistoryAnalytics: stability and decay over an ordered vector history
 *
 * Both operate on the per-sample strength series. Short histories are not
 * an error: stability assumes a stable state and decay reports none.
 */

import { z } from 'zod';
import type { StabilityOptions, TriadicVector } from './types.js';
import { strength } from './vector-metrics.js';
import { linearSlope, variance } from './statistics.js';
import { parseParameter } from './validation.js';

export const DEFAULT_STABILITY_SENSITIVITY = 10;
export const DEFAULT_DECAY_THRESHOLD = 0.1;

/** Stability with fewer than two samples */
export const INSUFFICIENT_DATA_STABILITY = 1.0;

const MIN_DECAY_SAMPLES = 3;

const WindowSchema = z.number().int().min(2);
const SensitivitySchema = z.number().finite().positive();
const DecayThresholdSchema = z.number().min(0).max(1);

export function strengthSeries(history: readonly TriadicVector[]): number[] {
  return history.map((v) => strength(v.a, v.b, v.c));
}

/**
 * Stability in [0, 1]: `exp(-sensitivity · variance)` of the strength
 * series. A constant series is 1.0, growing variance tends to 0.
 */
export function stability(history: readonly TriadicVector[], options: StabilityOptions = {}): number {
  const sensitivity = parseParameter(
    SensitivitySchema,
    options.sensitivity ?? DEFAULT_STABILITY_SENSITIVITY,
    'sensitivity'
  );
  const window = options.window === undefined
    ? history.length
    : parseParameter(WindowSchema, options.window, 'window');

  const recent = history.length > window ? history.slice(-window) : history;
  if (recent.length < 2) {
    return INSUFFICIENT_DATA_STABILITY;
  }

  return Math.exp(-sensitivity * variance(strengthSeries(recent)));
}

/**
 * True when the least-squares slope of the strength series (per sample) is
 * below `-threshold`. Needs at least three samples.
 */
export function decayDetected(
  history: readonly TriadicVector[],
  threshold: number = DEFAULT_DECAY_THRESHOLD
): boolean {
  const cutoff = parseParameter(DecayThresholdSchema, threshold, 'decay threshold');
  if (history.length < MIN_DECAY_SAMPLES) {
    return false;
  }

  return linearSlope(strengthSeries(history)) < -cutoff;
}
