/**
 * VectorMetrics: scalar diagnostics for triadic vectors
 *
 * - strength: saturating summary of the product a·b·c
 * - balance: how equal the three magnitudes are
 * - entropy: spread of the normalized distribution
 * - alignment: cosine similarity between two vectors
 *
 * Every function is total on finite input. Zero, negative and degenerate
 * inputs map to documented values (0, or 1 for a perfectly balanced vector)
 * and never to NaN or Infinity.
 */

import { z } from 'zod';
import type { TriadicVector } from './types.js';
import { parseParameter } from './validation.js';

/** Half-saturation constant: strength is 0.5 when a·b·c equals it */
export const DEFAULT_STRENGTH_SCALE = 1;

const StrengthScaleSchema = z.number().finite().positive();

const LN_3 = Math.log(3);

/**
 * Saturating strength in [0, 1]: `p / (p + k)` for `p = a·b·c > 0`, else 0.
 */
export function strength(a: number, b: number, c: number, k: number = DEFAULT_STRENGTH_SCALE): number {
  const scale = k === DEFAULT_STRENGTH_SCALE ? k : parseParameter(StrengthScaleSchema, k, 'strength scale');
  const product = a * b * c;

  if (!(product > 0)) return 0;
  if (!Number.isFinite(product)) return 1;

  return product / (product + scale);
}

/**
 * Balance in [0, 1]: `1 / (1 + cv)` over the magnitudes |a|, |b|, |c|,
 * where cv is the coefficient of variation. 0 for the zero vector.
 */
export function balance(a: number, b: number, c: number): number {
  const magnitudes = [Math.abs(a), Math.abs(b), Math.abs(c)];
  const largest = Math.max(...magnitudes);
  if (!(largest > 0) || !Number.isFinite(largest)) return 0;

  // Scale first; the ratio is scale invariant and this keeps squares finite
  const scaled = magnitudes.map((m) => m / largest);
  const mean = (scaled[0] + scaled[1] + scaled[2]) / 3;
  const variance = scaled.reduce((acc, x) => acc + (x - mean) * (x - mean), 0) / 3;
  const cv = Math.sqrt(variance) / mean;

  return 1 / (1 + cv);
}

/**
 * Normalized Shannon entropy in [0, 1] of `{a, b, c} / (a + b + c)`.
 *
 * Negative components contribute nothing to the distribution. A
 * non-positive sum is the degenerate case and yields 0.
 */
export function entropy(a: number, b: number, c: number): number {
  if (!(a + b + c > 0)) return 0;

  const positives = [Math.max(a, 0), Math.max(b, 0), Math.max(c, 0)];
  const largest = Math.max(...positives);
  if (!Number.isFinite(largest)) return 0;

  const scaled = positives.map((p) => p / largest);
  const total = scaled[0] + scaled[1] + scaled[2];

  let h = 0;
  for (const value of scaled) {
    const q = value / total;
    if (q > 0) {
      h -= q * Math.log(q);
    }
  }

  return Math.min(1, Math.max(0, h / LN_3));
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero magnitude.
 */
export function alignment(left: TriadicVector, right: TriadicVector): number {
  const leftScale = Math.max(Math.abs(left.a), Math.abs(left.b), Math.abs(left.c));
  const rightScale = Math.max(Math.abs(right.a), Math.abs(right.b), Math.abs(right.c));
  if (!(leftScale > 0) || !(rightScale > 0)) return 0;
  if (!Number.isFinite(leftScale) || !Number.isFinite(rightScale)) return 0;

  const la = left.a / leftScale;
  const lb = left.b / leftScale;
  const lc = left.c / leftScale;
  const ra = right.a / rightScale;
  const rb = right.b / rightScale;
  const rc = right.c / rightScale;

  const dot = la * ra + lb * rb + lc * rc;
  const leftNorm = la * la + lb * lb + lc * lc;
  const rightNorm = ra * ra + rb * rb + rc * rc;

  const cosine = dot / Math.sqrt(leftNorm * rightNorm);
  return Math.max(-1, Math.min(1, cosine));
}

/**
 * True when every component is non-zero.
 */
export function isCoherent(v: TriadicVector): boolean {
  return v.a !== 0 && v.b !== 0 && v.c !== 0;
}
