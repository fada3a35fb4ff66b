/**
 * Triadic vector primitives
 *
 * Construction, validation and the small amount of 3-space arithmetic the
 * metrics, the tracker and the field share.
 */

import { TriadicVectorSchema } from './types.js';
import type { TriadicTuple, TriadicVector } from './types.js';
import { ValidationError } from './errors.js';
import { describeIssues, parseInput } from './validation.js';
import { err, ok } from './result.js';
import type { Result } from './result.js';

// =============================================================================
// Construction
// =============================================================================

export function vec(a: number, b: number, c: number): TriadicVector {
  return { a, b, c };
}

export function toTuple(v: TriadicVector): TriadicTuple {
  return [v.a, v.b, v.c];
}

export function fromTuple(tuple: TriadicTuple): TriadicVector {
  return vec(tuple[0], tuple[1], tuple[2]);
}

/**
 * Validate untrusted input without throwing.
 */
export function parseVector(input: unknown): Result<TriadicVector, ValidationError> {
  const parsed = TriadicVectorSchema.safeParse(input);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    return err(new ValidationError(`Invalid triadic vector: ${issues.join('; ')}`, issues));
  }
  return ok(vec(parsed.data.a, parsed.data.b, parsed.data.c));
}

/**
 * Validate untrusted input, throwing ValidationError on non-finite components.
 */
export function assertVector(input: unknown): TriadicVector {
  const parsed = parseInput(TriadicVectorSchema, input, 'triadic vector');
  return vec(parsed.a, parsed.b, parsed.c);
}

// =============================================================================
// Arithmetic
// =============================================================================

export function magnitude(v: TriadicVector): number {
  return Math.hypot(v.a, v.b, v.c);
}

export function subtract(left: TriadicVector, right: TriadicVector): TriadicVector {
  return vec(left.a - right.a, left.b - right.b, left.c - right.c);
}

/**
 * Euclidean distance
 */
export function distance(left: TriadicVector, right: TriadicVector): number {
  return Math.hypot(left.a - right.a, left.b - right.b, left.c - right.c);
}

/**
 * Largest single-component difference (Chebyshev distance)
 */
export function maxComponentDelta(left: TriadicVector, right: TriadicVector): number {
  return Math.max(
    Math.abs(left.a - right.a),
    Math.abs(left.b - right.b),
    Math.abs(left.c - right.c)
  );
}

/**
 * Move `from` a fraction `t` of the way toward `to`. Weighted-sum form:
 * for `t` in [0, 1] the result stays finite whenever both ends are.
 */
export function lerp(from: TriadicVector, to: TriadicVector, t: number): TriadicVector {
  const keep = 1 - t;
  return vec(
    from.a * keep + to.a * t,
    from.b * keep + to.b * t,
    from.c * keep + to.c * t
  );
}

function meanOf(values: number[]): number {
  const total = values.reduce((sum, value) => sum + value, 0);
  if (Number.isFinite(total)) {
    return total / values.length;
  }
  // Sum overflowed: average the scaled values instead
  return values.reduce((sum, value) => sum + value / values.length, 0);
}

/**
 * Component-wise mean. Undefined (null) for an empty list.
 */
export function meanVector(vectors: readonly TriadicVector[]): TriadicVector | null {
  if (vectors.length === 0) {
    return null;
  }

  return vec(
    meanOf(vectors.map((v) => v.a)),
    meanOf(vectors.map((v) => v.b)),
    meanOf(vectors.map((v) => v.c))
  );
}
