/**
 * Transition: the change between two adjacent snapshots
 *
 * Classification order (first match wins):
 * 1. collapse        strong → weak
 * 2. emergence       weak → strong
 * 3. phase_transition  Euclidean jump above the jump threshold
 * 4. amplification   every magnitude grows while strength stays in band
 * 5. none
 */

import { z } from 'zod';
import { distance, strength, subtract } from '@triadic/core';
import type { TriadicVector } from '@triadic/core';

export const TransitionKindSchema = z.enum([
  'none',
  'emergence',
  'collapse',
  'amplification',
  'phase_transition',
]);

export type TransitionKind = z.infer<typeof TransitionKindSchema>;

export type CriticalKind = Exclude<TransitionKind, 'none'>;

export const TRANSITION_KINDS: readonly TransitionKind[] = TransitionKindSchema.options;

/**
 * One recorded observation. Frozen once created.
 */
export interface Snapshot {
  /** 0-based position in the tracker history */
  readonly index: number;
  /** Strictly increasing; supplied by the tracker's clock or the caller */
  readonly timestamp: number;
  readonly vector: TriadicVector;
}

export interface Transition {
  readonly from: Snapshot;
  readonly to: Snapshot;
  /** Component-wise `to - from` */
  readonly delta: TriadicVector;
  /** Euclidean length of `delta` */
  readonly magnitude: number;
  readonly kind: TransitionKind;
}

export interface CriticalEvent {
  readonly kind: CriticalKind;
  readonly from: Snapshot;
  readonly to: Snapshot;
  readonly magnitude: number;
  readonly description: string;
}

export interface TransitionThresholds {
  lowStrength: number;
  highStrength: number;
  jumpThreshold: number;
  amplificationBand: [number, number];
}

function withinBand(value: number, band: [number, number]): boolean {
  return value >= band[0] && value <= band[1];
}

export function classifyTransition(
  prev: TriadicVector,
  curr: TriadicVector,
  thresholds: TransitionThresholds
): TransitionKind {
  const before = strength(prev.a, prev.b, prev.c);
  const after = strength(curr.a, curr.b, curr.c);

  if (before > thresholds.highStrength && after < thresholds.lowStrength) {
    return 'collapse';
  }
  if (before < thresholds.lowStrength && after > thresholds.highStrength) {
    return 'emergence';
  }
  if (distance(prev, curr) > thresholds.jumpThreshold) {
    return 'phase_transition';
  }

  const grew =
    Math.abs(curr.a) > Math.abs(prev.a) &&
    Math.abs(curr.b) > Math.abs(prev.b) &&
    Math.abs(curr.c) > Math.abs(prev.c);
  if (grew && withinBand(before, thresholds.amplificationBand) && withinBand(after, thresholds.amplificationBand)) {
    return 'amplification';
  }

  return 'none';
}

export function buildTransition(
  from: Snapshot,
  to: Snapshot,
  thresholds: TransitionThresholds
): Transition {
  return Object.freeze({
    from,
    to,
    delta: Object.freeze(subtract(to.vector, from.vector)),
    magnitude: distance(from.vector, to.vector),
    kind: classifyTransition(from.vector, to.vector, thresholds),
  });
}

export function describeTransition(transition: Transition): string {
  const before = strength(transition.from.vector.a, transition.from.vector.b, transition.from.vector.c);
  const after = strength(transition.to.vector.a, transition.to.vector.b, transition.to.vector.c);

  switch (transition.kind) {
    case 'collapse':
      return `Strength collapsed from ${before.toFixed(2)} to ${after.toFixed(2)}`;
    case 'emergence':
      return `Strength emerged from ${before.toFixed(2)} to ${after.toFixed(2)}`;
    case 'phase_transition':
      return `Large state jump (magnitude: ${transition.magnitude.toFixed(2)})`;
    case 'amplification':
      return `All components amplified (strength ${before.toFixed(2)} → ${after.toFixed(2)})`;
    case 'none':
      return 'No significant change';
  }
}
