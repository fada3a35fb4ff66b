/**
 * EvolutionTracker: Track a Triadic State Over Time
 *
 * Keeps an append-only history of snapshots and derives from it:
 * - Transitions between adjacent snapshots, with a classification
 * - A critical-event log (every transition that is not `none`)
 * - Attractors: the longest run of near-identical states
 * - Cycles: the smallest period the recent window repeats with
 * - A coherence trend label over the strength series
 *
 * History is only ever cleared by `reset()`. Detection methods return
 * null or a neutral label on short histories instead of throwing.
 */

import { z } from 'zod';
import {
  assertVector,
  balance,
  createLogger,
  differences,
  distance,
  isCoherent,
  linearSlope,
  meanVector,
  parseConfig,
  parseParameter,
  stability,
  strength,
  strengthSeries,
  TimestampOrderError,
  ValidationError,
  variance,
} from '@triadic/core';
import type { Logger, StabilityOptions, TriadicVector } from '@triadic/core';
import {
  buildTransition,
  classifyTransition,
  describeTransition,
} from './transition.js';
import type {
  CriticalEvent,
  Snapshot,
  Transition,
  TransitionKind,
} from './transition.js';

export type CoherenceTrend = 'improving' | 'degrading' | 'stable' | 'chaotic';

/** Maps a sequence index to a timestamp */
export type Clock = (index: number) => number;

const Probability = z.number().min(0).max(1);
const NonNegative = z.number().finite().min(0);

export const EvolutionThresholdsSchema = z
  .object({
    /** Strength below this counts as weak */
    lowStrength: Probability,
    /** Strength above this counts as strong */
    highStrength: Probability,
    /** Euclidean step size above which a transition is a phase transition */
    jumpThreshold: z.number().finite().positive(),
    /** Inclusive strength band in which growth counts as amplification */
    amplificationBand: z.tuple([Probability, Probability]),
    /** |fitted change over the whole history| at or below this is a stable trend */
    trendSlopeEpsilon: NonNegative,
    /** Variance of step-to-step strength deltas above this is chaotic */
    chaoticVariance: NonNegative,
    attractorTolerance: NonNegative,
    attractorMinDuration: z.number().int().min(1),
    cycleWindow: z.number().int().min(2),
    cycleTolerance: NonNegative,
  })
  .refine((t) => t.lowStrength < t.highStrength, {
    message: 'lowStrength must be below highStrength',
    path: ['lowStrength'],
  })
  .refine((t) => t.amplificationBand[0] <= t.amplificationBand[1], {
    message: 'amplificationBand must be [min, max]',
    path: ['amplificationBand'],
  });

export type EvolutionThresholds = z.infer<typeof EvolutionThresholdsSchema>;

export interface EvolutionTrackerConfig extends EvolutionThresholds {
  clock: Clock;
  logger: Logger;
}

export const DEFAULT_EVOLUTION_THRESHOLDS: EvolutionThresholds = {
  lowStrength: 0.1,
  highStrength: 0.5,
  jumpThreshold: 2.0,
  amplificationBand: [0.1, 0.95],
  trendSlopeEpsilon: 0.005,
  chaoticVariance: 0.01,
  attractorTolerance: 0.1,
  attractorMinDuration: 5,
  cycleWindow: 20,
  cycleTolerance: 0.15,
};

const ToleranceSchema = NonNegative;
const DurationSchema = z.number().int().min(1);
const CycleWindowSchema = z.number().int().min(2);
const TrajectoryWindowSchema = z.number().int().min(1);
const TimestampSchema = z.number().finite();

/** Below this many snapshots the trend is reported as stable */
const MIN_TREND_SAMPLES = 3;

export interface ReportOptions {
  attractorTolerance?: number;
  attractorMinDuration?: number;
  cycleWindow?: number;
  cycleTolerance?: number;
  stability?: StabilityOptions;
}

export interface EvolutionReport {
  totalSnapshots: number;
  totalTransitions: number;
  current: Snapshot | null;
  currentValid: boolean;
  currentStrength: number | null;
  currentBalance: number | null;
  trend: CoherenceTrend;
  stability: number;
  attractor: TriadicVector | null;
  cycleLength: number | null;
  criticalEvents: CriticalEvent[];
  transitionCounts: Record<TransitionKind, number>;
}

export interface TrajectoryRow {
  index: number;
  timestamp: number;
  a: number;
  b: number;
  c: number;
  valid: boolean;
  strength: number;
  balance: number;
}

export class EvolutionTracker {
  private readonly thresholds: EvolutionThresholds;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private snapshots: Snapshot[] = [];
  private transitionLog: Transition[] = [];
  private events: CriticalEvent[] = [];

  constructor(config: Partial<EvolutionTrackerConfig> = {}) {
    const { clock, logger, ...overrides } = config;
    this.thresholds = parseConfig(
      EvolutionThresholdsSchema,
      { ...DEFAULT_EVOLUTION_THRESHOLDS, ...overrides },
      'EvolutionTracker'
    );
    this.clock = clock ?? ((index) => index);
    this.logger = logger ?? createLogger('EvolutionTracker');
  }

  // ===========================================================================
  // Recording
  // ===========================================================================

  /**
   * Append a snapshot. A rejected call (non-finite component, timestamp
   * out of order) leaves the history untouched.
   */
  record(a: number, b: number, c: number, timestamp?: number): Snapshot {
    let vector: TriadicVector;
    try {
      vector = assertVector({ a, b, c });
    } catch (error) {
      this.logger.warn(`Rejected snapshot #${this.snapshots.length}`, error);
      throw error;
    }

    const index = this.snapshots.length;
    const stamp = timestamp ?? this.clock(index);
    if (!TimestampSchema.safeParse(stamp).success) {
      throw new ValidationError(`Invalid timestamp for snapshot #${index}: ${String(stamp)}`);
    }

    const previous = index > 0 ? this.snapshots[index - 1] : undefined;
    if (previous && stamp <= previous.timestamp) {
      this.logger.warn(`Rejected snapshot #${index}: timestamp ${stamp} <= ${previous.timestamp}`);
      throw new TimestampOrderError(previous.timestamp, stamp);
    }

    const snapshot: Snapshot = Object.freeze({
      index,
      timestamp: stamp,
      vector: Object.freeze(vector),
    });

    if (previous) {
      const transition = buildTransition(previous, snapshot, this.thresholds);
      this.transitionLog.push(transition);

      if (transition.kind !== 'none') {
        const event: CriticalEvent = Object.freeze({
          kind: transition.kind,
          from: previous,
          to: snapshot,
          magnitude: transition.magnitude,
          description: describeTransition(transition),
        });
        this.events.push(event);
        this.logger.debug(`${event.kind} at #${index}: ${event.description}`);
      }
    }

    this.snapshots.push(snapshot);
    return snapshot;
  }

  recordVector(vector: TriadicVector, timestamp?: number): Snapshot {
    return this.record(vector.a, vector.b, vector.c, timestamp);
  }

  /**
   * Clear history, transitions and events. Sequence indices restart at 0.
   */
  reset(): void {
    this.snapshots = [];
    this.transitionLog = [];
    this.events = [];
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  get size(): number {
    return this.snapshots.length;
  }

  get current(): Snapshot | null {
    return this.snapshots.length > 0 ? this.snapshots[this.snapshots.length - 1] : null;
  }

  get history(): Snapshot[] {
    return [...this.snapshots];
  }

  get transitions(): Transition[] {
    return [...this.transitionLog];
  }

  get criticalEvents(): CriticalEvent[] {
    return [...this.events];
  }

  vectors(): TriadicVector[] {
    return this.snapshots.map((s) => s.vector);
  }

  /**
   * The most recent `window` snapshots.
   */
  trajectory(window: number = 10): Snapshot[] {
    const size = parseParameter(TrajectoryWindowSchema, window, 'trajectory window');
    return this.snapshots.slice(-size);
  }

  classifyTransition(prev: Snapshot | TriadicVector, curr: Snapshot | TriadicVector): TransitionKind {
    const from = 'vector' in prev ? prev.vector : prev;
    const to = 'vector' in curr ? curr.vector : curr;
    return classifyTransition(from, to, this.thresholds);
  }

  // ===========================================================================
  // Detection
  // ===========================================================================

  /**
   * Mean vector of the longest contiguous run whose snapshots differ pairwise
   * by at most `tolerance` in every component, if that run lasts at least
   * `minDuration` snapshots. The most recent run wins a tie.
   */
  detectAttractor(
    tolerance: number = this.thresholds.attractorTolerance,
    minDuration: number = this.thresholds.attractorMinDuration
  ): TriadicVector | null {
    const tol = parseParameter(ToleranceSchema, tolerance, 'attractor tolerance');
    const duration = parseParameter(DurationSchema, minDuration, 'attractor minDuration');

    const vectors = this.vectors();
    if (vectors.length < duration) {
      return null;
    }

    let bestStart = 0;
    let bestLength = 0;
    let start = 0;

    for (let end = 0; end < vectors.length; end++) {
      while (!withinRange(vectors, start, end, tol)) {
        start++;
      }
      const length = end - start + 1;
      if (length >= bestLength) {
        bestLength = length;
        bestStart = start;
      }
    }

    if (bestLength < duration) {
      return null;
    }
    return meanVector(vectors.slice(bestStart, bestStart + bestLength));
  }

  /**
   * Smallest period p (2 ≤ p ≤ window) with which the most recent `window`
   * snapshots repeat within `tolerance`. At least two full periods must be
   * available. A window that already repeats at lag 1 is a fixed point,
   * not a cycle.
   */
  detectCycle(
    window: number = this.thresholds.cycleWindow,
    tolerance: number = this.thresholds.cycleTolerance
  ): number | null {
    const size = parseParameter(CycleWindowSchema, window, 'cycle window');
    const tol = parseParameter(ToleranceSchema, tolerance, 'cycle tolerance');

    const recent = this.vectors().slice(-size);
    if (recent.length < 4 || repeatsAtLag(recent, 1, tol)) {
      return null;
    }

    for (let period = 2; period <= size && 2 * period <= recent.length; period++) {
      if (repeatsAtLag(recent, period, tol)) {
        return period;
      }
    }
    return null;
  }

  /**
   * Trend of the strength series over the full history:
   * - chaotic: step-delta variance above `chaoticVariance`
   * - improving / degrading: fitted change `slope · (n − 1)` beyond
   *   ±`trendSlopeEpsilon`, so the label does not depend on sampling density
   * - stable: otherwise, and for fewer than three snapshots
   */
  coherenceTrend(): CoherenceTrend {
    if (this.snapshots.length < MIN_TREND_SAMPLES) {
      return 'stable';
    }

    const strengths = strengthSeries(this.vectors());

    if (variance(differences(strengths)) > this.thresholds.chaoticVariance) {
      return 'chaotic';
    }

    const change = linearSlope(strengths) * (strengths.length - 1);
    if (change > this.thresholds.trendSlopeEpsilon) return 'improving';
    if (change < -this.thresholds.trendSlopeEpsilon) return 'degrading';
    return 'stable';
  }

  stability(options?: StabilityOptions): number {
    return stability(this.vectors(), options);
  }

  // ===========================================================================
  // Reporting
  // ===========================================================================

  report(options: ReportOptions = {}): EvolutionReport {
    const current = this.current;

    const transitionCounts: Record<TransitionKind, number> = {
      none: 0,
      emergence: 0,
      collapse: 0,
      amplification: 0,
      phase_transition: 0,
    };
    for (const transition of this.transitionLog) {
      transitionCounts[transition.kind]++;
    }

    return {
      totalSnapshots: this.snapshots.length,
      totalTransitions: this.transitionLog.length,
      current,
      currentValid: current !== null && isCoherent(current.vector),
      currentStrength: current ? strength(current.vector.a, current.vector.b, current.vector.c) : null,
      currentBalance: current ? balance(current.vector.a, current.vector.b, current.vector.c) : null,
      trend: this.coherenceTrend(),
      stability: this.stability(options.stability),
      attractor: this.detectAttractor(options.attractorTolerance, options.attractorMinDuration),
      cycleLength: this.detectCycle(options.cycleWindow, options.cycleTolerance),
      criticalEvents: this.criticalEvents,
      transitionCounts,
    };
  }

  exportTrajectory(): TrajectoryRow[] {
    return this.snapshots.map(({ index, timestamp, vector }) => ({
      index,
      timestamp,
      a: vector.a,
      b: vector.b,
      c: vector.c,
      valid: isCoherent(vector),
      strength: strength(vector.a, vector.b, vector.c),
      balance: balance(vector.a, vector.b, vector.c),
    }));
  }
}

// =============================================================================
// Helpers
// =============================================================================

function withinRange(
  vectors: readonly TriadicVector[],
  start: number,
  end: number,
  tolerance: number
): boolean {
  let minA = Infinity, maxA = -Infinity;
  let minB = Infinity, maxB = -Infinity;
  let minC = Infinity, maxC = -Infinity;

  for (let i = start; i <= end; i++) {
    const v = vectors[i];
    minA = Math.min(minA, v.a); maxA = Math.max(maxA, v.a);
    minB = Math.min(minB, v.b); maxB = Math.max(maxB, v.b);
    minC = Math.min(minC, v.c); maxC = Math.max(maxC, v.c);
  }

  return maxA - minA <= tolerance && maxB - minB <= tolerance && maxC - minC <= tolerance;
}

function repeatsAtLag(vectors: readonly TriadicVector[], lag: number, tolerance: number): boolean {
  for (let i = 0; i + lag < vectors.length; i++) {
    if (distance(vectors[i], vectors[i + lag]) > tolerance) {
      return false;
    }
  }
  return true;
}
