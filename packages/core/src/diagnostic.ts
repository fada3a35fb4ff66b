import type { CoherenceDiagnostic, TriadicVector } from './types.js';
import { balance, entropy, strength } from './vector-metrics.js';
import { decayDetected, stability } from './history-analytics.js';

/** Weights of the aggregate health score; they sum to 1 */
export const HEALTH_WEIGHTS = {
  strength: 0.4,
  balance: 0.3,
  entropy: 0.2,
  stability: 0.1,
} as const;

/**
 * Bundle strength, balance and entropy, plus stability and decay when a
 * history of prior vectors is given, into one record with a health score.
 *
 * Without history, stability counts as 1 in the health score.
 */
export function diagnostic(
  a: number,
  b: number,
  c: number,
  history?: readonly TriadicVector[]
): CoherenceDiagnostic {
  const result: CoherenceDiagnostic = {
    strength: strength(a, b, c),
    balance: balance(a, b, c),
    entropy: entropy(a, b, c),
    healthScore: 0,
  };

  if (history && history.length > 0) {
    result.stability = stability(history);
    result.decayDetected = decayDetected(history);
  }

  result.healthScore =
    result.strength * HEALTH_WEIGHTS.strength +
    result.balance * HEALTH_WEIGHTS.balance +
    result.entropy * HEALTH_WEIGHTS.entropy +
    (result.stability ?? 1) * HEALTH_WEIGHTS.stability;

  return result;
}
