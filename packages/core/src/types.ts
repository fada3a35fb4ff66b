/**
 * Core types for triadic state analysis
 */

import { z } from 'zod';

// =============================================================================
// Triadic Vector
// =============================================================================

export const TriadicVectorSchema = z.object({
  a: z.number().finite(),
  b: z.number().finite(),
  c: z.number().finite(),
});

/**
 * Three independent real-valued components describing one entity at one
 * point in time. Unconstrained in sign.
 */
export type TriadicVector = Readonly<z.infer<typeof TriadicVectorSchema>>;

export type TriadicTuple = readonly [number, number, number];

// =============================================================================
// Diagnostics
// =============================================================================

export interface CoherenceDiagnostic {
  strength: number;
  balance: number;
  entropy: number;
  /** Present only when a non-empty history was supplied */
  stability?: number;
  /** Present only when a non-empty history was supplied */
  decayDetected?: boolean;
  healthScore: number;
}

export interface StabilityOptions {
  /** Only the most recent `window` samples are considered (whole history by default) */
  window?: number;
  /** Exponent applied to the strength variance; larger = harsher */
  sensitivity?: number;
}
