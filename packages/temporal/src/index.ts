/**
 * @triadic/temporal - How a triadic state evolves over time
 *
 * Components:
 * - Transition: classification of the change between two snapshots
 * - EvolutionTracker: history, critical events, attractors, cycles, trend
 */

export * from './transition.js';
export * from './evolution-tracker.js';
