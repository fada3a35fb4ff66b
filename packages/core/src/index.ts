/**
 * @triadic/core - Metrics over three-component state vectors
 *
 * Layers:
 * - Vector: construction, validation, 3-space arithmetic
 * - VectorMetrics: strength, balance, entropy, alignment
 * - HistoryAnalytics: stability and decay over a history
 * - Support: statistics, errors, result type, logging
 */

export * from './types.js';
export * from './errors.js';
export * from './result.js';
export * from './logger.js';
export * from './validation.js';

export * from './vector.js';
export * from './statistics.js';
export * from './vector-metrics.js';
export * from './history-analytics.js';
export * from './diagnostic.js';
