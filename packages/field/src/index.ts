/**
 * @triadic/field - Populations of interacting triadic entities
 *
 * - InteractionField: collective state, alignment clusters, phase checks
 * - CascadeSimulator: step-wise mutual alignment of a field
 */

export * from './interaction-field.js';
export * from './cascade-simulator.js';
