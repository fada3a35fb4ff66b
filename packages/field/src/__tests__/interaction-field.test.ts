import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DuplicateEntityError,
  EntityNotFoundError,
  isErr,
  isOk,
  silentLogger,
  ValidationError,
  vec,
} from '@triadic/core';
import type { TriadicVector } from '@triadic/core';
import { InteractionField } from '../interaction-field.js';
import type { InteractionFieldConfig } from '../interaction-field.js';

function fieldOf(
  members: Record<string, TriadicVector>,
  config: Partial<InteractionFieldConfig> = {}
): InteractionField {
  const field = new InteractionField({ logger: silentLogger, ...config });
  for (const [id, vector] of Object.entries(members)) {
    field.add({ id, vector });
  }
  return field;
}

describe('InteractionField membership', () => {
  it('adds entities and lists them in identifier order', () => {
    const field = fieldOf({ c: vec(1, 1, 1), a: vec(2, 2, 2), b: vec(3, 3, 3) });
    expect(field.size).toBe(3);
    expect(field.ids()).toEqual(['a', 'b', 'c']);
    expect(field.entities().map((e) => e.id)).toEqual(['a', 'b', 'c']);
    expect(field.get('a')?.vector).toEqual(vec(2, 2, 2));
    expect(field.has('z')).toBe(false);
  });

  it('rejects a duplicate identifier and keeps the original', () => {
    const field = fieldOf({ a: vec(1, 1, 1) });
    expect(() => field.add({ id: 'a', vector: vec(5, 5, 5) })).toThrow(DuplicateEntityError);
    expect(field.get('a')?.vector).toEqual(vec(1, 1, 1));
    expect(field.size).toBe(1);
  });

  it('rejects invalid entities', () => {
    const field = fieldOf({});
    expect(() => field.add({ id: '', vector: vec(1, 1, 1) })).toThrow(ValidationError);
    expect(() => field.add({ id: 'x', vector: vec(Number.NaN, 1, 1) })).toThrow(ValidationError);
    expect(field.size).toBe(0);
  });

  it('reports rejected insertions as results from tryAdd', () => {
    const field = fieldOf({ a: vec(1, 1, 1) });

    const added = field.tryAdd({ id: 'b', vector: vec(2, 2, 2) });
    expect(isOk(added)).toBe(true);
    expect(field.get('b')?.vector).toEqual(vec(2, 2, 2));

    const duplicate = field.tryAdd({ id: 'a', vector: vec(9, 9, 9) });
    expect(isErr(duplicate) && duplicate.error).toBeInstanceOf(DuplicateEntityError);

    const invalid = field.tryAdd({ id: 'c', vector: vec(1, Infinity, 1) });
    expect(isErr(invalid) && invalid.error).toBeInstanceOf(ValidationError);

    expect(field.ids()).toEqual(['a', 'b']);
    expect(field.get('a')?.vector).toEqual(vec(1, 1, 1));
  });

  it('adds a batch atomically', () => {
    const field = fieldOf({ a: vec(1, 1, 1) });
    expect(() =>
      field.addAll([
        { id: 'b', vector: vec(1, 1, 1) },
        { id: 'a', vector: vec(2, 2, 2) },
      ])
    ).toThrow(DuplicateEntityError);
    expect(() =>
      field.addAll([
        { id: 'x', vector: vec(1, 1, 1) },
        { id: 'x', vector: vec(2, 2, 2) },
      ])
    ).toThrow(DuplicateEntityError);
    expect(field.ids()).toEqual(['a']);

    field.addAll([
      { id: 'b', vector: vec(1, 1, 1) },
      { id: 'c', vector: vec(2, 2, 2) },
    ]);
    expect(field.ids()).toEqual(['a', 'b', 'c']);
  });

  it('updates and removes by identifier', () => {
    const field = fieldOf({ a: vec(1, 1, 1) });
    field.update('a', vec(2, 2, 2));
    expect(field.get('a')?.vector).toEqual(vec(2, 2, 2));
    expect(() => field.update('missing', vec(1, 1, 1))).toThrow(EntityNotFoundError);

    expect(field.remove('a')).toBe(true);
    expect(field.remove('a')).toBe(false);
    expect(field.size).toBe(0);
  });

  it('stores frozen entities', () => {
    const entity = fieldOf({ a: vec(1, 1, 1) }).get('a');
    expect(Object.isFrozen(entity)).toBe(true);
    expect(Object.isFrozen(entity?.vector)).toBe(true);
  });

  it('lists coherent entities', () => {
    const field = fieldOf({ a: vec(1, 1, 1), b: vec(0, 1, 1), c: vec(-1, 2, 3) });
    expect(field.coherentEntities().map((e) => e.id)).toEqual(['a', 'c']);
  });
});

describe('empty field', () => {
  it('has neutral collective metrics', () => {
    const field = fieldOf({});
    expect(field.collectiveState()).toBeNull();
    expect(field.fieldCoherence()).toBe(1);
    expect(field.emergencePotential()).toBe(0);
    expect(field.detectLeader()).toBeNull();
    expect(field.detectClusters()).toEqual([]);
    expect(field.phaseTransitionCheck()).toBe(false);
  });
});

describe('collective metrics', () => {
  it('is fully coherent for two identical entities', () => {
    const field = fieldOf({ a: vec(1, 1, 1), b: vec(1, 1, 1) });
    expect(field.fieldCoherence()).toBe(1);
    expect(field.detectClusters(0.99)).toEqual([new Set(['a', 'b'])]);
  });

  it('averages pairwise alignments', () => {
    const field = fieldOf({ a: vec(1, 0, 0), b: vec(0, 1, 0), c: vec(2, 0, 0) });
    expect(field.pairwiseAlignments()).toEqual([
      { source: 'a', target: 'b', alignment: 0 },
      { source: 'a', target: 'c', alignment: 1 },
      { source: 'b', target: 'c', alignment: 0 },
    ]);
    expect(field.fieldCoherence()).toBeCloseTo(1 / 3);
  });

  it('takes the component-wise mean as collective state', () => {
    const field = fieldOf({ a: vec(1, 2, 3), b: vec(3, 2, 1) });
    expect(field.collectiveState()).toEqual(vec(2, 2, 2));
  });

  it('combines coherence and mean strength into the emergence potential', () => {
    expect(fieldOf({ a: vec(1, 1, 1), b: vec(1, 1, 1) }).emergencePotential()).toBeCloseTo(0.75);
    // coherence -1 contributes nothing, strengths 0.5 and 0
    expect(fieldOf({ a: vec(1, 1, 1), b: vec(-1, -1, -1) }).emergencePotential()).toBeCloseTo(0.125);
    expect(fieldOf({ a: vec(2, 2, 2) }).emergencePotential()).toBeCloseTo(0.5 + 4 / 9);
  });

  it('honours the configured coherence weight', () => {
    const field = fieldOf({ a: vec(1, 1, 1), b: vec(1, 1, 1) }, { potentialCoherenceWeight: 1 });
    expect(field.emergencePotential()).toBe(1);
  });
});

describe('detectClusters', () => {
  it('returns connected components including singletons', () => {
    const field = fieldOf({ b: vec(0, 1, 0), c: vec(2, 0, 0), a: vec(1, 0, 0) });
    expect(field.detectClusters()).toEqual([new Set(['a', 'c']), new Set(['b'])]);
  });

  it('joins clusters transitively', () => {
    // a~b and b~c above 0.9, a~c below
    const field = fieldOf({ a: vec(1, 0.4, 0), b: vec(1, 0.8, 0), c: vec(0.8, 1, 0) });
    expect(field.detectClusters(0.95)).toEqual([new Set(['a', 'b', 'c'])]);
  });

  it('rejects thresholds outside [-1, 1]', () => {
    const field = fieldOf({ a: vec(1, 1, 1) });
    expect(() => field.detectClusters(1.5)).toThrow(ConfigurationError);
  });
});

describe('detectLeader', () => {
  it('picks the strongest entity', () => {
    const field = fieldOf({ medium: vec(1, 1, 1), strong: vec(3, 3, 3), weak: vec(0.1, 0.1, 0.1) });
    expect(field.detectLeader()?.id).toBe('strong');
  });

  it('breaks ties by identifier', () => {
    const field = fieldOf({ b: vec(1, 1, 1), a: vec(1, 1, 1) });
    expect(field.detectLeader()?.id).toBe('a');
  });
});

describe('phaseTransitionCheck', () => {
  it('fires for an aligned and strong field', () => {
    const field = fieldOf({ a: vec(1, 1, 1), b: vec(1, 1, 1) });
    expect(field.phaseTransitionCheck()).toBe(true);
  });

  it('needs at least two entities', () => {
    expect(fieldOf({ a: vec(5, 5, 5) }).phaseTransitionCheck()).toBe(false);
  });

  it('stays off for weak or misaligned fields', () => {
    expect(fieldOf({ a: vec(0.1, 0.1, 0.1), b: vec(0.1, 0.1, 0.1) }).phaseTransitionCheck()).toBe(false);
    expect(fieldOf({ a: vec(1, 0, 0), b: vec(0, 1, 0) }).phaseTransitionCheck()).toBe(false);
  });
});

describe('synchronizeTowards', () => {
  it('moves coherent entities toward the target', () => {
    const field = fieldOf({ e1: vec(0.5, 0.5, 0.5), e2: vec(0.6, 0.6, 0.6), z: vec(0, 1, 1) });
    field.synchronizeTowards(vec(1, 1, 1), 0.5);

    expect(field.get('e1')?.vector).toEqual(vec(0.75, 0.75, 0.75));
    expect(field.get('e2')?.vector.a).toBeCloseTo(0.8);
    expect(field.get('z')?.vector).toEqual(vec(0, 1, 1));
  });

  it('stays finite when moving between opposite extremes', () => {
    const big = 1.7e308;
    const field = fieldOf({ a: vec(big, big, big) });
    field.synchronizeTowards(vec(-big, -big, -big), 0.5);
    expect(field.get('a')?.vector).toEqual(vec(0, 0, 0));
  });

  it('rejects a rate outside [0, 1]', () => {
    const field = fieldOf({ a: vec(1, 1, 1) });
    expect(() => field.synchronizeTowards(vec(1, 1, 1), 2)).toThrow(ConfigurationError);
  });
});

describe('report', () => {
  it('summarizes the field', () => {
    const report = fieldOf({ a: vec(1, 0, 0), b: vec(0, 1, 0), c: vec(2, 0, 0) }).report();

    expect(report.totalEntities).toBe(3);
    expect(report.coherentEntities).toBe(0);
    expect(report.fieldCoherence).toBeCloseTo(1 / 3);
    expect(report.phaseTransition).toBe(false);
    expect(report.collectiveState?.a).toBe(1);
    expect(report.collectiveState?.b).toBeCloseTo(1 / 3);
    expect(report.collectiveState?.c).toBe(0);
    expect(report.collectiveValid).toBe(false);
    expect(report.collectiveStrength).toBe(0);
    expect(report.leaderId).toBe('a');
    expect(report.leaderStrength).toBe(0);
    expect(report.clusters).toEqual([['a', 'c'], ['b']]);
    expect(report.largestCluster).toBe(2);
  });

  it('reports nulls for an empty field', () => {
    const report = fieldOf({}).report();
    expect(report.collectiveState).toBeNull();
    expect(report.collectiveStrength).toBeNull();
    expect(report.leaderId).toBeNull();
    expect(report.clusters).toEqual([]);
    expect(report.largestCluster).toBe(0);
  });
});

describe('configuration', () => {
  it('rejects out-of-range settings', () => {
    expect(() => new InteractionField({ potentialCoherenceWeight: 2 })).toThrow(ConfigurationError);
    expect(() => new InteractionField({ clusterThreshold: -3 })).toThrow(ConfigurationError);
  });

  it('exposes the merged settings', () => {
    const field = new InteractionField({ clusterThreshold: 0.5, logger: silentLogger });
    expect(field.config).toEqual({
      clusterThreshold: 0.5,
      phaseCoherenceThreshold: 0.9,
      phasePotentialThreshold: 0.7,
      potentialCoherenceWeight: 0.5,
    });
  });
});
