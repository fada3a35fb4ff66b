/**
 * InteractionField: A Population of Triadic Entities
 *
 * Maps identifiers to vectors and computes collective properties:
 * - Pairwise alignment and mean field coherence
 * - Collective state (component-wise mean)
 * - Emergence potential and the phase-transition check
 * - Alignment clusters (connected components) and the leader
 *
 * Every iteration runs in lexical identifier order, so reports, clusters
 * and simulations are reproducible regardless of insertion order.
 */

import { z } from 'zod';
import {
  alignment,
  assertVector,
  createLogger,
  describeIssues,
  DuplicateEntityError,
  EntityNotFoundError,
  err,
  isCoherent,
  lerp,
  mean,
  meanVector,
  ok,
  parseConfig,
  parseInput,
  parseParameter,
  strength,
  TriadicVectorSchema,
  ValidationError,
} from '@triadic/core';
import type { Logger, Result, TriadicVector } from '@triadic/core';

// =============================================================================
// Types
// =============================================================================

export const EntitySchema = z.object({
  id: z.string().min(1, 'id must not be empty'),
  vector: TriadicVectorSchema,
});

export interface Entity {
  readonly id: string;
  readonly vector: TriadicVector;
}

export interface AlignmentEdge {
  /** Lexically smaller identifier of the pair */
  source: string;
  target: string;
  alignment: number;
}

const Cosine = z.number().min(-1).max(1);
const Unit = z.number().min(0).max(1);

export const InteractionFieldSettingsSchema = z.object({
  /** Minimum alignment for an edge in `detectClusters` */
  clusterThreshold: Cosine,
  /** Field coherence needed for a phase transition */
  phaseCoherenceThreshold: Cosine,
  /** Emergence potential needed for a phase transition */
  phasePotentialThreshold: Unit,
  /** Weight of coherence against mean strength in the emergence potential */
  potentialCoherenceWeight: Unit,
});

export type InteractionFieldSettings = z.infer<typeof InteractionFieldSettingsSchema>;

export interface InteractionFieldConfig extends InteractionFieldSettings {
  logger: Logger;
}

export const DEFAULT_INTERACTION_FIELD_CONFIG: InteractionFieldSettings = {
  clusterThreshold: 0.7,
  phaseCoherenceThreshold: 0.9,
  phasePotentialThreshold: 0.7,
  potentialCoherenceWeight: 0.5,
};

export interface FieldReport {
  totalEntities: number;
  coherentEntities: number;
  fieldCoherence: number;
  emergencePotential: number;
  phaseTransition: boolean;
  collectiveState: TriadicVector | null;
  collectiveValid: boolean;
  collectiveStrength: number | null;
  leaderId: string | null;
  leaderStrength: number | null;
  clusters: string[][];
  largestCluster: number;
}

const SyncStrengthSchema = Unit;

// =============================================================================
// InteractionField
// =============================================================================

export class InteractionField {
  private readonly settings: InteractionFieldSettings;
  private readonly logger: Logger;
  private readonly members = new Map<string, Entity>();

  constructor(config: Partial<InteractionFieldConfig> = {}) {
    const { logger, ...overrides } = config;
    this.settings = parseConfig(
      InteractionFieldSettingsSchema,
      { ...DEFAULT_INTERACTION_FIELD_CONFIG, ...overrides },
      'InteractionField'
    );
    this.logger = logger ?? createLogger('InteractionField');
  }

  get config(): Readonly<InteractionFieldSettings> {
    return this.settings;
  }

  // ===========================================================================
  // Membership
  // ===========================================================================

  /**
   * Insert an entity. An identifier already present is rejected and the
   * field is left unchanged; use `update` to overwrite a vector.
   */
  add(entity: Entity): Entity {
    const result = this.tryAdd(entity);
    if (!result.ok) {
      this.logger.warn(`Rejected entity: ${result.error.message}`);
      throw result.error;
    }
    return result.value;
  }

  /**
   * Same as `add`, but reports rejection as an `err` result.
   */
  tryAdd(entity: Entity): Result<Entity, ValidationError | DuplicateEntityError> {
    const parsed = EntitySchema.safeParse(entity);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      return err(new ValidationError(`Invalid entity: ${issues.join('; ')}`, issues));
    }
    if (this.members.has(parsed.data.id)) {
      return err(new DuplicateEntityError(parsed.data.id));
    }

    const stored = freezeEntity(parsed.data.id, parsed.data.vector);
    this.members.set(stored.id, stored);
    return ok(stored);
  }

  /**
   * Insert several entities at once. Either all are added or none is.
   */
  addAll(entities: readonly Entity[]): Entity[] {
    const parsed = entities.map((entity) => this.validateEntity(entity));
    const seen = new Set<string>();
    for (const entity of parsed) {
      if (this.members.has(entity.id) || seen.has(entity.id)) {
        this.logger.warn(`Rejected batch: duplicate entity "${entity.id}"`);
        throw new DuplicateEntityError(entity.id);
      }
      seen.add(entity.id);
    }

    for (const entity of parsed) {
      this.members.set(entity.id, entity);
    }
    return parsed;
  }

  update(id: string, vector: TriadicVector): Entity {
    if (!this.members.has(id)) {
      throw new EntityNotFoundError(id);
    }
    const entity = freezeEntity(id, assertVector(vector));
    this.members.set(id, entity);
    return entity;
  }

  remove(id: string): boolean {
    return this.members.delete(id);
  }

  get(id: string): Entity | undefined {
    return this.members.get(id);
  }

  has(id: string): boolean {
    return this.members.has(id);
  }

  get size(): number {
    return this.members.size;
  }

  ids(): string[] {
    return [...this.members.keys()].sort(compareIds);
  }

  entities(): Entity[] {
    return this.ids().flatMap((id) => {
      const entity = this.members.get(id);
      return entity ? [entity] : [];
    });
  }

  /** Entities whose three components are all non-zero */
  coherentEntities(): Entity[] {
    return this.entities().filter((entity) => isCoherent(entity.vector));
  }

  // ===========================================================================
  // Collective metrics
  // ===========================================================================

  /**
   * Alignment of every unordered pair, ordered by (source, target).
   */
  pairwiseAlignments(): AlignmentEdge[] {
    const entities = this.entities();
    const edges: AlignmentEdge[] = [];

    for (let i = 0; i < entities.length; i++) {
      for (let j = i + 1; j < entities.length; j++) {
        edges.push({
          source: entities[i].id,
          target: entities[j].id,
          alignment: alignment(entities[i].vector, entities[j].vector),
        });
      }
    }
    return edges;
  }

  /**
   * Mean pairwise alignment; 1.0 with fewer than two entities.
   */
  fieldCoherence(): number {
    if (this.members.size < 2) {
      return 1.0;
    }
    return mean(this.pairwiseAlignments().map((edge) => edge.alignment));
  }

  collectiveState(): TriadicVector | null {
    return meanVector(this.entities().map((entity) => entity.vector));
  }

  /**
   * `w · max(0, coherence) + (1 − w) · meanStrength`, in [0, 1];
   * 0 for an empty field.
   */
  emergencePotential(): number {
    if (this.members.size === 0) {
      return 0;
    }

    const w = this.settings.potentialCoherenceWeight;
    const meanStrength = mean(
      this.entities().map(({ vector }) => strength(vector.a, vector.b, vector.c))
    );
    return w * Math.max(0, this.fieldCoherence()) + (1 - w) * meanStrength;
  }

  /**
   * Connected components of the graph joining every pair with
   * `alignment >= threshold`. Singletons are components too. Clusters are
   * ordered by their smallest identifier.
   */
  detectClusters(threshold: number = this.settings.clusterThreshold): Set<string>[] {
    const minimum = parseParameter(Cosine, threshold, 'cluster threshold');

    const ids = this.ids();
    const adjacency = new Map<string, string[]>();
    for (const id of ids) {
      adjacency.set(id, []);
    }
    for (const edge of this.pairwiseAlignments()) {
      if (edge.alignment >= minimum) {
        adjacency.get(edge.source)?.push(edge.target);
        adjacency.get(edge.target)?.push(edge.source);
      }
    }

    const visited = new Set<string>();
    const clusters: Set<string>[] = [];

    for (const id of ids) {
      if (visited.has(id)) continue;

      const cluster = new Set<string>();
      const queue = [id];
      visited.add(id);

      while (queue.length > 0) {
        const node = queue.shift();
        if (node === undefined) break;
        cluster.add(node);
        for (const neighbor of adjacency.get(node) ?? []) {
          if (!visited.has(neighbor)) {
            visited.add(neighbor);
            queue.push(neighbor);
          }
        }
      }

      clusters.push(cluster);
    }

    return clusters;
  }

  /**
   * Entity with the greatest strength; the lexically smallest identifier
   * wins a tie. Null for an empty field.
   */
  detectLeader(): Entity | null {
    let leader: Entity | null = null;
    let best = -Infinity;

    for (const entity of this.entities()) {
      const value = strength(entity.vector.a, entity.vector.b, entity.vector.c);
      if (value > best) {
        best = value;
        leader = entity;
      }
    }
    return leader;
  }

  /**
   * True when at least two entities are present and both field coherence
   * and emergence potential reach their phase thresholds.
   */
  phaseTransitionCheck(): boolean {
    if (this.members.size < 2) {
      return false;
    }
    return (
      this.fieldCoherence() >= this.settings.phaseCoherenceThreshold &&
      this.emergencePotential() >= this.settings.phasePotentialThreshold
    );
  }

  // ===========================================================================
  // Mutation
  // ===========================================================================

  /**
   * Move every coherent entity a fraction `rate` of the way toward
   * `target`. Entities with a zero component stay where they are.
   */
  synchronizeTowards(target: TriadicVector, rate: number = 0.1): void {
    const goal = assertVector(target);
    const fraction = parseParameter(SyncStrengthSchema, rate, 'synchronization strength');

    for (const entity of this.coherentEntities()) {
      this.members.set(entity.id, freezeEntity(entity.id, lerp(entity.vector, goal, fraction)));
    }
  }

  /**
   * Overwrite several vectors in one pass. Every identifier must already
   * be present; nothing is written otherwise.
   */
  applyVectors(vectors: ReadonlyMap<string, TriadicVector>): void {
    const next: Entity[] = [];
    for (const [id, vector] of vectors) {
      if (!this.members.has(id)) {
        throw new EntityNotFoundError(id);
      }
      next.push(freezeEntity(id, assertVector(vector)));
    }
    for (const entity of next) {
      this.members.set(entity.id, entity);
    }
  }

  // ===========================================================================
  // Reporting
  // ===========================================================================

  report(): FieldReport {
    const collective = this.collectiveState();
    const leader = this.detectLeader();
    const clusters = this.detectClusters().map((cluster) => [...cluster].sort(compareIds));

    return {
      totalEntities: this.members.size,
      coherentEntities: this.coherentEntities().length,
      fieldCoherence: this.fieldCoherence(),
      emergencePotential: this.emergencePotential(),
      phaseTransition: this.phaseTransitionCheck(),
      collectiveState: collective,
      collectiveValid: collective !== null && isCoherent(collective),
      collectiveStrength: collective ? strength(collective.a, collective.b, collective.c) : null,
      leaderId: leader ? leader.id : null,
      leaderStrength: leader ? strength(leader.vector.a, leader.vector.b, leader.vector.c) : null,
      clusters,
      largestCluster: clusters.reduce((largest, cluster) => Math.max(largest, cluster.length), 0),
    };
  }

  private validateEntity(entity: Entity): Entity {
    try {
      const parsed = parseInput(EntitySchema, entity, 'entity');
      return freezeEntity(parsed.id, parsed.vector);
    } catch (error) {
      this.logger.warn('Rejected entity', error);
      throw error;
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function compareIds(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function freezeEntity(id: string, vector: TriadicVector): Entity {
  return Object.freeze({
    id,
    vector: Object.freeze({ a: vector.a, b: vector.b, c: vector.c }),
  });
}
