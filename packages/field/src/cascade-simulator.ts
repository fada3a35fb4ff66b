/**
 * CascadeSimulator: Step a Field Toward Its Collective State
 *
 * Each step reads one snapshot of every vector, then pulls each entity
 * toward the collective state by `coupling · max(0, w)`, where `w` is the
 * entity's mean alignment to the rest of the field. All new vectors are
 * written together, so the outcome does not depend on iteration order.
 */

import { z } from 'zod';
import { alignment, createLogger, distance, lerp, meanVector, parseParameter } from '@triadic/core';
import type { Logger, TriadicVector } from '@triadic/core';
import type { InteractionField } from './interaction-field.js';

export interface CascadeStepReport {
  /** 1-based step number */
  step: number;
  fieldCoherence: number;
  emergencePotential: number;
  phaseTransition: boolean;
  collectiveState: TriadicVector | null;
  /** Largest Euclidean move of any entity during the step */
  maxDisplacement: number;
}

export interface CascadeRunOptions {
  /** Stop after the first step whose maxDisplacement is below this */
  convergenceTolerance?: number;
}

export interface CascadeSimulatorConfig {
  logger: Logger;
}

const StepsSchema = z.number().int().min(0);
const CouplingSchema = z.number().min(0).max(1);
const StepNumberSchema = z.number().int().min(1);
const ConvergenceSchema = z.number().finite().positive();

export class CascadeSimulator {
  private readonly logger: Logger;

  constructor(config: Partial<CascadeSimulatorConfig> = {}) {
    this.logger = config.logger ?? createLogger('CascadeSimulator');
  }

  /**
   * Run `steps` synchronous updates and return one report per step.
   * `steps = 0` returns an empty list and leaves the field untouched.
   */
  run(
    field: InteractionField,
    steps: number,
    couplingStrength: number,
    options: CascadeRunOptions = {}
  ): CascadeStepReport[] {
    const total = parseParameter(StepsSchema, steps, 'steps');
    const coupling = parseParameter(CouplingSchema, couplingStrength, 'coupling strength');
    const tolerance = options.convergenceTolerance === undefined
      ? undefined
      : parseParameter(ConvergenceSchema, options.convergenceTolerance, 'convergence tolerance');

    const reports: CascadeStepReport[] = [];
    for (let step = 1; step <= total; step++) {
      const report = this.advance(field, coupling, step);
      reports.push(report);

      if (tolerance !== undefined && report.maxDisplacement < tolerance) {
        this.logger.debug(`Converged after step ${step} (displacement ${report.maxDisplacement})`);
        break;
      }
    }
    return reports;
  }

  /**
   * Apply a single synchronous update and report on the result.
   */
  step(field: InteractionField, couplingStrength: number, stepNumber: number = 1): CascadeStepReport {
    const coupling = parseParameter(CouplingSchema, couplingStrength, 'coupling strength');
    const step = parseParameter(StepNumberSchema, stepNumber, 'step number');
    return this.advance(field, coupling, step);
  }

  private advance(field: InteractionField, coupling: number, step: number): CascadeStepReport {
    const entities = field.entities();
    const collective = meanVector(entities.map((entity) => entity.vector));

    const next = new Map<string, TriadicVector>();
    let maxDisplacement = 0;

    if (collective) {
      for (const entity of entities) {
        let total = 0;
        for (const other of entities) {
          if (other.id !== entity.id) {
            total += alignment(entity.vector, other.vector);
          }
        }
        const w = entities.length > 1 ? total / (entities.length - 1) : 0;
        const pull = coupling * Math.max(0, w);

        const moved = lerp(entity.vector, collective, pull);
        maxDisplacement = Math.max(maxDisplacement, distance(entity.vector, moved));
        next.set(entity.id, moved);
      }
    }

    field.applyVectors(next);

    const report: CascadeStepReport = {
      step,
      fieldCoherence: field.fieldCoherence(),
      emergencePotential: field.emergencePotential(),
      phaseTransition: field.phaseTransitionCheck(),
      collectiveState: field.collectiveState(),
      maxDisplacement,
    };

    this.logger.debug(
      `Step ${step}: coherence ${report.fieldCoherence.toFixed(3)}, ` +
        `potential ${report.emergencePotential.toFixed(3)}, moved ${maxDisplacement.toFixed(3)}`
    );
    return report;
  }
}
