/**
 * Error taxonomy
 *
 * Every error raised by the triadic packages extends TriadicError and
 * carries a stable `code`. Degenerate numbers are never errors; only
 * caller misuse is.
 */

export type TriadicErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'INVALID_INPUT'
  | 'DUPLICATE_ENTITY'
  | 'ENTITY_NOT_FOUND'
  | 'TIMESTAMP_ORDER';

export class TriadicError extends Error {
  readonly code: TriadicErrorCode;

  constructor(code: TriadicErrorCode, message: string) {
    super(message);
    this.name = 'TriadicError';
    this.code = code;
  }
}

/**
 * A threshold, window, step count or other setting is out of range.
 */
export class ConfigurationError extends TriadicError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INVALID_CONFIGURATION', message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Input data (a vector, an entity) failed boundary validation.
 */
export class ValidationError extends TriadicError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INVALID_INPUT', message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class DuplicateEntityError extends TriadicError {
  readonly entityId: string;

  constructor(entityId: string) {
    super('DUPLICATE_ENTITY', `Entity "${entityId}" is already in the field`);
    this.name = 'DuplicateEntityError';
    this.entityId = entityId;
  }
}

export class EntityNotFoundError extends TriadicError {
  readonly entityId: string;

  constructor(entityId: string) {
    super('ENTITY_NOT_FOUND', `Entity "${entityId}" is not in the field`);
    this.name = 'EntityNotFoundError';
    this.entityId = entityId;
  }
}

export class TimestampOrderError extends TriadicError {
  readonly previous: number;
  readonly received: number;

  constructor(previous: number, received: number) {
    super(
      'TIMESTAMP_ORDER',
      `Timestamp ${received} does not follow the last recorded timestamp ${previous}`
    );
    this.name = 'TimestampOrderError';
    this.previous = previous;
    this.received = received;
  }
}
