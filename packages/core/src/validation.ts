/**
 * Boundary validation helpers.
 *
 * Configuration problems surface as ConfigurationError, bad data as
 * ValidationError. Both carry the flattened zod issues.
 */

import type { ZodError, ZodType } from 'zod';
import { ConfigurationError, ValidationError } from './errors.js';

export function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a merged configuration object for `scope`.
 */
export function parseConfig<T>(schema: ZodType<T>, input: unknown, scope: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new ConfigurationError(`[${scope}] invalid configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * Validate a single call parameter such as a window size or threshold.
 */
export function parseParameter<T>(schema: ZodType<T>, value: unknown, name: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(
      `Invalid ${name} (${String(value)}): ${issues.join('; ')}`,
      issues
    );
  }
  return parsed.data;
}

/**
 * Validate caller-supplied data, e.g. a vector or an entity.
 */
export function parseInput<T>(schema: ZodType<T>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error);
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}
