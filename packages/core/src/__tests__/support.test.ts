import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, silentLogger } from '../logger.js';
import {
  ConfigurationError,
  DuplicateEntityError,
  TimestampOrderError,
  TriadicError,
} from '../errors.js';
import { parseConfig, parseParameter } from '../validation.js';
import { z } from 'zod';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages with the scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('Tracker').warn('rejected input', { a: 1 });
    expect(warn).toHaveBeenCalledWith('[Tracker] rejected input', { a: 1 });
  });

  it('drops messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = createLogger('Tracker', 'info');
    logger.debug('hidden');
    logger.info('shown');
    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith('[Tracker] shown');
  });

  it('silent logger writes nothing', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    silentLogger.error('nothing');
    expect(error).not.toHaveBeenCalled();
  });
});

describe('errors', () => {
  it('carry a stable code', () => {
    const duplicate = new DuplicateEntityError('alpha');
    expect(duplicate).toBeInstanceOf(TriadicError);
    expect(duplicate.code).toBe('DUPLICATE_ENTITY');
    expect(duplicate.message).toBe('Entity "alpha" is already in the field');

    const order = new TimestampOrderError(5, 3);
    expect(order.code).toBe('TIMESTAMP_ORDER');
    expect(order.name).toBe('TimestampOrderError');
  });
});

describe('validation', () => {
  const schema = z.object({ window: z.number().int().min(2) });

  it('parseConfig reports the scope and issue path', () => {
    try {
      parseConfig(schema, { window: 1 }, 'Demo');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message.startsWith('[Demo] invalid configuration: window:')).toBe(true);
        expect(error.issues).toHaveLength(1);
      }
    }
  });

  it('parseParameter passes valid values through', () => {
    expect(parseParameter(z.number().min(0), 3, 'steps')).toBe(3);
    expect(() => parseParameter(z.number().min(0), -1, 'steps')).toThrow(/Invalid steps \(-1\)/);
  });
});
