import { describe, it, expect } from 'vitest';
import {
  PlaywiseError,
  ConfigError,
  RuleEvaluationError,
  StoreError,
  toError,
} from '../../../src/core/errors.js';

describe('errors', () => {
  it('carries code, stage and cause', () => {
    const cause = new Error('disk full');
    const error = new StoreError('write failed', 'upsertClient', cause);

    expect(error).toBeInstanceOf(PlaywiseError);
    expect(error.name).toBe('StoreError');
    expect(error.code).toBe('STORE_ERROR');
    expect(error.stage).toBe('persist');
    expect(error.operation).toBe('upsertClient');
    expect(error.cause).toBe(cause);
  });

  it('tags rule and config errors', () => {
    expect(new RuleEvaluationError('boom', 'HdrCompatibility').rule).toBe('HdrCompatibility');
    expect(new RuleEvaluationError('boom', 'HdrCompatibility').code).toBe('RULE_ERROR');
    expect(new ConfigError('bad').code).toBe('CONFIG_ERROR');
  });

  it('normalizes thrown values', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
    expect(toError('plain').message).toBe('plain');
    expect(toError({ reason: 1 }).message).toBe('{"reason":1}');
  });
});
