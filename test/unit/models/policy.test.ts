import { describe, it, expect } from 'vitest';
import {
  createClientProfile,
  defaultPolicy,
  isClientCategory,
  isDefaultPolicy,
  isPlaybackResult,
  isPlayMethod,
  lookupConfidence,
  normalizeKey,
} from '../../../src/models/policy.js';

describe('policy helpers', () => {
  it('builds a neutral default policy', () => {
    const policy = defaultPolicy();

    expect(isDefaultPolicy(policy)).toBe(true);
    expect(policy.bitrateCap).toBeUndefined();
    expect(isDefaultPolicy({ ...policy, bitrateCap: 1 })).toBe(false);
    expect(isDefaultPolicy({ ...policy, confidence: 0.5 })).toBe(false);
  });

  it('hands out independent default policies', () => {
    const a = defaultPolicy();
    a.allowDirectPlay = false;
    expect(defaultPolicy().allowDirectPlay).toBe(true);
  });

  it('creates a profile with empty confidence maps', () => {
    const profile = createClientProfile('device-1', 'roku');

    expect(profile.codecConfidence).toEqual({});
    expect(profile.containerConfidence).toEqual({});
    expect(profile.reliabilityScore).toBe(0.5);
    expect(profile.firstSeen).toBe(profile.lastUpdated);
  });

  it('normalizes keys and treats blanks as absent', () => {
    expect(normalizeKey(' HEVC ')).toBe('hevc');
    expect(normalizeKey('   ')).toBeUndefined();
    expect(normalizeKey(undefined)).toBeUndefined();
  });

  it('distinguishes a missing confidence from a zero', () => {
    const map = { truehd: 0 };

    expect(lookupConfidence(map, 'TrueHD')).toBe(0);
    expect(lookupConfidence(map, 'dts')).toBeUndefined();
    expect(lookupConfidence(map, 'constructor')).toBeUndefined();
  });

  it('guards the string unions', () => {
    expect(isClientCategory('apple-tv')).toBe(true);
    expect(isClientCategory('toaster')).toBe(false);
    expect(isPlayMethod('direct-stream')).toBe(true);
    expect(isPlayMethod('DirectStream')).toBe(false);
    expect(isPlaybackResult('suspected-failure')).toBe(true);
    expect(isPlaybackResult('crashed')).toBe(false);
  });
});
