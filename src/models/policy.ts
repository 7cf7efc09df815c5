import type { PlaybackPolicy, ClientProfile, ClientCategory, PlayMethod, PlaybackResult } from './types.js';
import { CLIENT_CATEGORIES, PLAY_METHODS, PLAYBACK_RESULTS } from './types.js';

export const DEFAULT_POLICY_REASONING = 'Default pass-through — no advisor influence.';

/**
 * The canonical neutral policy: everything allowed, no cap, zero confidence.
 * Returned whenever the advisor defers entirely to the host.
 */
export function defaultPolicy(): PlaybackPolicy {
  return {
    allowDirectPlay: true,
    allowDirectStream: true,
    allowTranscoding: true,
    preferredVideoCodec: '',
    confidence: 0,
    reasoning: DEFAULT_POLICY_REASONING,
  };
}

export function isDefaultPolicy(policy: PlaybackPolicy): boolean {
  return policy.allowDirectPlay
    && policy.allowDirectStream
    && policy.allowTranscoding
    && policy.bitrateCap === undefined
    && policy.confidence === 0;
}

/**
 * Build a client profile with empty confidence maps.
 */
export function createClientProfile(
  deviceId: string,
  category: ClientCategory = 'unknown',
  overrides: Partial<Omit<ClientProfile, 'deviceId' | 'category'>> = {},
): ClientProfile {
  const now = Date.now();
  return {
    deviceId,
    category,
    clientName: '',
    clientVersion: '',
    deviceName: '',
    codecConfidence: {},
    containerConfidence: {},
    reliabilityScore: 0.5,
    firstSeen: now,
    lastUpdated: now,
    ...overrides,
  };
}

/**
 * Lowercase lookup key for a codec or container name; undefined when blank.
 */
export function normalizeKey(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const key = value.trim().toLowerCase();
  return key.length > 0 ? key : undefined;
}

/**
 * Look up a confidence value without treating a missing key as zero.
 */
export function lookupConfidence(map: Record<string, number>, key: string | undefined): number | undefined {
  const normalized = normalizeKey(key);
  if (normalized === undefined) return undefined;
  return Object.prototype.hasOwnProperty.call(map, normalized) ? map[normalized] : undefined;
}

export function isClientCategory(value: string): value is ClientCategory {
  return CLIENT_CATEGORIES.some((category) => category === value);
}

export function isPlayMethod(value: string): value is PlayMethod {
  return PLAY_METHODS.some((method) => method === value);
}

export function isPlaybackResult(value: string): value is PlaybackResult {
  return PLAYBACK_RESULTS.some((result) => result === value);
}
