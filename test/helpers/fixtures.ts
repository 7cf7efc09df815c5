import type {
  ClientCategory,
  ClientProfile,
  MediaCharacteristics,
  PlaybackOutcome,
} from '../../src/models/types.js';
import type { PolicySettings } from '../../src/core/types.js';
import { createClientProfile } from '../../src/models/policy.js';

/** Settings under which the engine actually computes */
export const ACTIVE_SETTINGS: PolicySettings = {
  enableDynamicPolicies: true,
  conservativeMode: false,
};

export function makeClient(
  category: ClientCategory = 'unknown',
  overrides: Partial<Omit<ClientProfile, 'deviceId' | 'category'>> = {},
  deviceId = 'device-1',
): ClientProfile {
  return createClientProfile(deviceId, category, {
    clientName: 'Test Client',
    clientVersion: '1.0.0',
    deviceName: 'Test Device',
    ...overrides,
  });
}

export function makeMedia(overrides: Partial<MediaCharacteristics> = {}): MediaCharacteristics {
  return { mediaSourceId: 'source-1', itemId: 'item-1', ...overrides };
}

let outcomeCounter = 0;

export function makeOutcome(overrides: Partial<PlaybackOutcome> = {}): PlaybackOutcome {
  outcomeCounter++;
  return {
    id: `outcome-${outcomeCounter}`,
    deviceId: 'device-1',
    clientName: 'Test Client',
    itemId: 'item-1',
    playSessionId: `session-${outcomeCounter}`,
    playMethod: 'direct-play',
    transcodeReasons: [],
    result: 'unknown',
    timestamp: Date.now(),
    ...overrides,
  };
}
