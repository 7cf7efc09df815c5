export {
  CLIENT_CATEGORIES,
  PLAY_METHODS,
  PLAYBACK_RESULTS,
  TRANSCODE_COST_RANK,
} from './types.js';
export type {
  ClientCategory,
  ConfidenceMap,
  ClientProfile,
  ClientDescriptor,
  TranscodeCost,
  MediaCharacteristics,
  PlaybackPolicy,
  PlayMethod,
  PlaybackResult,
  PlaybackOutcome,
  InterventionRecord,
} from './types.js';
export {
  DEFAULT_POLICY_REASONING,
  defaultPolicy,
  isDefaultPolicy,
  createClientProfile,
  normalizeKey,
  lookupConfidence,
  isClientCategory,
  isPlayMethod,
  isPlaybackResult,
} from './policy.js';
