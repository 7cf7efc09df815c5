/**
 * Static compatibility rules — barrel exports.
 */

export { ContainerCodecCompatibilityRule } from './container-codec.js';
export { BitDepthCompatibilityRule } from './bit-depth.js';
export { AudioPassthroughRule } from './audio-passthrough.js';
export { HdrCompatibilityRule } from './hdr.js';
export { BitrateCapRule } from './bitrate-cap.js';
export { defaultRules } from './registry.js';
export {
  CATEGORY_TABLE,
  LOSSLESS_AUDIO_CODECS,
  TEN_BIT_UNSUPPORTED_CODECS,
  capabilitiesOf,
} from './category-table.js';
export { SEVERITY_RANK, finding } from './types.js';
export type {
  PlaybackRule,
  RuleFinding,
  RuleSeverity,
  Opinion,
  FindingInit,
} from './types.js';
export type {
  CategoryCapabilities,
  ContainerCodecEntry,
  AudioRestriction,
  HdrSupport,
  HdrVerdict,
  Remedy,
} from './category-table.js';
