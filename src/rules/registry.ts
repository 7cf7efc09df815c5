import { AudioPassthroughRule } from './audio-passthrough.js';
import { BitDepthCompatibilityRule } from './bit-depth.js';
import { BitrateCapRule } from './bitrate-cap.js';
import { ContainerCodecCompatibilityRule } from './container-codec.js';
import { HdrCompatibilityRule } from './hdr.js';
import type { PlaybackRule } from './types.js';

/**
 * The built-in rules in registration order. Order matters: among findings
 * of equal severity, the one registered later wins.
 */
export function defaultRules(): readonly PlaybackRule[] {
  return [
    new ContainerCodecCompatibilityRule(),
    new BitDepthCompatibilityRule(),
    new AudioPassthroughRule(),
    new HdrCompatibilityRule(),
    new BitrateCapRule(),
  ];
}
