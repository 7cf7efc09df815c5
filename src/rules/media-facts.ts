/**
 * Small predicates over media records shared by the rules and the cost
 * estimator. All of them treat missing fields as "no".
 */

import type { MediaCharacteristics } from '../models/types.js';
import { normalizeKey } from '../models/policy.js';

const HEVC_ALIASES = new Set(['hevc', 'h265']);
const H264_ALIASES = new Set(['h264', 'avc']);

export function videoCodecOf(media: Readonly<MediaCharacteristics>): string | undefined {
  return normalizeKey(media.videoCodec);
}

export function audioCodecOf(media: Readonly<MediaCharacteristics>): string | undefined {
  return normalizeKey(media.audioCodec);
}

export function containerOf(media: Readonly<MediaCharacteristics>): string | undefined {
  return normalizeKey(media.container);
}

export function isHevc(codec: string | undefined): boolean {
  return codec !== undefined && HEVC_ALIASES.has(codec);
}

export function isH264(codec: string | undefined): boolean {
  return codec !== undefined && H264_ALIASES.has(codec);
}

/** True for any declared range other than SDR */
export function isHdr(media: Readonly<MediaCharacteristics>): boolean {
  const range = normalizeKey(media.videoRangeType);
  return range !== undefined && range !== 'sdr';
}

export function isDolbyVision(media: Readonly<MediaCharacteristics>): boolean {
  const range = normalizeKey(media.videoRangeType);
  if (range === undefined) return false;
  return range.includes('dovi') || range.includes('dolbyvision') || range.includes('dolby vision');
}

export function formatMbps(bitsPerSecond: number): string {
  return `${(bitsPerSecond / 1_000_000).toFixed(1)} Mbps`;
}
