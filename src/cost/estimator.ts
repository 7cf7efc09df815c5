import type { MediaCharacteristics, TranscodeCost } from '../models/types.js';
import { normalizeKey } from '../models/policy.js';
import { audioCodecOf, containerOf, isDolbyVision, isHdr, videoCodecOf } from '../rules/media-facts.js';
import {
  AUDIO_CODEC_WEIGHTS,
  BIT_DEPTH_WEIGHTS,
  COST_TIER_BOUNDS,
  DYNAMIC_RANGE_WEIGHTS,
  IMAGE_SUBTITLE_WEIGHT,
  LEGACY_CONTAINERS,
  REMUX_FRIENDLY_CODECS,
  REPACKAGE_CONTAINERS,
  RESOLUTION_WEIGHTS,
  SURROUND_CHANNEL_THRESHOLD,
  UNIVERSAL_CONTAINERS,
  UNKNOWN_VIDEO_CODEC_WEIGHT,
  VIDEO_CODEC_WEIGHTS,
} from './weights.js';

export interface CostBreakdown {
  videoCodec: number;
  resolution: number;
  dynamicRange: number;
  bitDepth: number;
  subtitles: number;
  audio: number;
  total: number;
}

/**
 * Score every cost factor separately. Factors add up; none of them gates
 * another.
 */
export function scoreTranscodeCost(media: Readonly<MediaCharacteristics>): CostBreakdown {
  const videoCodec = videoCodecWeight(videoCodecOf(media));
  const resolution = resolutionWeight(media.width, media.height);
  const dynamicRange = isDolbyVision(media)
    ? DYNAMIC_RANGE_WEIGHTS.dolbyVision
    : isHdr(media) ? DYNAMIC_RANGE_WEIGHTS.hdr : 0;
  const bitDepth = bitDepthWeight(media.videoBitDepth);
  const subtitles = media.hasImageSubtitles ? IMAGE_SUBTITLE_WEIGHT : 0;
  const audio = audioWeight(audioCodecOf(media), media.audioChannels);

  return {
    videoCodec,
    resolution,
    dynamicRange,
    bitDepth,
    subtitles,
    audio,
    total: videoCodec + resolution + dynamicRange + bitDepth + subtitles + audio,
  };
}

/**
 * Heuristic transcode cost tier. Pure: equal inputs always give the same tier.
 */
export function estimateTranscodeCost(media: Readonly<MediaCharacteristics>): TranscodeCost {
  const { total } = scoreTranscodeCost(media);

  if (total <= 0) {
    return evaluateRemuxPotential(media);
  }
  if (total <= COST_TIER_BOUNDS.low) {
    return 'low';
  }
  if (total <= COST_TIER_BOUNDS.medium) {
    return 'medium';
  }
  if (total <= COST_TIER_BOUNDS.high) {
    return 'high';
  }
  return 'extreme';
}

function videoCodecWeight(codec: string | undefined): number {
  if (codec === undefined) return 0;
  return VIDEO_CODEC_WEIGHTS[codec] ?? UNKNOWN_VIDEO_CODEC_WEIGHT;
}

function resolutionWeight(width: number | undefined, height: number | undefined): number {
  const w = width ?? 0;
  const h = height ?? 0;
  if (w >= 3840 || h >= 2160) return RESOLUTION_WEIGHTS.uhd;
  if (w >= 2560 || h >= 1440) return RESOLUTION_WEIGHTS.qhd;
  return 0;
}

function bitDepthWeight(depth: number | undefined): number {
  if (depth === undefined) return 0;
  if (depth >= 12) return BIT_DEPTH_WEIGHTS.twelveBit;
  if (depth >= 10) return BIT_DEPTH_WEIGHTS.tenBit;
  return 0;
}

function audioWeight(codec: string | undefined, channels: number | undefined): number {
  if (codec === undefined) return 0;
  const base = AUDIO_CODEC_WEIGHTS[codec] ?? 0;
  if (base > 0 && channels !== undefined && channels > SURROUND_CHANNEL_THRESHOLD) {
    return base + 1;
  }
  return base;
}

/**
 * For media with nothing to re-encode, decide whether the container alone
 * still needs repackaging.
 */
function evaluateRemuxPotential(media: Readonly<MediaCharacteristics>): TranscodeCost {
  const codec = videoCodecOf(media);
  const container = containerOf(media);
  if (codec === undefined || container === undefined) {
    return 'low';
  }

  if (UNIVERSAL_CONTAINERS.includes(container)) {
    return 'low';
  }
  if (REPACKAGE_CONTAINERS.includes(container) && REMUX_FRIENDLY_CODECS.includes(codec)) {
    return 'remux';
  }
  if (LEGACY_CONTAINERS.includes(container)) {
    return 'remux';
  }
  return 'low';
}

/**
 * Copy of the media record with lowercase codec/container names and the
 * cost estimate filled in, unless one is already present.
 */
export function withCostEstimate(media: Readonly<MediaCharacteristics>): MediaCharacteristics {
  const normalized: MediaCharacteristics = {
    ...media,
    videoCodec: normalizeKey(media.videoCodec),
    audioCodec: normalizeKey(media.audioCodec),
    container: normalizeKey(media.container),
  };
  return {
    ...normalized,
    transcodeCostEstimate: media.transcodeCostEstimate ?? estimateTranscodeCost(normalized),
  };
}
