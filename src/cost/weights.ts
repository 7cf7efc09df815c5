/**
 * Transcode cost weights — how much each media trait adds to the cost score.
 */

/** Decode complexity per video codec; codecs not listed weigh UNKNOWN_VIDEO_CODEC_WEIGHT */
export const VIDEO_CODEC_WEIGHTS: Readonly<Record<string, number>> = {
  'h264': 0, // universally supported baseline
  'avc': 0,
  'mpeg2video': 0, // cheap to decode, rarely direct-playable
  'mpeg2': 0,
  'mpeg4': 0, // DivX/Xvid
  'vp8': 0,
  'theora': 0,
  'hevc': 1, // common but not universal
  'h265': 1,
  'vp9': 1,
  'vc1': 1, // niche hardware support
  'wmv3': 1,
  'av1': 2, // heavy software decode, hardware still limited
};

export const UNKNOWN_VIDEO_CODEC_WEIGHT = 1;

/** Audio codecs that are expensive to transcode; everything else is free */
export const AUDIO_CODEC_WEIGHTS: Readonly<Record<string, number>> = {
  'truehd': 1,
  'dts-hd ma': 1,
  'dts-hd hra': 1,
};

/** Extra audio weight above this many channels, for already-weighted codecs */
export const SURROUND_CHANNEL_THRESHOLD = 6;

export const RESOLUTION_WEIGHTS = {
  uhd: 3, // >= 3840x2160
  qhd: 1, // >= 2560x1440
} as const;

export const DYNAMIC_RANGE_WEIGHTS = {
  dolbyVision: 4,
  hdr: 2,
} as const;

export const BIT_DEPTH_WEIGHTS = {
  twelveBit: 2,
  tenBit: 1,
} as const;

export const IMAGE_SUBTITLE_WEIGHT = 2;

/** Inclusive upper score bound per tier; anything above the last is extreme */
export const COST_TIER_BOUNDS = {
  low: 1,
  medium: 3,
  high: 6,
} as const;

/** Containers every client already plays */
export const UNIVERSAL_CONTAINERS: readonly string[] = ['mp4', 'm4v', 'mov'];

/** Containers that only need repackaging when the codec is fine */
export const REPACKAGE_CONTAINERS: readonly string[] = ['mkv'];

/** Codecs that are fine once repackaged */
export const REMUX_FRIENDLY_CODECS: readonly string[] = ['h264', 'hevc', 'h265'];

/** Legacy containers that clients rarely play but remux cheaply */
export const LEGACY_CONTAINERS: readonly string[] = ['avi', 'wmv', 'flv'];
