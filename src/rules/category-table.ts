/**
 * Client Category Table — Playwise
 *
 * Per-category compatibility facts consumed by the static rules. Each rule is
 * a small function that looks its category up here, so supporting a new kind
 * of client means adding a row, not another branch in every rule.
 */

import type { ClientCategory } from '../models/types.js';
import type { RuleSeverity } from './types.js';

// ═══════════════════════════════════════════════════════════════
// ROW SHAPES
// ═══════════════════════════════════════════════════════════════

/**
 * What fixes a container/codec mismatch:
 * - remux: repackage (direct play off, direct stream on)
 * - transcode: re-encode (direct play off, transcoding on)
 */
export type Remedy = 'remux' | 'transcode';

export interface ContainerCodecEntry {
  label: string;
  /** Matches when the container is one of these */
  containers?: readonly string[];
  /** Matches when the video codec is one of these */
  codecs?: readonly string[];
  /** Never matches for these containers */
  exceptContainers?: readonly string[];
  remedy: Remedy;
  severity: RuleSeverity;
  rationale: (container: string, codec: string) => string;
}

export interface AudioRestriction {
  label: string;
  codecs: readonly string[];
  severity: RuleSeverity;
  rationale: (codec: string) => string;
}

export interface HdrVerdict {
  label: string;
  severity: RuleSeverity;
  rationale: (rangeType: string) => string;
}

export interface HdrSupport {
  /** Verdict for Dolby Vision variants; null means native support */
  dolbyVision: HdrVerdict | null;
  /** Verdict for every other non-SDR range; null means native support */
  hdr: HdrVerdict | null;
}

export interface CategoryCapabilities {
  /** Display prefix used in finding names */
  label: string;
  containerCodec: readonly ContainerCodecEntry[];
  /** Category-specific audio restriction; falls back to the generic lossless check */
  audio: AudioRestriction | null;
  /** Decodes lossless audio or passes it through to a receiver */
  losslessAudioPassthrough: boolean;
  /** Software decoders cope with 12-bit video */
  softwareDecode12Bit: boolean;
  hdr: HdrSupport;
  /** Default bandwidth ceiling in bits/sec */
  defaultBitrateCap?: number;
}

// ═══════════════════════════════════════════════════════════════
// SHARED FACTS
// ═══════════════════════════════════════════════════════════════

export const LOSSLESS_AUDIO_CODECS: readonly string[] = ['truehd', 'dts-hd ma', 'dts-hd hra'];

/** Codecs whose 10-bit profile has next to no hardware decode support */
export const TEN_BIT_UNSUPPORTED_CODECS: readonly string[] = ['h264', 'avc'];

const HEVC_CODECS = ['hevc', 'h265'] as const;

const MOBILE_CAP = 8_000_000;
const ROKU_CAP = 20_000_000;
const DLNA_CAP = 15_000_000;

const GENERIC_DOLBY_VISION: HdrVerdict = {
  label: 'HDR:Generic:DolbyVision',
  severity: 'suggest',
  rationale: () => 'Dolby Vision support is uncommon. Tone-mapping transcode may be required.',
};

const NO_HDR_OPINION: HdrSupport = { dolbyVision: null, hdr: null };

const GENERIC_HDR: HdrSupport = { dolbyVision: GENERIC_DOLBY_VISION, hdr: null };

const APPLE_CONTAINERS: readonly ContainerCodecEntry[] = [
  {
    label: 'Apple:UnsupportedContainer',
    containers: ['webm', 'avi'],
    remedy: 'remux',
    severity: 'recommend',
    rationale: (container) => `Apple clients have limited support for '${container}'. Remux recommended.`,
  },
];

// ═══════════════════════════════════════════════════════════════
// TABLE
// ═══════════════════════════════════════════════════════════════

export const CATEGORY_TABLE: Record<ClientCategory, CategoryCapabilities> = {
  'unknown': {
    label: 'Unknown',
    containerCodec: [],
    audio: null,
    losslessAudioPassthrough: false,
    softwareDecode12Bit: false,
    hdr: GENERIC_HDR,
  },

  'web-browser': {
    label: 'Web',
    containerCodec: [
      {
        label: 'Web:UnsupportedContainer',
        containers: ['mkv', 'avi', 'wmv', 'flv'],
        remedy: 'remux',
        severity: 'require',
        rationale: (container) => `Web browsers cannot natively play '${container}' containers. Remux required.`,
      },
      {
        label: 'Web:HevcLimited',
        codecs: HEVC_CODECS,
        remedy: 'transcode',
        severity: 'recommend',
        rationale: () => 'Most web browsers cannot decode HEVC. Transcode to H.264 required.',
      },
    ],
    audio: {
      label: 'Audio:Web:NoLosslessOrDts',
      codecs: [...LOSSLESS_AUDIO_CODECS, 'dts'],
      severity: 'require',
      rationale: (codec) => `Web browsers cannot decode '${codec}'. Audio transcode to AAC/Opus required.`,
    },
    losslessAudioPassthrough: false,
    softwareDecode12Bit: false,
    hdr: {
      dolbyVision: {
        label: 'HDR:Web:DolbyVision',
        severity: 'require',
        rationale: () => 'Web browsers cannot play Dolby Vision. Transcode with tone-mapping to SDR required.',
      },
      hdr: {
        label: 'HDR:Web:ToneMapRequired',
        severity: 'require',
        rationale: (range) => `Web browsers cannot display ${range}. Transcode with tone-mapping to SDR required.`,
      },
    },
  },

  'android-tv': {
    label: 'AndroidTv',
    containerCodec: [],
    audio: null,
    losslessAudioPassthrough: false,
    softwareDecode12Bit: false,
    hdr: GENERIC_HDR,
  },

  'android-mobile': {
    label: 'AndroidMobile',
    containerCodec: [],
    audio: {
      label: 'Audio:Mobile:NoPassthrough',
      codecs: [...LOSSLESS_AUDIO_CODECS, 'dts'],
      severity: 'require',
      rationale: (codec) => `Mobile devices cannot passthrough '${codec}'. Audio transcode required.`,
    },
    losslessAudioPassthrough: false,
    softwareDecode12Bit: false,
    hdr: {
      dolbyVision: {
        label: 'HDR:Mobile:DolbyVision',
        severity: 'recommend',
        rationale: (range) => `Mobile devices typically cannot display ${range}. Tone-mapping transcode required.`,
      },
      hdr: {
        label: 'HDR:Mobile:ToneMapRequired',
        severity: 'recommend',
        rationale: (range) => `Mobile devices typically cannot display ${range}. Tone-mapping transcode required.`,
      },
    },
    defaultBitrateCap: MOBILE_CAP,
  },

  'roku': {
    label: 'Roku',
    containerCodec: [
      {
        label: 'Roku:MkvNotSupported',
        containers: ['mkv'],
        remedy: 'remux',
        severity: 'require',
        rationale: () => 'Roku cannot natively play MKV containers. Remux to MP4/HLS required.',
      },
      {
        label: 'Roku:HevcContainerMismatch',
        codecs: HEVC_CODECS,
        exceptContainers: ['mp4', 'm4v', 'mov'],
        remedy: 'remux',
        severity: 'require',
        rationale: (container) => `Roku only supports HEVC in MP4/M4V/MOV containers, not '${container}'.`,
      },
    ],
    audio: {
      label: 'Audio:Roku:NoLossless',
      codecs: ['truehd', 'dts-hd ma'],
      severity: 'require',
      rationale: (codec) => `Roku cannot decode or passthrough '${codec}'. Audio transcode required.`,
    },
    losslessAudioPassthrough: false,
    softwareDecode12Bit: false,
    hdr: {
      dolbyVision: {
        label: 'HDR:Roku:DolbyVision',
        severity: 'recommend',
        rationale: () => 'Roku has limited Dolby Vision support. Transcode with tone-mapping likely required.',
      },
      hdr: null,
    },
    defaultBitrateCap: ROKU_CAP,
  },

  'fire-tv': {
    label: 'FireTv',
    containerCodec: [],
    audio: null,
    losslessAudioPassthrough: false,
    softwareDecode12Bit: false,
    hdr: GENERIC_HDR,
  },

  'apple-mobile': {
    label: 'AppleMobile',
    containerCodec: APPLE_CONTAINERS,
    audio: {
      label: 'Audio:Apple:NoDts',
      codecs: ['dts', 'dts-hd ma', 'dts-hd hra'],
      severity: 'require',
      rationale: (codec) => `Apple devices have no native DTS support. Audio transcode of '${codec}' required.`,
    },
    losslessAudioPassthrough: false,
    softwareDecode12Bit: false,
    hdr: {
      dolbyVision: {
        label: 'HDR:iOS:DolbyVision',
        severity: 'suggest',
        rationale: (range) => `iPhone displays have limited ${range} support. Tone-mapping transcode recommended.`,
      },
      hdr: {
        label: 'HDR:iOS:LimitedHdr',
        severity: 'suggest',
        rationale: (range) => `iPhone displays have limited ${range} support. Tone-mapping transcode recommended.`,
      },
    },
    defaultBitrateCap: MOBILE_CAP,
  },

  'apple-tv': {
    label: 'AppleTv',
    containerCodec: APPLE_CONTAINERS,
    audio: null,
    losslessAudioPassthrough: false,
    softwareDecode12Bit: false,
    hdr: NO_HDR_OPINION,
  },

  'desktop': {
    label: 'Desktop',
    containerCodec: [],
    audio: null,
    losslessAudioPassthrough: true,
    softwareDecode12Bit: true,
    hdr: NO_HDR_OPINION,
  },

  'xbox': {
    label: 'Xbox',
    containerCodec: [
      {
        label: 'Xbox:LimitedContainerSupport',
        containers: ['mkv', 'webm'],
        remedy: 'remux',
        severity: 'recommend',
        rationale: (container) => `Xbox has limited '${container}' support. Remux to MP4 recommended.`,
      },
    ],
    audio: null,
    losslessAudioPassthrough: false,
    softwareDecode12Bit: false,
    hdr: {
      dolbyVision: {
        label: 'HDR:Xbox:DolbyVision',
        severity: 'recommend',
        rationale: () => 'Xbox Dolby Vision support is limited. Tone-mapping transcode recommended.',
      },
      hdr: null,
    },
  },

  'kodi': {
    label: 'Kodi',
    containerCodec: [],
    audio: null,
    losslessAudioPassthrough: true,
    softwareDecode12Bit: true,
    hdr: NO_HDR_OPINION,
  },

  'dlna': {
    label: 'Dlna',
    containerCodec: [
      {
        label: 'DLNA:IncompatibleContainer',
        containers: ['mkv', 'webm'],
        remedy: 'remux',
        severity: 'require',
        rationale: (container) => `Most DLNA renderers cannot play '${container}'. Remux to MPEG-TS/MP4.`,
      },
    ],
    audio: null,
    losslessAudioPassthrough: false,
    softwareDecode12Bit: false,
    hdr: GENERIC_HDR,
    defaultBitrateCap: DLNA_CAP,
  },
};

export function capabilitiesOf(category: ClientCategory): CategoryCapabilities {
  return CATEGORY_TABLE[category] ?? CATEGORY_TABLE.unknown;
}
