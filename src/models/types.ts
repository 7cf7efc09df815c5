/**
 * Domain Types — Playwise
 *
 * Normalized client, media, policy and outcome records. Everything here is
 * decoupled from any particular media server's own types; the host adapts
 * its session and media-source objects into these shapes.
 */

// ═══════════════════════════════════════════════════════════════
// CLIENTS
// ═══════════════════════════════════════════════════════════════

/** Known client platform categories */
export type ClientCategory =
  | 'unknown'
  | 'web-browser'
  | 'android-tv'
  | 'android-mobile'
  | 'roku'
  | 'fire-tv'
  | 'apple-mobile'
  | 'apple-tv'
  | 'desktop'
  | 'xbox'
  | 'kodi'
  | 'dlna';

export const CLIENT_CATEGORIES: readonly ClientCategory[] = [
  'unknown',
  'web-browser',
  'android-tv',
  'android-mobile',
  'roku',
  'fire-tv',
  'apple-mobile',
  'apple-tv',
  'desktop',
  'xbox',
  'kodi',
  'dlna',
];

/**
 * Lowercase codec or container name → confidence in [0, 1].
 * A missing key means "no data"; 0 means "confirmed unsupported".
 */
export type ConfidenceMap = Record<string, number>;

export interface ClientProfile {
  /** Stable device identifier supplied by the host */
  deviceId: string;
  category: ClientCategory;
  /** Application name, e.g. "Roku" or "Web" */
  clientName: string;
  clientVersion: string;
  deviceName: string;
  userAgent?: string;
  codecConfidence: ConfidenceMap;
  containerConfidence: ConfidenceMap;
  /** Known bandwidth ceiling in bits/sec */
  maxBitrate?: number;
  /** Aggregate reliability (0-1), informational only */
  reliabilityScore: number;
  /** Unix timestamp (ms) */
  firstSeen: number;
  /** Unix timestamp (ms) */
  lastUpdated: number;
}

/** Raw session descriptor the host hands over for classification */
export interface ClientDescriptor {
  deviceId: string;
  clientName?: string;
  clientVersion?: string;
  deviceName?: string;
  userAgent?: string;
  maxBitrate?: number;
}

// ═══════════════════════════════════════════════════════════════
// MEDIA
// ═══════════════════════════════════════════════════════════════

/** Heuristic estimate of how expensive transcoding a media item would be */
export type TranscodeCost = 'remux' | 'low' | 'medium' | 'high' | 'extreme';

export const TRANSCODE_COST_RANK: Record<TranscodeCost, number> = {
  remux: 1,
  low: 2,
  medium: 3,
  high: 4,
  extreme: 5,
};

export interface MediaCharacteristics {
  mediaSourceId?: string;
  itemId?: string;
  /** e.g. "hevc", "h264", "av1" */
  videoCodec?: string;
  /** Primary audio codec, e.g. "aac", "truehd" */
  audioCodec?: string;
  /** e.g. "mkv", "mp4", "ts" */
  container?: string;
  /** Total bitrate in bits/sec */
  bitrate?: number;
  width?: number;
  height?: number;
  videoBitDepth?: number;
  /** e.g. "Main", "Main 10", "High" */
  videoProfile?: string;
  /** e.g. "SDR", "HDR10", "HLG", "DOVIWithHDR10" */
  videoRangeType?: string;
  audioChannels?: number;
  /** PGS, VobSub and other bitmap tracks */
  hasImageSubtitles?: boolean;
  /** SRT, ASS and other text tracks */
  hasTextSubtitles?: boolean;
  /** Set once by the cost estimator; absent until then */
  transcodeCostEstimate?: TranscodeCost;
}

// ═══════════════════════════════════════════════════════════════
// POLICY
// ═══════════════════════════════════════════════════════════════

/**
 * The engine's advisory recommendation for one client + media pair.
 * The host keeps final authority over what actually happens.
 */
export interface PlaybackPolicy {
  allowDirectPlay: boolean;
  allowDirectStream: boolean;
  allowTranscoding: boolean;
  /** Recommended ceiling in bits/sec */
  bitrateCap?: number;
  /** Preferred video codec bias; empty when there is none */
  preferredVideoCodec: string;
  /** 0 (pure guess) to 1 (high confidence) */
  confidence: number;
  /** One line per rule finding and refinement step, in evaluation order */
  reasoning: string;
}

// ═══════════════════════════════════════════════════════════════
// OUTCOMES
// ═══════════════════════════════════════════════════════════════

export type PlayMethod = 'direct-play' | 'direct-stream' | 'transcode' | 'unknown';

export const PLAY_METHODS: readonly PlayMethod[] = ['direct-play', 'direct-stream', 'transcode', 'unknown'];

export type PlaybackResult = 'unknown' | 'success' | 'failure' | 'suspected-failure' | 'transcoded';

export const PLAYBACK_RESULTS: readonly PlaybackResult[] = [
  'unknown',
  'success',
  'failure',
  'suspected-failure',
  'transcoded',
];

export interface PlaybackOutcome {
  id: string;
  deviceId: string;
  clientName: string;
  itemId: string;
  playSessionId: string;
  videoCodec?: string;
  audioCodec?: string;
  container?: string;
  playMethod: PlayMethod;
  /** Host transcode reason flags, e.g. "AudioCodecNotSupported" */
  transcodeReasons: string[];
  result: PlaybackResult;
  playedTicks?: number;
  totalTicks?: number;
  /** Policy that was active during the session */
  policySnapshot?: PlaybackPolicy;
  /** Unix timestamp (ms) when the session started */
  timestamp: number;
}

/**
 * A decision the advisor made, or would have made in dry-run.
 */
export interface InterventionRecord {
  id: string;
  timestamp: number;
  deviceId: string;
  deviceName: string;
  clientName: string;
  mediaSourceId: string;
  /** Whether the policy was actively applied rather than observed */
  isActive: boolean;
  allowDirectPlay: boolean;
  allowDirectStream: boolean;
  allowTranscoding: boolean;
  bitrateCap?: number;
  confidence: number;
  reasoning: string;
}
