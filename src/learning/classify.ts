import type { PlaybackOutcome, PlaybackResult } from '../models/types.js';

/** Below this fraction of the runtime a stopped session counts as a suspected failure */
export const MIN_PLAYBACK_RATIO_FOR_SUCCESS = 0.15;

/**
 * Fraction of the item that was watched, or undefined when either duration
 * is missing or the total is not positive.
 */
export function computePlaybackRatio(playedTicks: number | undefined, totalTicks: number | undefined): number | undefined {
  if (playedTicks === undefined || totalTicks === undefined || totalTicks <= 0) {
    return undefined;
  }
  return playedTicks / totalTicks;
}

/**
 * Resolve an outcome's result. Already-classified outcomes keep theirs;
 * transcodes are always `transcoded`; otherwise the watched fraction decides.
 */
export function classifyOutcome(
  outcome: Pick<PlaybackOutcome, 'result' | 'playMethod' | 'playedTicks' | 'totalTicks'>,
): PlaybackResult {
  if (outcome.result !== 'unknown') return outcome.result;
  if (outcome.playMethod === 'transcode') return 'transcoded';

  const ratio = computePlaybackRatio(outcome.playedTicks, outcome.totalTicks);
  if (ratio === undefined) return 'unknown';

  return ratio < MIN_PLAYBACK_RATIO_FOR_SUCCESS ? 'suspected-failure' : 'success';
}
