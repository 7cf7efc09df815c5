/**
 * Confidence adjustment magnitudes per classified outcome.
 *
 * Every magnitude is later scaled by LEARNING_RATE, so a single outcome
 * moves a confidence by at most 0.018.
 */

import type { PlaybackOutcome, PlaybackResult } from '../models/types.js';

export const LEARNING_RATE = 0.15;
export const SUCCESS_BOOST = 0.08;
export const FAILURE_PENALTY = 0.12;
export const SUSPECTED_FAILURE_PENALTY = 0.08;
export const TRANSCODE_PENALTY = 0.05;

export interface OutcomeAdjustments {
  video: number;
  audio: number;
  container: number;
}

export function videoAdjustment(result: PlaybackResult, directPlay: boolean): number {
  switch (result) {
    case 'success':
      return directPlay ? SUCCESS_BOOST : SUCCESS_BOOST * 0.5;
    case 'failure':
      return -FAILURE_PENALTY;
    case 'suspected-failure':
      return -SUSPECTED_FAILURE_PENALTY;
    case 'transcoded':
      return -TRANSCODE_PENALTY;
    case 'unknown':
      return 0;
  }
}

export function audioAdjustment(result: PlaybackResult, directPlay: boolean, audioTriggered: boolean): number {
  switch (result) {
    case 'success':
      return directPlay ? SUCCESS_BOOST * 0.5 : 0;
    case 'failure':
      return -FAILURE_PENALTY * 0.5;
    case 'suspected-failure':
      return -SUSPECTED_FAILURE_PENALTY * 0.5;
    case 'transcoded':
      return audioTriggered ? -TRANSCODE_PENALTY : 0;
    case 'unknown':
      return 0;
  }
}

export function containerAdjustment(result: PlaybackResult, directPlay: boolean): number {
  switch (result) {
    case 'success':
      return directPlay ? SUCCESS_BOOST * 0.5 : 0;
    case 'failure':
      return -FAILURE_PENALTY * 0.3;
    case 'suspected-failure':
      return -SUSPECTED_FAILURE_PENALTY * 0.3;
    case 'transcoded':
    case 'unknown':
      return 0;
  }
}

/**
 * True when the host's transcode reasons blame audio and not video.
 */
export function isAudioTriggeredTranscode(transcodeReasons: readonly string[]): boolean {
  const joined = transcodeReasons.join(',').toLowerCase();
  return joined.includes('audio') && !joined.includes('video');
}

export function computeAdjustments(
  outcome: Pick<PlaybackOutcome, 'playMethod' | 'transcodeReasons'>,
  result: PlaybackResult,
): OutcomeAdjustments {
  const directPlay = outcome.playMethod === 'direct-play';
  return {
    video: videoAdjustment(result, directPlay),
    audio: audioAdjustment(result, directPlay, isAudioTriggeredTranscode(outcome.transcodeReasons)),
    container: containerAdjustment(result, directPlay),
  };
}

export function clampConfidence(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * One EMA-style step: `clamp(current + magnitude × LEARNING_RATE)`.
 * A missing entry starts from 0.
 */
export function applyAdjustment(current: number | undefined, magnitude: number): number {
  return clampConfidence((current ?? 0) + magnitude * LEARNING_RATE);
}
