export {
  LearningService,
  MIN_RECALIBRATION_SAMPLES,
  RECALIBRATION_EXISTING_WEIGHT,
  RECALIBRATION_OBSERVED_WEIGHT,
} from './service.js';
export type { LearningServiceOptions, LearningUpdate, RecalibrationSummary } from './service.js';
export { classifyOutcome, computePlaybackRatio, MIN_PLAYBACK_RATIO_FOR_SUCCESS } from './classify.js';
export {
  LEARNING_RATE,
  SUCCESS_BOOST,
  FAILURE_PENALTY,
  SUSPECTED_FAILURE_PENALTY,
  TRANSCODE_PENALTY,
  computeAdjustments,
  applyAdjustment,
  clampConfidence,
  isAudioTriggeredTranscode,
} from './adjustments.js';
export type { OutcomeAdjustments } from './adjustments.js';
