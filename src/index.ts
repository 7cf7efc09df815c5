/**
 * Playwise — advisory playback policy engine
 * Public exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, PlaybackAdvisor } from 'playwise';
 *
 * const advisor = new PlaybackAdvisor({ config: new ConfigManager().load() });
 * const policy = await advisor.advise(
 *   { deviceId: 'living-room', clientName: 'Roku', deviceName: 'Roku Ultra' },
 *   { mediaSourceId: 'src-1', videoCodec: 'hevc', container: 'mkv', bitrate: 18_000_000 },
 * );
 * ```
 */

// Core
export { ConfigManager, type ConfigManagerOptions } from './core/config.js';
export {
  PlaywiseConfigSchema,
  defaultConfig,
  type PlaywiseConfig,
  type PlaywiseConfigInput,
  type PolicySettings,
  type LearningSettings,
  type TelemetrySettings,
} from './core/types.js';
export { createLogger, getLogger, setLogger, type LoggerOptions } from './core/logger.js';
export {
  PlaywiseError,
  ConfigError,
  RuleEvaluationError,
  StoreError,
  toError,
} from './core/errors.js';
export { EventBus, type PlaywiseEvents, type ConfidenceChange, type ConfidenceDimension } from './core/events.js';
export { AsyncMutex, KeyedMutex } from './core/mutex.js';

// Domain
export * from './models/index.js';
export * from './rules/index.js';
export * from './cost/index.js';
export * from './decision/index.js';
export * from './learning/index.js';
export * from './store/index.js';
export * from './clients/index.js';
export * from './telemetry/index.js';
export * from './advisor/index.js';

export { VERSION, NAME } from './version.js';
