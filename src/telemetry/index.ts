export { TelemetryRecorder } from './recorder.js';
export type { PlaybackSession, TelemetryRecorderOptions } from './recorder.js';
