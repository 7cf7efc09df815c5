export { PlaybackAdvisor } from './advisor.js';
export type { PlaybackAdvisorOptions, CompletedPlayback } from './advisor.js';
