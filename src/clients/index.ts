export { resolveClientCategory } from './classifier.js';
export {
  seedBaselineConfidence,
  loadBaselineTable,
  parseBaselineTable,
  baselineFor,
} from './baseline.js';
export type { BaselineConfidence, BaselineTable } from './baseline.js';
export { ClientRegistry } from './registry.js';
export type { ClientRegistryOptions } from './registry.js';
