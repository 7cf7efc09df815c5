/**
 * Transcode cost estimation — barrel exports.
 */

export { estimateTranscodeCost, scoreTranscodeCost, withCostEstimate, type CostBreakdown } from './estimator.js';
export { MediaRegistry } from './media-registry.js';
export * as costWeights from './weights.js';
