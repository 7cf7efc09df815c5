export {
  DecisionEngine,
  HIGH_CONFIDENCE_THRESHOLD,
  LOW_CONFIDENCE_THRESHOLD,
  BASELINE_DECISION_CONFIDENCE,
} from './engine.js';
export type { DecisionEngineOptions } from './engine.js';
export {
  rankFindings,
  POLICY_DIMENSIONS,
  REQUIRE_FINDING_CONFIDENCE,
  RECOMMEND_FINDING_CONFIDENCE,
} from './ranking.js';
export type { PolicyDimension, DimensionVerdict, RankedFindings } from './ranking.js';
