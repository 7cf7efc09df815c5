import { SEVERITY_RANK, type Opinion, type RuleFinding, type RuleSeverity } from '../rules/types.js';

export type PolicyDimension = 'directPlay' | 'directStream' | 'transcoding';

export const POLICY_DIMENSIONS: readonly PolicyDimension[] = ['directPlay', 'directStream', 'transcoding'];

export interface DimensionVerdict {
  allow: boolean;
  severity: RuleSeverity;
  ruleName: string;
}

export interface RankedFindings {
  directPlay: DimensionVerdict | null;
  directStream: DimensionVerdict | null;
  transcoding: DimensionVerdict | null;
  /** Most restrictive cap across all findings, regardless of severity */
  bitrateCap?: number;
  /** Confidence earned by resolving ambiguity */
  confidenceDelta: number;
}

export const REQUIRE_FINDING_CONFIDENCE = 0.15;
export const RECOMMEND_FINDING_CONFIDENCE = 0.1;

function opinionToAllow(opinion: Opinion): boolean | null {
  switch (opinion) {
    case 'allow':
      return true;
    case 'deny':
      return false;
    case 'abstain':
      return null;
  }
}

/**
 * Arbitrate conflicting findings, one dimension at a time.
 *
 * The highest severity with an opinion wins. Findings arrive in rule
 * registration order, so `>=` lets the later of two equal-severity findings
 * win. Bitrate caps are not ranked: the minimum of every cap applies.
 */
export function rankFindings(findings: readonly RuleFinding[]): RankedFindings {
  const ranked: RankedFindings = {
    directPlay: null,
    directStream: null,
    transcoding: null,
    confidenceDelta: 0,
  };

  for (const item of findings) {
    for (const dimension of POLICY_DIMENSIONS) {
      const allow = opinionToAllow(item[dimension]);
      if (allow === null) continue;

      const current = ranked[dimension];
      if (!current || SEVERITY_RANK[item.severity] >= SEVERITY_RANK[current.severity]) {
        ranked[dimension] = { allow, severity: item.severity, ruleName: item.ruleName };
      }
    }

    if (item.bitrateCap !== undefined) {
      ranked.bitrateCap = ranked.bitrateCap === undefined
        ? item.bitrateCap
        : Math.min(ranked.bitrateCap, item.bitrateCap);
    }

    if (item.severity === 'require') {
      ranked.confidenceDelta += REQUIRE_FINDING_CONFIDENCE;
    } else if (item.severity === 'recommend') {
      ranked.confidenceDelta += RECOMMEND_FINDING_CONFIDENCE;
    }
  }

  return ranked;
}
