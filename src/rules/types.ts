/**
 * Rule Types — Playwise
 *
 * A rule encodes one narrow, static compatibility fact. It reads a client
 * profile and a media record and either stays silent or returns a finding.
 */

import type { ClientProfile, MediaCharacteristics } from '../models/types.js';

// ═══════════════════════════════════════════════════════════════
// SEVERITY
// ═══════════════════════════════════════════════════════════════

/**
 * How strongly a rule feels about its recommendation.
 * - suggest: soft, any other signal may override it
 * - recommend: followed unless contradicted by a `require`
 * - require: known incompatibility, ignoring it breaks playback
 */
export type RuleSeverity = 'suggest' | 'recommend' | 'require';

export const SEVERITY_RANK: Record<RuleSeverity, number> = {
  suggest: 0,
  recommend: 1,
  require: 2,
};

// ═══════════════════════════════════════════════════════════════
// OPINIONS
// ═══════════════════════════════════════════════════════════════

/**
 * A rule's stance on one policy dimension. `abstain` is distinct from
 * `deny`: an abstaining finding never overrides anything.
 */
export type Opinion = 'allow' | 'deny' | 'abstain';

// ═══════════════════════════════════════════════════════════════
// FINDINGS
// ═══════════════════════════════════════════════════════════════

export interface RuleFinding {
  /** Specific finding name, e.g. "Roku:MkvNotSupported" */
  ruleName: string;
  directPlay: Opinion;
  directStream: Opinion;
  transcoding: Opinion;
  /** Recommended ceiling in bits/sec */
  bitrateCap?: number;
  severity: RuleSeverity;
  rationale: string;
}

/** Convenience input for building findings; unspecified dimensions abstain */
export type FindingInit = Pick<RuleFinding, 'ruleName' | 'severity' | 'rationale'>
  & Partial<Pick<RuleFinding, 'directPlay' | 'directStream' | 'transcoding' | 'bitrateCap'>>;

export function finding(init: FindingInit): RuleFinding {
  return {
    directPlay: 'abstain',
    directStream: 'abstain',
    transcoding: 'abstain',
    ...init,
  };
}

// ═══════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════

export interface PlaybackRule {
  /** Stable rule name for logging */
  readonly name: string;
  /**
   * Pure evaluation. Returns null when the rule does not apply.
   * Implementations must not mutate either argument.
   */
  evaluate(client: Readonly<ClientProfile>, media: Readonly<MediaCharacteristics>): RuleFinding | null;
}
