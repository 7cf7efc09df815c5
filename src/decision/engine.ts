/**
 * DecisionEngine — Playback Policy Synthesis
 *
 * Combines static compatibility rules, per-client confidence maps and the
 * transcode cost estimate into one advisory policy with a confidence score
 * and a line-per-step reasoning trail.
 *
 * Pure and synchronous: the engine never reads or writes storage, never
 * mutates its inputs and never throws. On low confidence or any internal
 * fault it returns the default pass-through policy.
 */

import type {
  ClientProfile,
  MediaCharacteristics,
  PlaybackPolicy,
  TranscodeCost,
} from '../models/types.js';
import { TRANSCODE_COST_RANK } from '../models/types.js';
import type { PolicySettings } from '../core/types.js';
import { defaultPolicy, lookupConfidence, normalizeKey } from '../models/policy.js';
import { getLogger } from '../core/logger.js';
import { RuleEvaluationError, toError } from '../core/errors.js';
import { defaultRules } from '../rules/registry.js';
import { formatMbps } from '../rules/media-facts.js';
import type { PlaybackRule, RuleFinding } from '../rules/types.js';
import { estimateTranscodeCost } from '../cost/estimator.js';
import { POLICY_DIMENSIONS, rankFindings, type PolicyDimension } from './ranking.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const HIGH_CONFIDENCE_THRESHOLD = 0.7;
export const LOW_CONFIDENCE_THRESHOLD = 0.4;

/** Starting point before any evidence is weighed */
export const BASELINE_DECISION_CONFIDENCE = 0.5;

const VIDEO_HIGH_CONFIDENCE_BONUS = 0.2;
const VIDEO_LOW_CONFIDENCE_PENALTY = 0.1;
const AUDIO_HIGH_CONFIDENCE_BONUS = 0.05;
const AUDIO_LOW_CONFIDENCE_PENALTY = 0.05;
const CONTAINER_HIGH_CONFIDENCE_BONUS = 0.1;

const DIMENSION_LABELS: Record<PolicyDimension, string> = {
  directPlay: 'Direct play',
  directStream: 'Direct stream',
  transcoding: 'Transcoding',
};

// ═══════════════════════════════════════════════════════════════
// WORKING STATE
// ═══════════════════════════════════════════════════════════════

interface PolicyDraft {
  flags: Record<PolicyDimension, boolean>;
  /** Rule that pinned a dimension at `require` severity */
  pinnedBy: Partial<Record<PolicyDimension, string>>;
  bitrateCap?: number;
  confidence: number;
  reasoning: string[];
}

export interface DecisionEngineOptions {
  /** Policy section of the configuration; read on every call */
  settings: PolicySettings;
  /** Rules in registration order; defaults to the built-in set */
  rules?: readonly PlaybackRule[];
}

// ═══════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════

export class DecisionEngine {
  private logger = getLogger();
  private settings: PolicySettings;
  private readonly rules: readonly PlaybackRule[];

  constructor(options: DecisionEngineOptions) {
    this.settings = options.settings;
    this.rules = options.rules ?? defaultRules();
  }

  /**
   * Replace the policy settings, e.g. after the host reloads configuration.
   */
  updateSettings(settings: PolicySettings): void {
    this.settings = settings;
  }

  /**
   * Compute the advisory policy for a client + media pair.
   */
  computePolicy(client: Readonly<ClientProfile>, media: Readonly<MediaCharacteristics>): PlaybackPolicy {
    const settings = this.settings;

    // Observe-only and conservative: nothing to compute
    if (settings.conservativeMode && !settings.enableDynamicPolicies) {
      return defaultPolicy();
    }

    try {
      return this.synthesize(client, media, settings);
    } catch (err) {
      this.logger.error(
        { err: toError(err), deviceId: client.deviceId, mediaSourceId: media.mediaSourceId },
        'Policy computation failed — deferring to host defaults',
      );
      return defaultPolicy();
    }
  }

  /**
   * Run every rule, isolating failures. A rule that throws counts as a rule
   * that found nothing.
   */
  evaluateRules(client: Readonly<ClientProfile>, media: Readonly<MediaCharacteristics>): RuleFinding[] {
    const findings: RuleFinding[] = [];

    for (const rule of this.rules) {
      try {
        const result = rule.evaluate(client, media);
        if (result) {
          findings.push(result);
          this.logger.debug(
            { rule: result.ruleName, deviceId: client.deviceId, mediaSourceId: media.mediaSourceId },
            result.rationale,
          );
        }
      } catch (err) {
        const cause = toError(err);
        const error = new RuleEvaluationError(`Rule ${rule.name} threw: ${cause.message}`, rule.name, cause);
        this.logger.error({ err: error, rule: rule.name }, 'Rule threw an exception — skipping');
      }
    }

    return findings;
  }

  // ─────────────────────────────────────────────────────────
  // PIPELINE
  // ─────────────────────────────────────────────────────────

  private synthesize(
    client: Readonly<ClientProfile>,
    media: Readonly<MediaCharacteristics>,
    settings: PolicySettings,
  ): PlaybackPolicy {
    const draft: PolicyDraft = {
      flags: { directPlay: true, directStream: true, transcoding: true },
      pinnedBy: {},
      confidence: BASELINE_DECISION_CONFIDENCE,
      reasoning: [],
    };
    const cost = media.transcodeCostEstimate ?? estimateTranscodeCost(media);

    this.applyRules(this.evaluateRules(client, media), draft);

    this.refineVideoCodec(client, media, draft);
    this.refineAudioCodec(client, media, cost, draft);
    this.refineContainer(client, media, draft);
    this.refineBitrate(client, media, settings, draft);
    this.annotateCost(cost, draft);

    const confidence = Math.min(1, Math.max(0, draft.confidence));

    if (confidence < LOW_CONFIDENCE_THRESHOLD) {
      this.logger.debug(
        { confidence, deviceId: client.deviceId, mediaSourceId: media.mediaSourceId },
        'Low confidence — deferring to host defaults',
      );
      return defaultPolicy();
    }

    const policy: PlaybackPolicy = {
      allowDirectPlay: draft.flags.directPlay,
      allowDirectStream: draft.flags.directStream,
      allowTranscoding: draft.flags.transcoding,
      bitrateCap: draft.bitrateCap,
      preferredVideoCodec: '',
      confidence,
      reasoning: draft.reasoning.join('\n'),
    };

    this.logger.debug(
      {
        deviceId: client.deviceId,
        mediaSourceId: media.mediaSourceId,
        directPlay: policy.allowDirectPlay,
        directStream: policy.allowDirectStream,
        transcoding: policy.allowTranscoding,
        bitrateCap: policy.bitrateCap,
        confidence,
      },
      'Computed playback policy',
    );

    return policy;
  }

  private applyRules(findings: RuleFinding[], draft: PolicyDraft): void {
    for (const item of findings) {
      draft.reasoning.push(`[Rule:${item.ruleName}] ${item.rationale}`);
    }

    const ranked = rankFindings(findings);
    for (const dimension of POLICY_DIMENSIONS) {
      const verdict = ranked[dimension];
      if (!verdict) continue;
      draft.flags[dimension] = verdict.allow;
      if (verdict.severity === 'require') {
        draft.pinnedBy[dimension] = verdict.ruleName;
      }
    }

    draft.bitrateCap = ranked.bitrateCap;
    draft.confidence += ranked.confidenceDelta;
  }

  private refineVideoCodec(
    client: Readonly<ClientProfile>,
    media: Readonly<MediaCharacteristics>,
    draft: PolicyDraft,
  ): void {
    const codec = normalizeKey(media.videoCodec);
    if (codec === undefined) {
      draft.reasoning.push('No video codec info available — allowing all methods.');
      return;
    }

    const confidence = lookupConfidence(client.codecConfidence, codec);
    if (confidence === undefined) {
      draft.reasoning.push(`Video codec '${codec}' — no confidence data, deferring.`);
      return;
    }

    if (confidence >= HIGH_CONFIDENCE_THRESHOLD) {
      draft.reasoning.push(`Video codec '${codec}' confidence ${confidence.toFixed(2)} — favoring direct play.`);
      this.setFlag(draft, 'directPlay', true);
      draft.confidence += VIDEO_HIGH_CONFIDENCE_BONUS;
    } else if (confidence >= LOW_CONFIDENCE_THRESHOLD) {
      draft.reasoning.push(`Video codec '${codec}' confidence ${confidence.toFixed(2)} — allowing direct play with fallback.`);
      this.setFlag(draft, 'directPlay', true);
      this.setFlag(draft, 'directStream', true);
    } else {
      draft.reasoning.push(`Video codec '${codec}' confidence ${confidence.toFixed(2)} — codec likely unsupported, allowing transcode.`);
      this.setFlag(draft, 'directPlay', false);
      this.setFlag(draft, 'transcoding', true);
      draft.confidence -= VIDEO_LOW_CONFIDENCE_PENALTY;
    }
  }

  private refineAudioCodec(
    client: Readonly<ClientProfile>,
    media: Readonly<MediaCharacteristics>,
    cost: TranscodeCost,
    draft: PolicyDraft,
  ): void {
    const codec = normalizeKey(media.audioCodec);
    if (codec === undefined) {
      return;
    }

    const confidence = lookupConfidence(client.codecConfidence, codec);
    if (confidence === undefined) {
      draft.reasoning.push(`Audio codec '${codec}' — no confidence data, deferring.`);
      return;
    }

    if (confidence >= HIGH_CONFIDENCE_THRESHOLD) {
      draft.reasoning.push(`Audio codec '${codec}' confidence ${confidence.toFixed(2)} — compatible.`);
      draft.confidence += AUDIO_HIGH_CONFIDENCE_BONUS;
    } else if (confidence >= LOW_CONFIDENCE_THRESHOLD) {
      draft.reasoning.push(`Audio codec '${codec}' confidence ${confidence.toFixed(2)} — may need audio transcode.`);
    } else {
      draft.reasoning.push(`Audio codec '${codec}' confidence ${confidence.toFixed(2)} — audio transcode likely required.`);
      this.setFlag(draft, 'transcoding', true);

      // Re-encoding only the audio track is far cheaper than a video transcode
      if (draft.flags.directPlay && TRANSCODE_COST_RANK[cost] <= TRANSCODE_COST_RANK.remux) {
        draft.reasoning.push('Audio-only transcode is cheap — direct stream with audio transcode preferred over full video transcode.');
        this.setFlag(draft, 'directStream', true);
      }

      draft.confidence -= AUDIO_LOW_CONFIDENCE_PENALTY;
    }
  }

  private refineContainer(
    client: Readonly<ClientProfile>,
    media: Readonly<MediaCharacteristics>,
    draft: PolicyDraft,
  ): void {
    const container = normalizeKey(media.container);
    if (container === undefined) {
      return;
    }

    const confidence = lookupConfidence(client.containerConfidence, container);
    if (confidence === undefined) {
      draft.reasoning.push(`Container '${container}' — no confidence data, deferring.`);
      return;
    }

    if (confidence >= HIGH_CONFIDENCE_THRESHOLD) {
      draft.reasoning.push(`Container '${container}' confidence ${confidence.toFixed(2)} — no remux needed.`);
      draft.confidence += CONTAINER_HIGH_CONFIDENCE_BONUS;
    } else if (confidence >= LOW_CONFIDENCE_THRESHOLD) {
      draft.reasoning.push(`Container '${container}' confidence ${confidence.toFixed(2)} — may need remux.`);
      this.setFlag(draft, 'directStream', true);
    } else if (draft.flags.directPlay) {
      draft.reasoning.push(`Container '${container}' confidence ${confidence.toFixed(2)} — forcing direct stream/remux over direct play.`);
      this.setFlag(draft, 'directPlay', false);
      this.setFlag(draft, 'directStream', true);
    }
  }

  private refineBitrate(
    client: Readonly<ClientProfile>,
    media: Readonly<MediaCharacteristics>,
    settings: PolicySettings,
    draft: PolicyDraft,
  ): void {
    const effectiveCap = settings.globalMaxBitrateOverride ?? client.maxBitrate;
    if (effectiveCap === undefined || media.bitrate === undefined || media.bitrate <= effectiveCap) {
      return;
    }

    draft.bitrateCap = draft.bitrateCap === undefined ? effectiveCap : Math.min(draft.bitrateCap, effectiveCap);
    this.setFlag(draft, 'transcoding', true);
    draft.reasoning.push(
      `Media bitrate ${formatMbps(media.bitrate)} exceeds cap ${formatMbps(effectiveCap)} — transcode may be needed.`,
    );
  }

  private annotateCost(cost: TranscodeCost, draft: PolicyDraft): void {
    switch (cost) {
      case 'extreme':
        draft.reasoning.push('Transcode cost: EXTREME — strongly prefer direct play if possible.');
        if (!draft.flags.directPlay) {
          draft.reasoning.push('WARNING: Direct play disallowed but transcode will be very expensive.');
        }
        break;
      case 'high':
        draft.reasoning.push('Transcode cost: HIGH — prefer direct play/stream.');
        break;
      case 'medium':
        draft.reasoning.push('Transcode cost: MEDIUM — transcode is manageable but direct play still preferred.');
        break;
      case 'low':
        draft.reasoning.push('Transcode cost: LOW — lightweight transcode, no significant server impact.');
        break;
      case 'remux':
        draft.reasoning.push('Transcode cost: REMUX only — container remux is cheap, direct stream is fine.');
        this.setFlag(draft, 'directStream', true);
        break;
    }
  }

  /**
   * Confidence refinements may overturn anything except a dimension a
   * `require` finding has settled.
   */
  private setFlag(draft: PolicyDraft, dimension: PolicyDimension, value: boolean): void {
    if (draft.flags[dimension] === value) return;

    const pinnedBy = draft.pinnedBy[dimension];
    if (pinnedBy !== undefined) {
      const state = draft.flags[dimension] ? 'allowed' : 'disallowed';
      draft.reasoning.push(`${DIMENSION_LABELS[dimension]} stays ${state} — required by ${pinnedBy}.`);
      return;
    }

    draft.flags[dimension] = value;
  }
}

