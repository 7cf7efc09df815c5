/**
 * LearningService — Outcome-Driven Confidence Learning
 *
 * Turns observed playback outcomes into per-client codec and container
 * confidence. Two paths:
 * - processOutcome: one small EMA-style step per finished session
 * - recalibrateClient: bulk recompute from the device's recent history
 *
 * Both run under a per-device lock. Inside it the stored confidence maps
 * are re-read before the step is applied, so the caller's copy may be stale
 * without losing an increment. The passed profile ends up holding the new
 * maps. A failed write is logged as a lost update; it never propagates to
 * the caller.
 */

import type { ClientProfile, ConfidenceMap, PlaybackOutcome, PlaybackResult } from '../models/types.js';
import type { LearningSettings } from '../core/types.js';
import type { PolicyDataStore } from '../store/types.js';
import type { ConfidenceChange, ConfidenceDimension, EventBus } from '../core/events.js';
import { normalizeKey } from '../models/policy.js';
import { KeyedMutex } from '../core/mutex.js';
import { StoreError, toError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { classifyOutcome } from './classify.js';
import { applyAdjustment, clampConfidence, computeAdjustments } from './adjustments.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

/** Keys with fewer observations than this are left alone by recalibration */
export const MIN_RECALIBRATION_SAMPLES = 3;
export const RECALIBRATION_EXISTING_WEIGHT = 0.3;
export const RECALIBRATION_OBSERVED_WEIGHT = 0.7;

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface LearningServiceOptions {
  store: PolicyDataStore;
  settings: LearningSettings;
  /** Shared with anything else that writes client profiles */
  locks?: KeyedMutex;
  events?: EventBus;
}

export interface LearningUpdate {
  deviceId: string;
  result: PlaybackResult;
  changes: ConfidenceChange[];
  /** False when the profile could not be written back */
  persisted: boolean;
}

export interface RecalibrationSummary {
  deviceId: string;
  samples: number;
  changes: ConfidenceChange[];
  persisted: boolean;
}

interface Tally {
  successes: number;
  total: number;
}

// ═══════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════

export class LearningService {
  private logger = getLogger();
  private readonly store: PolicyDataStore;
  private settings: LearningSettings;
  private readonly locks: KeyedMutex;
  private readonly events?: EventBus;

  constructor(options: LearningServiceOptions) {
    this.store = options.store;
    this.settings = options.settings;
    this.locks = options.locks ?? new KeyedMutex();
    this.events = options.events;
  }

  updateSettings(settings: LearningSettings): void {
    this.settings = settings;
  }

  isEnabled(): boolean {
    return this.settings.enabled;
  }

  // ─────────────────────────────────────────────────────────
  // INCREMENTAL
  // ─────────────────────────────────────────────────────────

  /**
   * Apply one finished outcome to the client's confidence maps and persist
   * the profile. Returns null when learning is disabled.
   */
  async processOutcome(outcome: Readonly<PlaybackOutcome>, client: ClientProfile): Promise<LearningUpdate | null> {
    if (!this.settings.enabled) {
      this.logger.debug({ deviceId: client.deviceId }, 'Learning disabled — outcome ignored');
      return null;
    }

    const result = classifyOutcome(outcome);

    return this.locks.withLock(client.deviceId, async () => {
      await this.refresh(client);

      const adjustments = computeAdjustments(outcome, result);
      const changes: ConfidenceChange[] = [];

      this.adjust(client.codecConfidence, 'codec', outcome.videoCodec, adjustments.video, changes);
      this.adjust(client.codecConfidence, 'codec', outcome.audioCodec, adjustments.audio, changes);
      this.adjust(client.containerConfidence, 'container', outcome.container, adjustments.container, changes);

      client.lastUpdated = Date.now();
      const persisted = await this.persist(client);

      this.logger.debug(
        { deviceId: client.deviceId, result, changes: changes.length, persisted },
        'Applied playback outcome',
      );
      this.events?.emit('learning:updated', {
        timestamp: Date.now(),
        deviceId: client.deviceId,
        result,
        changes,
      });

      return { deviceId: client.deviceId, result, changes, persisted };
    });
  }

  // ─────────────────────────────────────────────────────────
  // BULK
  // ─────────────────────────────────────────────────────────

  /**
   * Recompute confidence from the device's most recent outcomes. A key
   * needs at least MIN_RECALIBRATION_SAMPLES observations to move.
   */
  async recalibrateClient(client: ClientProfile): Promise<RecalibrationSummary> {
    return this.locks.withLock(client.deviceId, async () => {
      await this.refresh(client);
      const outcomes = await this.store.getOutcomesByDevice(client.deviceId, this.settings.recalibrationWindow);

      const codecTallies = new Map<string, Tally>();
      const containerTallies = new Map<string, Tally>();

      for (const outcome of outcomes) {
        const success = outcome.playMethod === 'direct-play' && classifyOutcome(outcome) === 'success';
        tally(codecTallies, outcome.videoCodec, success);
        tally(codecTallies, outcome.audioCodec, success);
        tally(containerTallies, outcome.container, success);
      }

      const changes: ConfidenceChange[] = [
        ...this.blend(client.codecConfidence, 'codec', codecTallies),
        ...this.blend(client.containerConfidence, 'container', containerTallies),
      ];

      let persisted = true;
      if (changes.length > 0) {
        client.lastUpdated = Date.now();
        persisted = await this.persist(client);
      }

      this.logger.info(
        { deviceId: client.deviceId, samples: outcomes.length, changes: changes.length },
        'Recalibrated client confidence',
      );
      this.events?.emit('learning:recalibrated', {
        timestamp: Date.now(),
        deviceId: client.deviceId,
        samples: outcomes.length,
        changes,
      });

      return { deviceId: client.deviceId, samples: outcomes.length, changes, persisted };
    });
  }

  // ─── Internal ──────────────────────────────────────────────

  /**
   * Load the latest persisted confidence maps into the profile. Must run
   * under the device lock. A failed read keeps the in-memory maps.
   */
  private async refresh(client: ClientProfile): Promise<void> {
    try {
      const stored = await this.store.getClient(client.deviceId);
      if (!stored) return;
      client.codecConfidence = stored.codecConfidence;
      client.containerConfidence = stored.containerConfidence;
    } catch (err) {
      const error = err instanceof StoreError
        ? err
        : new StoreError(`Failed to read client ${client.deviceId}`, 'getClient', toError(err));
      this.logger.warn({ err: error, deviceId: client.deviceId }, 'Using cached confidence — store read failed');
    }
  }

  private adjust(
    map: ConfidenceMap,
    dimension: ConfidenceDimension,
    rawKey: string | undefined,
    magnitude: number,
    changes: ConfidenceChange[],
  ): void {
    const key = normalizeKey(rawKey);
    if (key === undefined || magnitude === 0) return;

    const previous = Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined;
    const next = applyAdjustment(previous, magnitude);
    map[key] = next;
    changes.push({ dimension, key, previous, next });
  }

  private blend(map: ConfidenceMap, dimension: ConfidenceDimension, tallies: Map<string, Tally>): ConfidenceChange[] {
    const changes: ConfidenceChange[] = [];

    for (const [key, { successes, total }] of tallies) {
      if (total < MIN_RECALIBRATION_SAMPLES) continue;

      const previous = Object.prototype.hasOwnProperty.call(map, key) ? map[key] : undefined;
      const observed = successes / total;
      const next = clampConfidence(
        (previous ?? 0) * RECALIBRATION_EXISTING_WEIGHT + observed * RECALIBRATION_OBSERVED_WEIGHT,
      );
      map[key] = next;
      changes.push({ dimension, key, previous, next });
    }

    return changes;
  }

  private async persist(client: ClientProfile): Promise<boolean> {
    try {
      await this.store.upsertClient(client);
      return true;
    } catch (err) {
      const error = err instanceof StoreError
        ? err
        : new StoreError(`Failed to persist client ${client.deviceId}`, 'upsertClient', toError(err));
      this.logger.warn({ err: error, deviceId: client.deviceId }, 'Confidence update lost — store write failed');
      this.events?.emit('learning:update-lost', { timestamp: Date.now(), deviceId: client.deviceId, error });
      return false;
    }
  }
}

function tally(tallies: Map<string, Tally>, rawKey: string | undefined, success: boolean): void {
  const key = normalizeKey(rawKey);
  if (key === undefined) return;

  const entry = tallies.get(key) ?? { successes: 0, total: 0 };
  entry.total++;
  if (success) entry.successes++;
  tallies.set(key, entry);
}
