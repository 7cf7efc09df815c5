/**
 * PlaybackAdvisor — host-facing facade
 *
 * Wires configuration, storage, client and media registries, the decision
 * engine, telemetry and learning into the three calls a host makes:
 * advise (negotiation), startPlayback and completePlayback.
 *
 * advise() never throws. When the decision itself fails the host gets the
 * default pass-through policy; a failed intervention write is only logged.
 */

import type {
  ClientDescriptor,
  ClientProfile,
  MediaCharacteristics,
  PlaybackOutcome,
  PlaybackPolicy,
} from '../models/types.js';
import type { PlaywiseConfig } from '../core/types.js';
import type { PolicyDataStore } from '../store/types.js';
import type { PlaybackRule } from '../rules/types.js';
import type { BaselineTable } from '../clients/baseline.js';
import { defaultPolicy } from '../models/policy.js';
import { EventBus } from '../core/events.js';
import { KeyedMutex } from '../core/mutex.js';
import { getLogger } from '../core/logger.js';
import { StoreError, toError } from '../core/errors.js';
import { openStore } from '../store/open.js';
import { ClientRegistry } from '../clients/registry.js';
import { MediaRegistry } from '../cost/media-registry.js';
import { DecisionEngine } from '../decision/engine.js';
import { TelemetryRecorder, type PlaybackSession } from '../telemetry/recorder.js';
import { LearningService, type LearningUpdate, type RecalibrationSummary } from '../learning/service.js';

export interface PlaybackAdvisorOptions {
  config: PlaywiseConfig;
  /** Defaults to the store the configuration names */
  store?: PolicyDataStore;
  events?: EventBus;
  rules?: readonly PlaybackRule[];
  baseline?: BaselineTable;
}

export interface CompletedPlayback {
  outcome: PlaybackOutcome;
  /** Null when learning is disabled or the client profile is gone */
  learning: LearningUpdate | null;
}

export class PlaybackAdvisor {
  private logger = getLogger();
  private config: PlaywiseConfig;
  readonly store: PolicyDataStore;
  readonly events: EventBus;
  readonly clients: ClientRegistry;
  readonly media: MediaRegistry;
  readonly engine: DecisionEngine;
  readonly telemetry: TelemetryRecorder;
  readonly learning: LearningService;

  constructor(options: PlaybackAdvisorOptions) {
    this.config = options.config;
    this.store = options.store ?? openStore(options.config);
    this.events = options.events ?? new EventBus();

    this.clients = new ClientRegistry({ store: this.store, baseline: options.baseline });
    this.media = new MediaRegistry();
    this.engine = new DecisionEngine({ settings: this.config.policy, rules: options.rules });
    this.telemetry = new TelemetryRecorder({
      store: this.store,
      settings: this.config.telemetry,
      policy: this.config.policy,
      events: this.events,
    });
    this.learning = new LearningService({
      store: this.store,
      settings: this.config.learning,
      locks: new KeyedMutex(),
      events: this.events,
    });
  }

  getConfig(): PlaywiseConfig {
    return this.config;
  }

  /**
   * Swap in a reloaded configuration. Storage is not reopened.
   */
  reconfigure(config: PlaywiseConfig): void {
    this.config = config;
    this.engine.updateSettings(config.policy);
    this.telemetry.updateSettings(config.telemetry, config.policy);
    this.learning.updateSettings(config.learning);
  }

  // ─────────────────────────────────────────────────────────
  // DECISIONS
  // ─────────────────────────────────────────────────────────

  /**
   * Compute and record the policy for a session descriptor and media source.
   */
  async advise(descriptor: ClientDescriptor, media: Readonly<MediaCharacteristics>): Promise<PlaybackPolicy> {
    const decision = await this.decide(descriptor, media);
    if (!decision) return defaultPolicy();

    const { client, resolved, policy } = decision;
    try {
      await this.telemetry.recordIntervention(client, resolved, policy);
    } catch (err) {
      const error = err instanceof StoreError
        ? err
        : new StoreError('Failed to record intervention', 'recordIntervention', toError(err));
      this.logger.warn(
        { err: error, deviceId: client.deviceId, mediaSourceId: resolved.mediaSourceId },
        'Intervention not recorded — returning computed policy',
      );
    }
    return policy;
  }

  private async decide(
    descriptor: ClientDescriptor,
    media: Readonly<MediaCharacteristics>,
  ): Promise<{ client: ClientProfile; resolved: MediaCharacteristics; policy: PlaybackPolicy } | null> {
    try {
      const client = await this.clients.resolve(descriptor);
      const resolved = this.media.resolve(media);
      return { client, resolved, policy: this.engine.computePolicy(client, resolved) };
    } catch (err) {
      this.logger.error(
        { err: toError(err), deviceId: descriptor.deviceId, mediaSourceId: media.mediaSourceId },
        'Advice failed — returning default policy',
      );
      return null;
    }
  }

  // ─────────────────────────────────────────────────────────
  // TELEMETRY + LEARNING
  // ─────────────────────────────────────────────────────────

  /**
   * Record the start of a session with the policy that applies to it.
   */
  async startPlayback(
    descriptor: ClientDescriptor,
    media: Readonly<MediaCharacteristics>,
    session: PlaybackSession,
  ): Promise<PlaybackOutcome> {
    const client = await this.clients.resolve(descriptor);
    const resolved = this.media.resolve(media);
    const policy = this.engine.computePolicy(client, resolved);

    return this.telemetry.recordPlaybackStart(client, resolved, policy, session);
  }

  /**
   * Finalize a session and feed it to learning. Returns null when no start
   * was recorded for the session.
   */
  async completePlayback(
    playSessionId: string,
    playedTicks: number | undefined,
    totalTicks: number | undefined,
  ): Promise<CompletedPlayback | null> {
    const outcome = await this.telemetry.recordPlaybackStop(playSessionId, playedTicks, totalTicks);
    if (!outcome) return null;

    const client = await this.clients.get(outcome.deviceId);
    if (!client) {
      this.logger.warn({ deviceId: outcome.deviceId, playSessionId }, 'Outcome for unknown client — not learned');
      return { outcome, learning: null };
    }

    const learning = await this.learning.processOutcome(outcome, client);
    return { outcome, learning };
  }

  /**
   * Recompute a stored client's confidence from history. Null when the
   * device has never been seen.
   */
  async recalibrate(deviceId: string): Promise<RecalibrationSummary | null> {
    const client = await this.clients.get(deviceId);
    if (!client) return null;
    return this.learning.recalibrateClient(client);
  }

  async prune(now?: number): Promise<number> {
    return this.telemetry.pruneOldData(now);
  }

  async listClients(): Promise<ClientProfile[]> {
    return this.store.listClients();
  }

  async close(): Promise<void> {
    this.clients.invalidateAll();
    this.media.invalidateAll();
    await this.store.close();
  }
}
