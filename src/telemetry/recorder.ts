/**
 * TelemetryRecorder — playback outcome and intervention bookkeeping.
 *
 * A session is recorded at start with an unresolved result (or `transcoded`
 * when the host already chose to transcode) and finalized at stop, when
 * the watched fraction is known.
 */

import { nanoid } from 'nanoid';
import type {
  ClientProfile,
  InterventionRecord,
  MediaCharacteristics,
  PlaybackOutcome,
  PlaybackPolicy,
  PlayMethod,
} from '../models/types.js';
import type { PolicySettings, TelemetrySettings } from '../core/types.js';
import type { PolicyDataStore } from '../store/types.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { classifyOutcome } from '../learning/classify.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PlaybackSession {
  playSessionId: string;
  itemId?: string;
  playMethod: PlayMethod;
  /** Host transcode reason flags, if the host transcodes */
  transcodeReasons?: string[];
}

export interface TelemetryRecorderOptions {
  store: PolicyDataStore;
  settings: TelemetrySettings;
  /** Decides whether recorded interventions count as active */
  policy: PolicySettings;
  events?: EventBus;
}

export class TelemetryRecorder {
  private logger = getLogger();
  private readonly store: PolicyDataStore;
  private settings: TelemetrySettings;
  private policy: PolicySettings;
  private readonly events?: EventBus;

  constructor(options: TelemetryRecorderOptions) {
    this.store = options.store;
    this.settings = options.settings;
    this.policy = options.policy;
    this.events = options.events;
  }

  updateSettings(settings: TelemetrySettings, policy: PolicySettings): void {
    this.settings = settings;
    this.policy = policy;
  }

  async recordPlaybackStart(
    client: Readonly<ClientProfile>,
    media: Readonly<MediaCharacteristics>,
    policy: Readonly<PlaybackPolicy> | undefined,
    session: PlaybackSession,
  ): Promise<PlaybackOutcome> {
    const outcome: PlaybackOutcome = {
      id: nanoid(12),
      deviceId: client.deviceId,
      clientName: client.clientName,
      itemId: session.itemId ?? media.itemId ?? '',
      playSessionId: session.playSessionId,
      videoCodec: media.videoCodec,
      audioCodec: media.audioCodec,
      container: media.container,
      playMethod: session.playMethod,
      transcodeReasons: [...(session.transcodeReasons ?? [])],
      result: session.playMethod === 'transcode' ? 'transcoded' : 'unknown',
      policySnapshot: policy ? { ...policy } : undefined,
      timestamp: Date.now(),
    };

    await this.store.recordOutcome(outcome);

    this.logger.info(
      {
        deviceId: outcome.deviceId,
        playSessionId: outcome.playSessionId,
        itemId: outcome.itemId,
        playMethod: outcome.playMethod,
      },
      'Playback started',
    );
    this.events?.emit('telemetry:playback:started', { timestamp: Date.now(), outcome });

    return outcome;
  }

  /**
   * Finalize the session's outcome. Returns null when no start was recorded.
   */
  async recordPlaybackStop(
    playSessionId: string,
    playedTicks: number | undefined,
    totalTicks: number | undefined,
  ): Promise<PlaybackOutcome | null> {
    const existing = await this.store.getOutcomeBySession(playSessionId);
    if (!existing) {
      this.logger.debug({ playSessionId }, 'Playback stop without a matching start — ignored');
      return null;
    }

    const updated: PlaybackOutcome = { ...existing, playedTicks, totalTicks };
    updated.result = classifyOutcome(updated);

    await this.store.recordOutcome(updated);

    this.logger.info(
      {
        deviceId: updated.deviceId,
        playSessionId,
        playMethod: updated.playMethod,
        result: updated.result,
      },
      'Playback stopped',
    );
    this.events?.emit('telemetry:playback:stopped', { timestamp: Date.now(), outcome: updated });

    return updated;
  }

  async recordIntervention(
    client: Readonly<ClientProfile>,
    media: Readonly<MediaCharacteristics>,
    policy: Readonly<PlaybackPolicy>,
  ): Promise<InterventionRecord> {
    const record: InterventionRecord = {
      id: nanoid(12),
      timestamp: Date.now(),
      deviceId: client.deviceId,
      deviceName: client.deviceName,
      clientName: client.clientName,
      mediaSourceId: media.mediaSourceId ?? '',
      isActive: this.policy.enableDynamicPolicies,
      allowDirectPlay: policy.allowDirectPlay,
      allowDirectStream: policy.allowDirectStream,
      allowTranscoding: policy.allowTranscoding,
      bitrateCap: policy.bitrateCap,
      confidence: policy.confidence,
      reasoning: policy.reasoning,
    };

    await this.store.recordIntervention(record);
    this.events?.emit('telemetry:intervention', { timestamp: record.timestamp, record });

    return record;
  }

  /**
   * Delete outcomes older than the retention window. Returns the count removed.
   */
  async pruneOldData(now: number = Date.now()): Promise<number> {
    const olderThan = now - this.settings.retentionDays * DAY_MS;
    const removed = await this.store.pruneOutcomes(olderThan);

    this.logger.info({ removed, retentionDays: this.settings.retentionDays }, 'Pruned old playback outcomes');
    this.events?.emit('telemetry:pruned', { timestamp: now, olderThan, removed });

    return removed;
  }
}
