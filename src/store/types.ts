/**
 * Persistence boundary for client profiles, playback outcomes and
 * intervention records. The decision core never touches a store; the
 * registry, telemetry and learning components do.
 */

import type { ClientProfile, InterventionRecord, PlaybackOutcome } from '../models/types.js';

export interface PolicyDataStore {
  getClient(deviceId: string): Promise<ClientProfile | null>;
  /** Insert or replace by deviceId */
  upsertClient(profile: ClientProfile): Promise<void>;
  listClients(): Promise<ClientProfile[]>;

  /** Insert or replace by outcome id */
  recordOutcome(outcome: PlaybackOutcome): Promise<void>;
  getOutcomeBySession(playSessionId: string): Promise<PlaybackOutcome | null>;
  /** Most recent first, at most `limit` rows */
  getOutcomesByDevice(deviceId: string, limit: number): Promise<PlaybackOutcome[]>;
  /** Oldest first */
  getOutcomesSince(since: number): Promise<PlaybackOutcome[]>;
  /** Delete outcomes with a timestamp before `olderThan`; returns the count removed */
  pruneOutcomes(olderThan: number): Promise<number>;

  recordIntervention(record: InterventionRecord): Promise<void>;
  /** Oldest first */
  getInterventionsSince(since: number): Promise<InterventionRecord[]>;

  close(): Promise<void>;
}
