import type { ClientProfile, InterventionRecord, PlaybackOutcome } from '../models/types.js';
import type { PolicyDataStore } from './types.js';

function cloneProfile(profile: ClientProfile): ClientProfile {
  return {
    ...profile,
    codecConfidence: { ...profile.codecConfidence },
    containerConfidence: { ...profile.containerConfidence },
  };
}

function cloneOutcome(outcome: PlaybackOutcome): PlaybackOutcome {
  return {
    ...outcome,
    transcodeReasons: [...outcome.transcodeReasons],
    policySnapshot: outcome.policySnapshot ? { ...outcome.policySnapshot } : undefined,
  };
}

/**
 * Map-backed store. Used when no database path is configured, and in tests.
 * Values are copied on the way in and out so callers never share state
 * with the store.
 */
export class InMemoryDataStore implements PolicyDataStore {
  private clients: Map<string, ClientProfile> = new Map();
  private outcomes: Map<string, PlaybackOutcome> = new Map();
  private interventions: InterventionRecord[] = [];

  async getClient(deviceId: string): Promise<ClientProfile | null> {
    const profile = this.clients.get(deviceId);
    return profile ? cloneProfile(profile) : null;
  }

  async upsertClient(profile: ClientProfile): Promise<void> {
    this.clients.set(profile.deviceId, cloneProfile(profile));
  }

  async listClients(): Promise<ClientProfile[]> {
    return [...this.clients.values()]
      .sort((a, b) => b.lastUpdated - a.lastUpdated)
      .map(cloneProfile);
  }

  async recordOutcome(outcome: PlaybackOutcome): Promise<void> {
    this.outcomes.set(outcome.id, cloneOutcome(outcome));
  }

  async getOutcomeBySession(playSessionId: string): Promise<PlaybackOutcome | null> {
    let latest: PlaybackOutcome | null = null;
    for (const outcome of this.outcomes.values()) {
      if (outcome.playSessionId !== playSessionId) continue;
      if (!latest || outcome.timestamp >= latest.timestamp) {
        latest = outcome;
      }
    }
    return latest ? cloneOutcome(latest) : null;
  }

  async getOutcomesByDevice(deviceId: string, limit: number): Promise<PlaybackOutcome[]> {
    return [...this.outcomes.values()]
      .filter((o) => o.deviceId === deviceId)
      .sort((a, b) => b.timestamp - a.timestamp)
      .slice(0, limit)
      .map(cloneOutcome);
  }

  async getOutcomesSince(since: number): Promise<PlaybackOutcome[]> {
    return [...this.outcomes.values()]
      .filter((o) => o.timestamp >= since)
      .sort((a, b) => a.timestamp - b.timestamp)
      .map(cloneOutcome);
  }

  async pruneOutcomes(olderThan: number): Promise<number> {
    let removed = 0;
    for (const [id, outcome] of this.outcomes) {
      if (outcome.timestamp < olderThan) {
        this.outcomes.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async recordIntervention(record: InterventionRecord): Promise<void> {
    this.interventions.push({ ...record });
  }

  async getInterventionsSince(since: number): Promise<InterventionRecord[]> {
    return this.interventions
      .filter((r) => r.timestamp >= since)
      .sort((a, b) => a.timestamp - b.timestamp)
      .map((r) => ({ ...r }));
  }

  async close(): Promise<void> {
    this.clients.clear();
    this.outcomes.clear();
    this.interventions = [];
  }
}
