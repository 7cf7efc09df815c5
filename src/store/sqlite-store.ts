/**
 * SQLite-backed policy data store (better-sqlite3).
 *
 * Confidence maps, transcode reasons and policy snapshots are stored as JSON
 * text columns and validated with zod on the way out, so a hand-edited or
 * corrupted row surfaces as a StoreError instead of a malformed profile.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import type {
  ClientProfile,
  InterventionRecord,
  PlaybackOutcome,
  PlaybackPolicy,
} from '../models/types.js';
import { isClientCategory, isPlaybackResult, isPlayMethod } from '../models/policy.js';
import { StoreError, toError } from '../core/errors.js';
import { ensureParentDirSync } from '../utils/fs.js';
import type { PolicyDataStore } from './types.js';

// ═══════════════════════════════════════════════════════════════
// ROW SHAPES
// ═══════════════════════════════════════════════════════════════

interface ClientRow {
  device_id: string;
  category: string;
  client_name: string;
  client_version: string;
  device_name: string;
  user_agent: string | null;
  codec_confidence: string;
  container_confidence: string;
  max_bitrate: number | null;
  reliability_score: number;
  first_seen: number;
  last_updated: number;
}

interface OutcomeRow {
  id: string;
  device_id: string;
  client_name: string;
  item_id: string;
  play_session_id: string;
  video_codec: string | null;
  audio_codec: string | null;
  container: string | null;
  play_method: string;
  transcode_reasons: string;
  result: string;
  played_ticks: number | null;
  total_ticks: number | null;
  policy_snapshot: string | null;
  timestamp: number;
}

interface InterventionRow {
  id: string;
  timestamp: number;
  device_id: string;
  device_name: string;
  client_name: string;
  media_source_id: string;
  is_active: number;
  allow_direct_play: number;
  allow_direct_stream: number;
  allow_transcoding: number;
  bitrate_cap: number | null;
  confidence: number;
  reasoning: string;
}

const ConfidenceMapSchema = z.record(z.number().min(0).max(1));

const ReasonsSchema = z.array(z.string());

const PolicySnapshotSchema = z.object({
  allowDirectPlay: z.boolean(),
  allowDirectStream: z.boolean(),
  allowTranscoding: z.boolean(),
  bitrateCap: z.number().optional(),
  preferredVideoCodec: z.string().default(''),
  confidence: z.number(),
  reasoning: z.string(),
});

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS clients (
    device_id TEXT PRIMARY KEY,
    category TEXT NOT NULL,
    client_name TEXT NOT NULL,
    client_version TEXT NOT NULL,
    device_name TEXT NOT NULL,
    user_agent TEXT,
    codec_confidence TEXT NOT NULL,
    container_confidence TEXT NOT NULL,
    max_bitrate INTEGER,
    reliability_score REAL NOT NULL,
    first_seen INTEGER NOT NULL,
    last_updated INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS outcomes (
    id TEXT PRIMARY KEY,
    device_id TEXT NOT NULL,
    client_name TEXT NOT NULL,
    item_id TEXT NOT NULL,
    play_session_id TEXT NOT NULL,
    video_codec TEXT,
    audio_codec TEXT,
    container TEXT,
    play_method TEXT NOT NULL,
    transcode_reasons TEXT NOT NULL,
    result TEXT NOT NULL,
    played_ticks INTEGER,
    total_ticks INTEGER,
    policy_snapshot TEXT,
    timestamp INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_outcomes_device ON outcomes(device_id, timestamp);
  CREATE INDEX IF NOT EXISTS idx_outcomes_session ON outcomes(play_session_id);
  CREATE INDEX IF NOT EXISTS idx_outcomes_timestamp ON outcomes(timestamp);

  CREATE TABLE IF NOT EXISTS interventions (
    id TEXT PRIMARY KEY,
    timestamp INTEGER NOT NULL,
    device_id TEXT NOT NULL,
    device_name TEXT NOT NULL,
    client_name TEXT NOT NULL,
    media_source_id TEXT NOT NULL,
    is_active INTEGER NOT NULL,
    allow_direct_play INTEGER NOT NULL,
    allow_direct_stream INTEGER NOT NULL,
    allow_transcoding INTEGER NOT NULL,
    bitrate_cap INTEGER,
    confidence REAL NOT NULL,
    reasoning TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_interventions_timestamp ON interventions(timestamp);
`;

// ═══════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════

export class SQLiteDataStore implements PolicyDataStore {
  private db: Database.Database;

  /**
   * Open (or create) the database. Pass ':memory:' for a throwaway store.
   */
  constructor(dbPath: string) {
    try {
      ensureParentDirSync(dbPath);
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.exec(SCHEMA);
    } catch (err) {
      throw new StoreError(`Failed to open database at ${dbPath}`, 'open', toError(err));
    }
  }

  // ─────────────────────────────────────────────────────────
  // CLIENTS
  // ─────────────────────────────────────────────────────────

  async getClient(deviceId: string): Promise<ClientProfile | null> {
    const row = this.run('getClient', () =>
      this.db.prepare<[string], ClientRow>('SELECT * FROM clients WHERE device_id = ?').get(deviceId),
    );
    return row ? this.toClient(row) : null;
  }

  async upsertClient(profile: ClientProfile): Promise<void> {
    this.run('upsertClient', () => {
      this.db.prepare(`
        INSERT OR REPLACE INTO clients (
          device_id, category, client_name, client_version, device_name, user_agent,
          codec_confidence, container_confidence, max_bitrate, reliability_score,
          first_seen, last_updated
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        profile.deviceId,
        profile.category,
        profile.clientName,
        profile.clientVersion,
        profile.deviceName,
        profile.userAgent ?? null,
        JSON.stringify(profile.codecConfidence),
        JSON.stringify(profile.containerConfidence),
        profile.maxBitrate ?? null,
        profile.reliabilityScore,
        profile.firstSeen,
        profile.lastUpdated,
      );
    });
  }

  async listClients(): Promise<ClientProfile[]> {
    const rows = this.run('listClients', () =>
      this.db.prepare<[], ClientRow>('SELECT * FROM clients ORDER BY last_updated DESC').all(),
    );
    return rows.map((row) => this.toClient(row));
  }

  // ─────────────────────────────────────────────────────────
  // OUTCOMES
  // ─────────────────────────────────────────────────────────

  async recordOutcome(outcome: PlaybackOutcome): Promise<void> {
    this.run('recordOutcome', () => {
      this.db.prepare(`
        INSERT OR REPLACE INTO outcomes (
          id, device_id, client_name, item_id, play_session_id, video_codec, audio_codec,
          container, play_method, transcode_reasons, result, played_ticks, total_ticks,
          policy_snapshot, timestamp
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        outcome.id,
        outcome.deviceId,
        outcome.clientName,
        outcome.itemId,
        outcome.playSessionId,
        outcome.videoCodec ?? null,
        outcome.audioCodec ?? null,
        outcome.container ?? null,
        outcome.playMethod,
        JSON.stringify(outcome.transcodeReasons),
        outcome.result,
        outcome.playedTicks ?? null,
        outcome.totalTicks ?? null,
        outcome.policySnapshot ? JSON.stringify(outcome.policySnapshot) : null,
        outcome.timestamp,
      );
    });
  }

  async getOutcomeBySession(playSessionId: string): Promise<PlaybackOutcome | null> {
    const row = this.run('getOutcomeBySession', () =>
      this.db.prepare<[string], OutcomeRow>(
        'SELECT * FROM outcomes WHERE play_session_id = ? ORDER BY timestamp DESC LIMIT 1',
      ).get(playSessionId),
    );
    return row ? this.toOutcome(row) : null;
  }

  async getOutcomesByDevice(deviceId: string, limit: number): Promise<PlaybackOutcome[]> {
    const rows = this.run('getOutcomesByDevice', () =>
      this.db.prepare<[string, number], OutcomeRow>(
        'SELECT * FROM outcomes WHERE device_id = ? ORDER BY timestamp DESC LIMIT ?',
      ).all(deviceId, limit),
    );
    return rows.map((row) => this.toOutcome(row));
  }

  async getOutcomesSince(since: number): Promise<PlaybackOutcome[]> {
    const rows = this.run('getOutcomesSince', () =>
      this.db.prepare<[number], OutcomeRow>(
        'SELECT * FROM outcomes WHERE timestamp >= ? ORDER BY timestamp ASC',
      ).all(since),
    );
    return rows.map((row) => this.toOutcome(row));
  }

  async pruneOutcomes(olderThan: number): Promise<number> {
    const result = this.run('pruneOutcomes', () =>
      this.db.prepare('DELETE FROM outcomes WHERE timestamp < ?').run(olderThan),
    );
    return result.changes;
  }

  // ─────────────────────────────────────────────────────────
  // INTERVENTIONS
  // ─────────────────────────────────────────────────────────

  async recordIntervention(record: InterventionRecord): Promise<void> {
    this.run('recordIntervention', () => {
      this.db.prepare(`
        INSERT OR REPLACE INTO interventions (
          id, timestamp, device_id, device_name, client_name, media_source_id, is_active,
          allow_direct_play, allow_direct_stream, allow_transcoding, bitrate_cap,
          confidence, reasoning
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        record.id,
        record.timestamp,
        record.deviceId,
        record.deviceName,
        record.clientName,
        record.mediaSourceId,
        record.isActive ? 1 : 0,
        record.allowDirectPlay ? 1 : 0,
        record.allowDirectStream ? 1 : 0,
        record.allowTranscoding ? 1 : 0,
        record.bitrateCap ?? null,
        record.confidence,
        record.reasoning,
      );
    });
  }

  async getInterventionsSince(since: number): Promise<InterventionRecord[]> {
    const rows = this.run('getInterventionsSince', () =>
      this.db.prepare<[number], InterventionRow>(
        'SELECT * FROM interventions WHERE timestamp >= ? ORDER BY timestamp ASC',
      ).all(since),
    );
    return rows.map((row) => ({
      id: row.id,
      timestamp: row.timestamp,
      deviceId: row.device_id,
      deviceName: row.device_name,
      clientName: row.client_name,
      mediaSourceId: row.media_source_id,
      isActive: row.is_active === 1,
      allowDirectPlay: row.allow_direct_play === 1,
      allowDirectStream: row.allow_direct_stream === 1,
      allowTranscoding: row.allow_transcoding === 1,
      bitrateCap: row.bitrate_cap ?? undefined,
      confidence: row.confidence,
      reasoning: row.reasoning,
    }));
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  // ─── Internal ──────────────────────────────────────────────

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      throw new StoreError(`${operation} failed: ${toError(err).message}`, operation, toError(err));
    }
  }

  private parseJson<T>(operation: string, schema: { parse(data: unknown): T }, text: string): T {
    try {
      return schema.parse(JSON.parse(text));
    } catch (err) {
      throw new StoreError(`${operation}: malformed JSON column`, operation, toError(err));
    }
  }

  private toClient(row: ClientRow): ClientProfile {
    return {
      deviceId: row.device_id,
      category: isClientCategory(row.category) ? row.category : 'unknown',
      clientName: row.client_name,
      clientVersion: row.client_version,
      deviceName: row.device_name,
      userAgent: row.user_agent ?? undefined,
      codecConfidence: this.parseJson('getClient', ConfidenceMapSchema, row.codec_confidence),
      containerConfidence: this.parseJson('getClient', ConfidenceMapSchema, row.container_confidence),
      maxBitrate: row.max_bitrate ?? undefined,
      reliabilityScore: row.reliability_score,
      firstSeen: row.first_seen,
      lastUpdated: row.last_updated,
    };
  }

  private toOutcome(row: OutcomeRow): PlaybackOutcome {
    const policySnapshot: PlaybackPolicy | undefined = row.policy_snapshot === null
      ? undefined
      : this.parseJson('getOutcome', PolicySnapshotSchema, row.policy_snapshot);

    return {
      id: row.id,
      deviceId: row.device_id,
      clientName: row.client_name,
      itemId: row.item_id,
      playSessionId: row.play_session_id,
      videoCodec: row.video_codec ?? undefined,
      audioCodec: row.audio_codec ?? undefined,
      container: row.container ?? undefined,
      playMethod: isPlayMethod(row.play_method) ? row.play_method : 'unknown',
      transcodeReasons: this.parseJson('getOutcome', ReasonsSchema, row.transcode_reasons),
      result: isPlaybackResult(row.result) ? row.result : 'unknown',
      playedTicks: row.played_ticks ?? undefined,
      totalTicks: row.total_ticks ?? undefined,
      policySnapshot,
      timestamp: row.timestamp,
    };
  }
}
