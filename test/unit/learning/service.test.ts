import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LearningService } from '../../../src/learning/service.js';
import { InMemoryDataStore } from '../../../src/store/memory-store.js';
import { EventBus } from '../../../src/core/events.js';
import { StoreError } from '../../../src/core/errors.js';
import type { ClientProfile } from '../../../src/models/types.js';
import { makeClient, makeOutcome } from '../../helpers/fixtures.js';

class FailingStore extends InMemoryDataStore {
  override async upsertClient(_profile: ClientProfile): Promise<void> {
    throw new Error('disk full');
  }
}

describe('LearningService', () => {
  let store: InMemoryDataStore;
  let events: EventBus;
  let service: LearningService;

  beforeEach(() => {
    store = new InMemoryDataStore();
    events = new EventBus();
    service = new LearningService({
      store,
      settings: { enabled: true, recalibrationWindow: 500 },
      events,
    });
  });

  describe('processOutcome', () => {
    it('does nothing while learning is disabled', async () => {
      service.updateSettings({ enabled: false, recalibrationWindow: 500 });
      const client = makeClient('unknown', { codecConfidence: { hevc: 0.5 } });

      const update = await service.processOutcome(makeOutcome({ videoCodec: 'hevc', result: 'success' }), client);

      expect(update).toBeNull();
      expect(client.codecConfidence.hevc).toBe(0.5);
      expect(await store.getClient('device-1')).toBeNull();
    });

    it('raises confidence after a direct-play success and persists it', async () => {
      const client = makeClient('unknown', { codecConfidence: { hevc: 0.5 } });
      const outcome = makeOutcome({
        videoCodec: 'HEVC',
        audioCodec: 'aac',
        container: 'mkv',
        playedTicks: 90,
        totalTicks: 100,
      });

      const update = await service.processOutcome(outcome, client);

      expect(update?.result).toBe('success');
      expect(update?.persisted).toBe(true);
      expect(update?.changes.map(c => c.key)).toEqual(['hevc', 'aac', 'mkv']);

      const stored = await store.getClient('device-1');
      expect(stored?.codecConfidence.hevc).toBeCloseTo(0.512, 10);
      expect(stored?.codecConfidence.aac).toBeCloseTo(0.006, 10);
      expect(stored?.containerConfidence.mkv).toBeCloseTo(0.006, 10);
    });

    it('lowers video and audio confidence on an audio-triggered transcode', async () => {
      const client = makeClient('unknown', { codecConfidence: { h264: 0.5, dts: 0.5 } });
      const outcome = makeOutcome({
        videoCodec: 'h264',
        audioCodec: 'dts',
        playMethod: 'transcode',
        transcodeReasons: ['AudioCodecNotSupported'],
      });

      const update = await service.processOutcome(outcome, client);

      expect(update?.result).toBe('transcoded');
      expect(client.codecConfidence.h264).toBeCloseTo(0.4925, 10);
      expect(client.codecConfidence.dts).toBeCloseTo(0.4925, 10);
    });

    it('penalizes a session abandoned almost immediately', async () => {
      const client = makeClient('unknown', { codecConfidence: { av1: 0.5 } });
      const outcome = makeOutcome({ videoCodec: 'av1', playedTicks: 100, totalTicks: 100_000 });

      const update = await service.processOutcome(outcome, client);

      expect(update?.result).toBe('suspected-failure');
      expect(client.codecConfidence.av1).toBeCloseTo(0.488, 10);
    });

    it('leaves confidence untouched for an unresolved outcome', async () => {
      const client = makeClient('unknown', { codecConfidence: { h264: 0.5 } });

      const update = await service.processOutcome(makeOutcome({ videoCodec: 'h264' }), client);

      expect(update?.result).toBe('unknown');
      expect(update?.changes).toEqual([]);
      expect(client.codecConfidence.h264).toBe(0.5);
    });

    it('loses no increments under concurrent updates for one device', async () => {
      const client = makeClient('unknown', { codecConfidence: { h264: 0.5 } });
      await store.upsertClient(client);

      await Promise.all(
        Array.from({ length: 20 }, () =>
          service.processOutcome(makeOutcome({ videoCodec: 'h264', result: 'success' }), client),
        ),
      );

      const stored = await store.getClient('device-1');
      expect(stored?.codecConfidence.h264).toBeCloseTo(0.74, 10);
    });

    it('applies each step to the stored profile, not a stale copy', async () => {
      await store.upsertClient(makeClient('unknown', { codecConfidence: { h264: 0.5 } }));
      const first = makeClient('unknown', { codecConfidence: { h264: 0.5 } });
      const second = makeClient('unknown', { codecConfidence: { h264: 0.5 } });

      await Promise.all([
        service.processOutcome(makeOutcome({ videoCodec: 'h264', result: 'success' }), first),
        service.processOutcome(makeOutcome({ videoCodec: 'h264', result: 'success' }), second),
      ]);

      expect((await store.getClient('device-1'))?.codecConfidence.h264).toBeCloseTo(0.524, 10);
      expect(second.codecConfidence.h264).toBeCloseTo(0.524, 10);
    });

    it('keeps confidence within [0, 1] under repeated outcomes', async () => {
      const rising = makeClient('unknown', { codecConfidence: { h264: 0.99 } }, 'device-up');
      const falling = makeClient('unknown', { codecConfidence: { h264: 0.01 } }, 'device-down');

      for (let i = 0; i < 100; i++) {
        await service.processOutcome(
          makeOutcome({ deviceId: 'device-up', videoCodec: 'h264', result: 'success' }),
          rising,
        );
        await service.processOutcome(
          makeOutcome({ deviceId: 'device-down', videoCodec: 'h264', result: 'failure' }),
          falling,
        );
        expect(rising.codecConfidence.h264).toBeLessThanOrEqual(1);
        expect(falling.codecConfidence.h264).toBeGreaterThanOrEqual(0);
      }

      expect((await store.getClient('device-up'))?.codecConfidence.h264).toBe(1);
      expect((await store.getClient('device-down'))?.codecConfidence.h264).toBe(0);
    });

    it('emits an update event with the changes', async () => {
      const listener = vi.fn();
      events.on('learning:updated', listener);

      await service.processOutcome(
        makeOutcome({ videoCodec: 'h264', result: 'success' }),
        makeClient('unknown', { codecConfidence: { h264: 0.5 } }),
      );

      expect(listener).toHaveBeenCalledTimes(1);
      const [change] = listener.mock.calls[0][0].changes;
      expect(change.dimension).toBe('codec');
      expect(change.key).toBe('h264');
      expect(change.previous).toBe(0.5);
      expect(change.next).toBeCloseTo(0.512, 10);
    });

    it('reports a lost update when the store write fails', async () => {
      const failing = new LearningService({
        store: new FailingStore(),
        settings: { enabled: true, recalibrationWindow: 500 },
        events,
      });
      const lost = vi.fn();
      events.on('learning:update-lost', lost);

      const update = await failing.processOutcome(
        makeOutcome({ videoCodec: 'h264', result: 'success' }),
        makeClient('unknown', { codecConfidence: { h264: 0.5 } }),
      );

      expect(update?.persisted).toBe(false);
      expect(lost).toHaveBeenCalledTimes(1);
      const { error } = lost.mock.calls[0][0];
      expect(error).toBeInstanceOf(StoreError);
      expect(error.operation).toBe('upsertClient');
      expect(error.cause.message).toBe('disk full');
    });
  });

  describe('recalibrateClient', () => {
    it('blends the observed success rate into existing confidence', async () => {
      const client = makeClient('unknown', { codecConfidence: { hevc: 0.2 } });
      for (let i = 0; i < 10; i++) {
        await store.recordOutcome(makeOutcome({ videoCodec: 'hevc', result: 'success', timestamp: 1000 + i }));
      }

      const summary = await service.recalibrateClient(client);

      expect(summary.samples).toBe(10);
      expect(summary.persisted).toBe(true);
      expect(summary.changes).toHaveLength(1);
      expect(client.codecConfidence.hevc).toBeCloseTo(0.76, 10);
      expect((await store.getClient('device-1'))?.codecConfidence.hevc).toBeCloseTo(0.76, 10);
    });

    it('counts only direct-play successes as successes', async () => {
      const client = makeClient('unknown', { codecConfidence: { h264: 1 } });
      await store.recordOutcome(makeOutcome({ videoCodec: 'h264', result: 'success', timestamp: 1 }));
      await store.recordOutcome(makeOutcome({ videoCodec: 'h264', result: 'success', playMethod: 'direct-stream', timestamp: 2 }));
      await store.recordOutcome(makeOutcome({ videoCodec: 'h264', result: 'transcoded', playMethod: 'transcode', timestamp: 3 }));
      await store.recordOutcome(makeOutcome({ videoCodec: 'h264', result: 'failure', timestamp: 4 }));

      await service.recalibrateClient(client);

      // 0.3 × 1 + 0.7 × (1 / 4)
      expect(client.codecConfidence.h264).toBeCloseTo(0.475, 10);
    });

    it('classifies unresolved outcomes from their watched ticks', async () => {
      const client = makeClient('unknown', { codecConfidence: { hevc: 0 } });
      for (let i = 0; i < 3; i++) {
        await store.recordOutcome(makeOutcome({ videoCodec: 'hevc', playedTicks: 90, totalTicks: 100, timestamp: i }));
      }

      await service.recalibrateClient(client);

      expect(client.codecConfidence.hevc).toBeCloseTo(0.7, 10);
    });

    it('leaves keys with too few samples alone', async () => {
      const client = makeClient('unknown', { codecConfidence: { vp9: 0.4 } });
      await store.recordOutcome(makeOutcome({ videoCodec: 'vp9', result: 'success', timestamp: 1 }));
      await store.recordOutcome(makeOutcome({ videoCodec: 'vp9', result: 'success', timestamp: 2 }));

      const summary = await service.recalibrateClient(client);

      expect(summary.changes).toEqual([]);
      expect(client.codecConfidence.vp9).toBe(0.4);
      expect(await store.getClient('device-1')).toBeNull();
    });

    it('reads only the configured window of recent outcomes', async () => {
      service.updateSettings({ enabled: true, recalibrationWindow: 3 });
      const client = makeClient('unknown');
      await store.recordOutcome(makeOutcome({ container: 'mp4', result: 'failure', timestamp: 1 }));
      for (let i = 0; i < 3; i++) {
        await store.recordOutcome(makeOutcome({ container: 'mp4', result: 'success', timestamp: 10 + i }));
      }

      const summary = await service.recalibrateClient(client);

      expect(summary.samples).toBe(3);
      expect(client.containerConfidence.mp4).toBeCloseTo(0.7, 10);
    });

    it('ignores other devices', async () => {
      const client = makeClient('unknown', {}, 'device-2');
      for (let i = 0; i < 5; i++) {
        await store.recordOutcome(makeOutcome({ videoCodec: 'h264', result: 'success', timestamp: i }));
      }

      const summary = await service.recalibrateClient(client);

      expect(summary.samples).toBe(0);
      expect(summary.changes).toEqual([]);
    });
  });
});
