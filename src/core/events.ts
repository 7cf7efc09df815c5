import { EventEmitter } from 'eventemitter3';
import type { InterventionRecord, PlaybackOutcome, PlaybackResult } from '../models/types.js';
import type { StoreError } from './errors.js';

export type ConfidenceDimension = 'codec' | 'container';

export interface ConfidenceChange {
  dimension: ConfidenceDimension;
  key: string;
  previous?: number;
  next: number;
}

export interface PlaywiseEvents {
  'telemetry:playback:started': { timestamp: number; outcome: PlaybackOutcome };
  'telemetry:playback:stopped': { timestamp: number; outcome: PlaybackOutcome };
  'telemetry:intervention': { timestamp: number; record: InterventionRecord };
  'telemetry:pruned': { timestamp: number; olderThan: number; removed: number };
  'learning:updated': { timestamp: number; deviceId: string; result: PlaybackResult; changes: ConfidenceChange[] };
  'learning:recalibrated': { timestamp: number; deviceId: string; samples: number; changes: ConfidenceChange[] };
  'learning:update-lost': { timestamp: number; deviceId: string; error: StoreError };
}

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof PlaywiseEvents>(event: K, listener: (data: PlaywiseEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof PlaywiseEvents>(event: K, listener: (data: PlaywiseEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof PlaywiseEvents>(event: K, listener: (data: PlaywiseEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof PlaywiseEvents>(event: K, data: PlaywiseEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: keyof PlaywiseEvents): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
