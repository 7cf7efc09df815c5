/**
 * ClientRegistry — resolves session descriptors to persisted client profiles.
 *
 * Lookup order is cache, then store, then a fresh profile. Identity fields
 * and the category are refreshed from the descriptor on every cache miss;
 * confidence maps are only ever extended with baseline values.
 */

import type { ClientDescriptor, ClientProfile } from '../models/types.js';
import type { PolicyDataStore } from '../store/types.js';
import { createClientProfile } from '../models/policy.js';
import { getLogger } from '../core/logger.js';
import { LruCache } from '../utils/lru-cache.js';
import { resolveClientCategory } from './classifier.js';
import { loadBaselineTable, seedBaselineConfidence, type BaselineTable } from './baseline.js';

export interface ClientRegistryOptions {
  store: PolicyDataStore;
  /** Max cached profiles (default: 1000) */
  maxCached?: number;
  /** Override the baseline table, mainly for tests */
  baseline?: BaselineTable;
}

export class ClientRegistry {
  private logger = getLogger();
  private readonly store: PolicyDataStore;
  private readonly cache: LruCache<ClientProfile>;
  private readonly baseline?: BaselineTable;

  constructor(options: ClientRegistryOptions) {
    this.store = options.store;
    this.cache = new LruCache<ClientProfile>(options.maxCached ?? 1000);
    this.baseline = options.baseline;
  }

  /**
   * Resolve, refresh, seed and persist the profile for a descriptor.
   * Repeat calls for a cached device return the same instance.
   */
  async resolve(descriptor: ClientDescriptor): Promise<ClientProfile> {
    const cached = this.cache.get(descriptor.deviceId);
    if (cached) return cached;

    const now = Date.now();
    const stored = await this.store.getClient(descriptor.deviceId);
    const profile = stored ?? createClientProfile(descriptor.deviceId, 'unknown', { firstSeen: now });

    profile.category = resolveClientCategory(descriptor);
    profile.clientName = descriptor.clientName ?? '';
    profile.clientVersion = descriptor.clientVersion ?? '';
    profile.deviceName = descriptor.deviceName ?? '';
    profile.userAgent = descriptor.userAgent ?? profile.userAgent;
    profile.maxBitrate = descriptor.maxBitrate ?? profile.maxBitrate;
    profile.lastUpdated = now;

    seedBaselineConfidence(profile, this.baseline ?? loadBaselineTable());

    await this.store.upsertClient(profile);
    this.cache.set(descriptor.deviceId, profile);

    this.logger.debug(
      {
        deviceId: profile.deviceId,
        category: profile.category,
        clientName: profile.clientName,
        clientVersion: profile.clientVersion,
      },
      'Resolved client',
    );

    return profile;
  }

  /** Cached profile, without touching the store */
  getCached(deviceId: string): ClientProfile | undefined {
    return this.cache.get(deviceId);
  }

  /**
   * Cached profile if present, else the stored one. Does not classify or seed.
   */
  async get(deviceId: string): Promise<ClientProfile | null> {
    return this.cache.get(deviceId) ?? this.store.getClient(deviceId);
  }

  invalidate(deviceId: string): boolean {
    return this.cache.delete(deviceId);
  }

  invalidateAll(): void {
    this.cache.clear();
  }

  get cachedCount(): number {
    return this.cache.size;
  }
}
