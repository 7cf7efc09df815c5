/**
 * Baseline confidence per client category, seeded into a profile the first
 * time the device is seen. Loaded once from data/baseline-confidence.json.
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ClientCategory, ClientProfile, ConfidenceMap } from '../models/types.js';
import { ConfigError, toError } from '../core/errors.js';
import { firstExisting, readJsonSync } from '../utils/fs.js';

const BASELINE_FILE = 'baseline-confidence.json';

/** Source tree (src/clients) and build output (dist/src/clients) */
const CANDIDATE_DIRS = ['../../data/', '../../../data/'];

const ConfidenceMapSchema = z.record(z.number().min(0).max(1));

const BaselineFileSchema = z.object({
  categories: z.record(z.string()),
  profiles: z.record(z.object({
    codecs: ConfidenceMapSchema,
    containers: ConfidenceMapSchema,
  })),
});

export interface BaselineConfidence {
  codecs: Readonly<ConfidenceMap>;
  containers: Readonly<ConfidenceMap>;
}

export type BaselineTable = Record<ClientCategory, BaselineConfidence>;

let cached: BaselineTable | null = null;

function locateBaselineFile(): string {
  const path = firstExisting(
    CANDIDATE_DIRS.map((dir) => fileURLToPath(new URL(dir + BASELINE_FILE, import.meta.url))),
  );
  if (!path) {
    throw new ConfigError(`Baseline confidence table ${BASELINE_FILE} not found`);
  }
  return path;
}

/**
 * Parse and validate a baseline table. Every category must resolve to a
 * declared profile.
 */
export function parseBaselineTable(raw: unknown): BaselineTable {
  const parsed = BaselineFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid baseline confidence table: ${parsed.error.message}`);
  }

  const { categories, profiles } = parsed.data;
  const pick = (category: ClientCategory): BaselineConfidence => {
    const profileName = categories[category];
    const profile = profileName === undefined ? undefined : profiles[profileName];
    if (!profile) {
      throw new ConfigError(`Baseline confidence table has no profile for category '${category}'`);
    }
    return { codecs: profile.codecs, containers: profile.containers };
  };

  return {
    'unknown': pick('unknown'),
    'web-browser': pick('web-browser'),
    'android-tv': pick('android-tv'),
    'android-mobile': pick('android-mobile'),
    'roku': pick('roku'),
    'fire-tv': pick('fire-tv'),
    'apple-mobile': pick('apple-mobile'),
    'apple-tv': pick('apple-tv'),
    'desktop': pick('desktop'),
    'xbox': pick('xbox'),
    'kodi': pick('kodi'),
    'dlna': pick('dlna'),
  };
}

export function loadBaselineTable(): BaselineTable {
  if (cached) return cached;

  const path = locateBaselineFile();
  let raw: unknown;
  try {
    raw = readJsonSync(path);
  } catch (err) {
    throw new ConfigError(`Failed to read ${path}`, toError(err));
  }

  cached = parseBaselineTable(raw);
  return cached;
}

export function baselineFor(category: ClientCategory): BaselineConfidence {
  return loadBaselineTable()[category];
}

/**
 * Fill in baseline confidence for keys the profile does not have yet.
 * Learned values are never overwritten. Returns the number of keys added.
 */
export function seedBaselineConfidence(profile: ClientProfile, table: BaselineTable = loadBaselineTable()): number {
  const baseline = table[profile.category];
  let added = 0;

  for (const [key, value] of Object.entries(baseline.codecs)) {
    if (!Object.prototype.hasOwnProperty.call(profile.codecConfidence, key)) {
      profile.codecConfidence[key] = value;
      added++;
    }
  }

  for (const [key, value] of Object.entries(baseline.containers)) {
    if (!Object.prototype.hasOwnProperty.call(profile.containerConfidence, key)) {
      profile.containerConfidence[key] = value;
      added++;
    }
  }

  return added;
}
