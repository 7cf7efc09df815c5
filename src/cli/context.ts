import { resolve } from 'path';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger } from '../core/logger.js';
import type { PlaywiseConfig, PlaywiseConfigInput } from '../core/types.js';
import { PlaybackAdvisor } from '../advisor/advisor.js';

export interface CommonOptions {
  dir: string;
  db?: string;
}

/**
 * Load configuration for a command and install the configured logger.
 */
export function loadConfig(options: CommonOptions, overrides: PlaywiseConfigInput = {}): PlaywiseConfig {
  const manager = new ConfigManager({ projectDir: resolve(options.dir) });
  const config = manager.load({
    ...overrides,
    storage: options.db ? { path: resolve(options.db) } : overrides.storage,
  });

  setLogger(createLogger('playwise', {
    level: config.logging.level,
    verbose: config.logging.verbose,
    file: config.logging.file,
  }));

  return config;
}

/**
 * Run a command against an advisor, closing its store afterwards.
 */
export async function withAdvisor<T>(config: PlaywiseConfig, fn: (advisor: PlaybackAdvisor) => Promise<T>): Promise<T> {
  const advisor = new PlaybackAdvisor({ config });
  try {
    return await fn(advisor);
  } finally {
    await advisor.close();
  }
}
