import { readFileSync, existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { PlaywiseConfigSchema, type PlaywiseConfig, type PlaywiseConfigInput } from './types.js';
import { ConfigError, toError } from './errors.js';
import { ensureDirSync } from '../utils/fs.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface ConfigManagerOptions {
  /** Directory holding the project-level `.playwise.yaml` */
  projectDir?: string;
  /** Directory holding the global `config.yaml` */
  globalDir?: string;
  /** Environment to read overrides from */
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigManagerOptions = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.playwise');
    this.projectDir = options.projectDir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: PlaywiseConfigInput): PlaywiseConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.playwise.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, { ...overrides });
    }

    const parsed = PlaywiseConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${issues}`, parsed.error);
    }

    return parsed.data;
  }

  /**
   * Create default global config if it doesn't exist
   */
  createDefaultConfig(): string {
    ensureDirSync(this.globalDir);
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(configPath)) {
      const defaultConfig = `# Playwise configuration
policy:
  # Observe only until this is switched on
  enableDynamicPolicies: false
  conservativeMode: true
  # globalMaxBitrateOverride: 40000000

learning:
  enabled: false
  recalibrationWindow: 500

telemetry:
  retentionDays: 90

# storage:
#   path: ~/.playwise/playwise.db
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
    return configPath;
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) {
      return {};
    }
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const env = this.env;
    const policy: RawConfig = isRecord(raw.policy) ? { ...raw.policy } : {};
    const learning: RawConfig = isRecord(raw.learning) ? { ...raw.learning } : {};
    const telemetry: RawConfig = isRecord(raw.telemetry) ? { ...raw.telemetry } : {};
    const storage: RawConfig = isRecord(raw.storage) ? { ...raw.storage } : {};
    const logging: RawConfig = isRecord(raw.logging) ? { ...raw.logging } : {};

    if (env.PLAYWISE_DYNAMIC_POLICIES !== undefined) {
      policy.enableDynamicPolicies = this.parseBoolean(env.PLAYWISE_DYNAMIC_POLICIES);
    }
    if (env.PLAYWISE_CONSERVATIVE_MODE !== undefined) {
      policy.conservativeMode = this.parseBoolean(env.PLAYWISE_CONSERVATIVE_MODE);
    }
    if (env.PLAYWISE_MAX_BITRATE) {
      policy.globalMaxBitrateOverride = Number(env.PLAYWISE_MAX_BITRATE);
    }
    if (env.PLAYWISE_LEARNING !== undefined) {
      learning.enabled = this.parseBoolean(env.PLAYWISE_LEARNING);
    }
    if (env.PLAYWISE_RETENTION_DAYS) {
      telemetry.retentionDays = Number(env.PLAYWISE_RETENTION_DAYS);
    }
    if (env.PLAYWISE_DB_PATH) {
      storage.path = env.PLAYWISE_DB_PATH;
    }
    if (env.PLAYWISE_LOG_LEVEL) {
      logging.level = env.PLAYWISE_LOG_LEVEL;
    }

    return { ...raw, policy, learning, telemetry, storage, logging };
  }

  private parseBoolean(value: string): boolean {
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (incoming === undefined) continue;
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}
