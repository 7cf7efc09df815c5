import { z } from 'zod';

// ===== Configuration =====

export const PlaywiseConfigSchema = z.object({
  policy: z.object({
    /**
     * When false the advisor only observes: policies are still computed and
     * recorded as dry-run interventions, but the host should not apply them.
     */
    enableDynamicPolicies: z.boolean().default(false),
    /** Defer to host defaults on any uncertain decision */
    conservativeMode: z.boolean().default(true),
    /** Global bitrate ceiling in bits/sec; takes precedence over the client's own */
    globalMaxBitrateOverride: z.number().int().positive().optional(),
  }).default({}),
  learning: z.object({
    enabled: z.boolean().default(false),
    /** How many of a device's most recent outcomes recalibration reads */
    recalibrationWindow: z.number().int().min(1).max(10_000).default(500),
  }).default({}),
  telemetry: z.object({
    retentionDays: z.number().int().min(1).default(90),
  }).default({}),
  storage: z.object({
    /** SQLite database file; an in-memory store is used when absent */
    path: z.string().optional(),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    verbose: z.boolean().default(false),
    file: z.string().optional(),
  }).default({}),
});

export type PlaywiseConfig = z.infer<typeof PlaywiseConfigSchema>;

/** Raw, pre-validation shape accepted as overrides */
export type PlaywiseConfigInput = z.input<typeof PlaywiseConfigSchema>;

export type PolicySettings = PlaywiseConfig['policy'];
export type LearningSettings = PlaywiseConfig['learning'];
export type TelemetrySettings = PlaywiseConfig['telemetry'];

/**
 * Fully-defaulted configuration, optionally with overrides applied.
 */
export function defaultConfig(overrides: PlaywiseConfigInput = {}): PlaywiseConfig {
  return PlaywiseConfigSchema.parse(overrides);
}
