/**
 * JSON argument parsing for the CLI. Inputs are validated with zod and
 * rejected with a ConfigError naming the offending option.
 */

import { z } from 'zod';
import type { ClientCategory } from '../models/types.js';
import { isClientCategory } from '../models/policy.js';
import { ConfigError, toError } from '../core/errors.js';

const ConfidenceInputSchema = z.record(z.number().min(0).max(1))
  .transform((map) => Object.fromEntries(Object.entries(map).map(([k, v]) => [k.trim().toLowerCase(), v])));

export const ClientInputSchema = z.object({
  deviceId: z.string().min(1).default('cli'),
  category: z.custom<ClientCategory>((value) => typeof value === 'string' && isClientCategory(value), {
    message: 'Unknown client category',
  }).optional(),
  clientName: z.string().optional(),
  clientVersion: z.string().optional(),
  deviceName: z.string().optional(),
  codecConfidence: ConfidenceInputSchema.default({}),
  containerConfidence: ConfidenceInputSchema.default({}),
  maxBitrate: z.number().int().positive().optional(),
});

export type ClientInput = z.infer<typeof ClientInputSchema>;

export const MediaInputSchema = z.object({
  mediaSourceId: z.string().optional(),
  itemId: z.string().optional(),
  videoCodec: z.string().optional(),
  audioCodec: z.string().optional(),
  container: z.string().optional(),
  bitrate: z.number().nonnegative().optional(),
  width: z.number().int().nonnegative().optional(),
  height: z.number().int().nonnegative().optional(),
  videoBitDepth: z.number().int().positive().optional(),
  videoProfile: z.string().optional(),
  videoRangeType: z.string().optional(),
  audioChannels: z.number().int().nonnegative().optional(),
  hasImageSubtitles: z.boolean().optional(),
  hasTextSubtitles: z.boolean().optional(),
  transcodeCostEstimate: z.enum(['remux', 'low', 'medium', 'high', 'extreme']).optional(),
});

export type MediaInput = z.infer<typeof MediaInputSchema>;

export function parseJsonOption<S extends z.ZodTypeAny>(option: string, text: string, schema: S): z.infer<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${option}: not valid JSON`, toError(err));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`${option}: ${issues}`, parsed.error);
  }
  return parsed.data;
}
