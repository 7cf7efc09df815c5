import type { ClientProfile, MediaCharacteristics } from '../models/types.js';
import { capabilitiesOf } from './category-table.js';
import { formatMbps } from './media-facts.js';
import { finding, type PlaybackRule, type RuleFinding } from './types.js';

/**
 * Default bandwidth ceilings for client categories that are usually on
 * constrained links (phones, Roku over Wi-Fi, DLNA renderers).
 */
export class BitrateCapRule implements PlaybackRule {
  readonly name = 'BitrateCap';

  evaluate(client: Readonly<ClientProfile>, media: Readonly<MediaCharacteristics>): RuleFinding | null {
    const bitrate = media.bitrate;
    if (bitrate === undefined) {
      return null;
    }

    const capabilities = capabilitiesOf(client.category);
    const cap = capabilities.defaultBitrateCap;
    if (cap === undefined || bitrate <= cap) {
      return null;
    }

    return finding({
      ruleName: `BitrateCap:${capabilities.label}`,
      transcoding: 'allow',
      bitrateCap: cap,
      severity: 'suggest',
      rationale: `Media bitrate ${formatMbps(bitrate)} exceeds ${capabilities.label} default cap of ${formatMbps(cap)}.`,
    });
  }
}
