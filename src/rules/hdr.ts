import type { ClientProfile, MediaCharacteristics } from '../models/types.js';
import { capabilitiesOf } from './category-table.js';
import { isDolbyVision, isHdr } from './media-facts.js';
import { finding, type PlaybackRule, type RuleFinding } from './types.js';

/**
 * HDR and Dolby Vision content on clients without a matching display
 * pipeline. Tone-mapping is expensive, so the finding always says so.
 */
export class HdrCompatibilityRule implements PlaybackRule {
  readonly name = 'HdrCompatibility';

  evaluate(client: Readonly<ClientProfile>, media: Readonly<MediaCharacteristics>): RuleFinding | null {
    if (!isHdr(media)) {
      return null;
    }

    const support = capabilitiesOf(client.category).hdr;
    const verdict = isDolbyVision(media) ? support.dolbyVision : support.hdr;
    if (!verdict) {
      return null;
    }

    return finding({
      ruleName: verdict.label,
      directPlay: 'deny',
      transcoding: 'allow',
      severity: verdict.severity,
      rationale: verdict.rationale(media.videoRangeType ?? 'HDR'),
    });
  }
}
