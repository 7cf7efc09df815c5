import type { ClientProfile, MediaCharacteristics } from '../models/types.js';
import { capabilitiesOf, type ContainerCodecEntry } from './category-table.js';
import { containerOf, videoCodecOf } from './media-facts.js';
import { finding, type PlaybackRule, type RuleFinding } from './types.js';

function matches(entry: ContainerCodecEntry, container: string, codec: string): boolean {
  if (entry.containers && !entry.containers.includes(container)) return false;
  if (entry.codecs && !entry.codecs.includes(codec)) return false;
  if (entry.exceptContainers && entry.exceptContainers.includes(container)) return false;
  return true;
}

/**
 * Known container and container+codec incompatibilities per client category.
 * A container problem is fixed by remuxing; a codec problem needs a transcode.
 */
export class ContainerCodecCompatibilityRule implements PlaybackRule {
  readonly name = 'ContainerCodecCompatibility';

  evaluate(client: Readonly<ClientProfile>, media: Readonly<MediaCharacteristics>): RuleFinding | null {
    const container = containerOf(media);
    const codec = videoCodecOf(media);
    if (container === undefined || codec === undefined) {
      return null;
    }

    // First matching row wins; rows are ordered most specific first
    const entry = capabilitiesOf(client.category).containerCodec
      .find(candidate => matches(candidate, container, codec));
    if (!entry) {
      return null;
    }

    const remux = entry.remedy === 'remux';
    return finding({
      ruleName: entry.label,
      directPlay: 'deny',
      directStream: remux ? 'allow' : 'abstain',
      transcoding: remux ? 'abstain' : 'allow',
      severity: entry.severity,
      rationale: entry.rationale(container, codec),
    });
  }
}
