import type { ClientProfile, MediaCharacteristics } from '../models/types.js';
import { capabilitiesOf, TEN_BIT_UNSUPPORTED_CODECS } from './category-table.js';
import { videoCodecOf } from './media-facts.js';
import { finding, type PlaybackRule, type RuleFinding } from './types.js';

/**
 * Bit depth incompatibilities. 10-bit H.264 (Hi10P) has no hardware decoder
 * on any mainstream client; 12-bit video is rare outside software players.
 */
export class BitDepthCompatibilityRule implements PlaybackRule {
  readonly name = 'BitDepthCompatibility';

  evaluate(client: Readonly<ClientProfile>, media: Readonly<MediaCharacteristics>): RuleFinding | null {
    const depth = media.videoBitDepth;
    if (depth === undefined || depth <= 8) {
      return null;
    }

    const codec = videoCodecOf(media);
    if (codec !== undefined && TEN_BIT_UNSUPPORTED_CODECS.includes(codec) && depth >= 10) {
      return finding({
        ruleName: 'BitDepth:H264Hi10P',
        directPlay: 'deny',
        transcoding: 'allow',
        severity: 'require',
        rationale: 'H.264 Hi10P (10-bit) has no hardware decoder support on any mainstream client. Transcode required.',
      });
    }

    if (depth >= 12 && !capabilitiesOf(client.category).softwareDecode12Bit) {
      return finding({
        ruleName: 'BitDepth:12Bit',
        directPlay: 'deny',
        transcoding: 'allow',
        severity: 'recommend',
        rationale: '12-bit video has very limited client support. Transcode recommended.',
      });
    }

    return null;
  }
}
