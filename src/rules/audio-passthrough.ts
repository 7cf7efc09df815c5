import type { ClientProfile, MediaCharacteristics } from '../models/types.js';
import { capabilitiesOf, LOSSLESS_AUDIO_CODECS } from './category-table.js';
import { audioCodecOf } from './media-facts.js';
import { finding, type PlaybackRule, type RuleFinding } from './types.js';

/**
 * Audio codecs a client can neither decode nor pass through to a receiver.
 * Findings only open up transcoding; video is left alone so the engine can
 * settle for an audio-only transcode.
 */
export class AudioPassthroughRule implements PlaybackRule {
  readonly name = 'AudioPassthrough';

  evaluate(client: Readonly<ClientProfile>, media: Readonly<MediaCharacteristics>): RuleFinding | null {
    const codec = audioCodecOf(media);
    if (codec === undefined) {
      return null;
    }

    const capabilities = capabilitiesOf(client.category);
    const restriction = capabilities.audio;

    if (restriction) {
      if (!restriction.codecs.includes(codec)) {
        return null;
      }
      return finding({
        ruleName: restriction.label,
        transcoding: 'allow',
        severity: restriction.severity,
        rationale: restriction.rationale(codec),
      });
    }

    if (capabilities.losslessAudioPassthrough || !LOSSLESS_AUDIO_CODECS.includes(codec)) {
      return null;
    }

    return finding({
      ruleName: 'Audio:Generic:LosslessUnsupported',
      transcoding: 'allow',
      severity: 'suggest',
      rationale: `Lossless audio '${codec}' may not be supported. Audio transcode available as fallback.`,
    });
  }
}
