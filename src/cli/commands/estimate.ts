import { Command } from 'commander';
import { scoreTranscodeCost, estimateTranscodeCost } from '../../cost/estimator.js';
import { MediaInputSchema, parseJsonOption } from '../input.js';

export function createEstimateCommand(): Command {
  const cmd = new Command('estimate');

  cmd
    .description('Estimate the transcode cost tier of a media source')
    .requiredOption('--media <json>', 'Media characteristics as JSON')
    .option('--json', 'Output as JSON')
    .action((options: { media: string; json?: boolean }) => {
      const media = parseJsonOption('--media', options.media, MediaInputSchema);
      const breakdown = scoreTranscodeCost(media);
      const tier = estimateTranscodeCost(media);

      if (options.json) {
        console.log(JSON.stringify({ tier, breakdown }, null, 2));
        return;
      }
      console.log(tier);
    });

  return cmd;
}
