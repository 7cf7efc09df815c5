/**
 * `playwise evaluate` — compute a policy for one client + media pair.
 */

import { Command } from 'commander';
import { createClientProfile } from '../../models/policy.js';
import { resolveClientCategory } from '../../clients/classifier.js';
import { seedBaselineConfidence } from '../../clients/baseline.js';
import { withCostEstimate } from '../../cost/estimator.js';
import { DecisionEngine } from '../../decision/engine.js';
import { ClientInputSchema, MediaInputSchema, parseJsonOption } from '../input.js';
import { loadConfig } from '../context.js';

interface EvaluateOptions {
  dir: string;
  client: string;
  media: string;
  baseline: boolean;
  dynamic?: boolean;
  conservative: boolean;
  json?: boolean;
}

export function createEvaluateCommand(): Command {
  const cmd = new Command('evaluate');

  cmd
    .description('Compute the advisory playback policy for a client and a media source')
    .requiredOption('--client <json>', 'Client profile as JSON')
    .requiredOption('--media <json>', 'Media characteristics as JSON')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--no-baseline', 'Do not seed baseline confidence for the client category')
    .option('--dynamic', 'Evaluate as if dynamic policies were enabled')
    .option('--no-conservative', 'Evaluate with conservative mode off')
    .option('--json', 'Output as JSON')
    .action((options: EvaluateOptions) => {
      evaluate(options);
    });

  return cmd;
}

function evaluate(options: EvaluateOptions): void {
  const config = loadConfig(options, {
    policy: {
      enableDynamicPolicies: options.dynamic ? true : undefined,
      conservativeMode: options.conservative ? undefined : false,
    },
  });

  const input = parseJsonOption('--client', options.client, ClientInputSchema);
  const category = input.category ?? resolveClientCategory(input);
  const client = createClientProfile(input.deviceId, category, {
    clientName: input.clientName ?? '',
    clientVersion: input.clientVersion ?? '',
    deviceName: input.deviceName ?? '',
    codecConfidence: input.codecConfidence,
    containerConfidence: input.containerConfidence,
    maxBitrate: input.maxBitrate,
  });
  if (options.baseline) {
    seedBaselineConfidence(client);
  }

  const media = withCostEstimate(parseJsonOption('--media', options.media, MediaInputSchema));
  const engine = new DecisionEngine({ settings: config.policy });
  const policy = engine.computePolicy(client, media);

  if (options.json) {
    console.log(JSON.stringify({ category, cost: media.transcodeCostEstimate, policy }, null, 2));
    return;
  }

  console.log();
  console.log(`  Client:        ${client.deviceId} (${category})`);
  console.log(`  Cost tier:     ${media.transcodeCostEstimate ?? 'n/a'}`);
  console.log('  ' + '─'.repeat(40));
  console.log(`  Direct play:   ${policy.allowDirectPlay ? 'allowed' : 'disallowed'}`);
  console.log(`  Direct stream: ${policy.allowDirectStream ? 'allowed' : 'disallowed'}`);
  console.log(`  Transcoding:   ${policy.allowTranscoding ? 'allowed' : 'disallowed'}`);
  console.log(`  Bitrate cap:   ${policy.bitrateCap ?? 'none'}`);
  console.log(`  Confidence:    ${policy.confidence.toFixed(2)}`);
  console.log();
  for (const line of policy.reasoning.split('\n')) {
    console.log(`    ${line}`);
  }
  console.log();
}
