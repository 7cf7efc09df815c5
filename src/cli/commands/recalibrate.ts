import { Command } from 'commander';
import { loadConfig, withAdvisor } from '../context.js';

export function createRecalibrateCommand(): Command {
  const cmd = new Command('recalibrate');

  cmd
    .description('Recompute a client\'s confidence from its recent playback history')
    .argument('<deviceId>', 'Device identifier')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--db <path>', 'SQLite database (overrides storage.path)')
    .option('--json', 'Output as JSON')
    .action(async (deviceId: string, options: { dir: string; db?: string; json?: boolean }) => {
      const config = loadConfig(options);
      const summary = await withAdvisor(config, (advisor) => advisor.recalibrate(deviceId));

      if (!summary) {
        throw new Error(`Unknown device: ${deviceId}`);
      }

      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      console.log(`  ${deviceId}: ${summary.samples} outcomes, ${summary.changes.length} confidence values updated`);
      for (const change of summary.changes) {
        const previous = change.previous === undefined ? '—' : change.previous.toFixed(2);
        console.log(`    ${change.dimension.padEnd(9)} ${change.key.padEnd(12)} ${previous} → ${change.next.toFixed(2)}`);
      }
    });

  return cmd;
}
