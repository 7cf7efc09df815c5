import { Command } from 'commander';
import { loadConfig, withAdvisor } from '../context.js';

export function createPruneCommand(): Command {
  const cmd = new Command('prune');

  cmd
    .description('Delete playback outcomes older than the retention window')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--db <path>', 'SQLite database (overrides storage.path)')
    .option('--days <count>', 'Retention window in days (overrides telemetry.retentionDays)')
    .action(async (options: { dir: string; db?: string; days?: string }) => {
      const config = loadConfig(options, {
        telemetry: { retentionDays: options.days === undefined ? undefined : Number(options.days) },
      });
      const removed = await withAdvisor(config, (advisor) => advisor.prune());
      console.log(`  Removed ${removed} outcome(s) older than ${config.telemetry.retentionDays} days`);
    });

  return cmd;
}
