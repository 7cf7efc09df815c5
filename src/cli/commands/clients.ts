import { Command } from 'commander';
import { loadConfig, withAdvisor } from '../context.js';

export function createClientsCommand(): Command {
  const cmd = new Command('clients');

  cmd
    .description('List stored client profiles')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--db <path>', 'SQLite database (overrides storage.path)')
    .option('--json', 'Output as JSON')
    .action(async (options: { dir: string; db?: string; json?: boolean }) => {
      const config = loadConfig(options);
      const clients = await withAdvisor(config, (advisor) => advisor.listClients());

      if (options.json) {
        console.log(JSON.stringify(clients, null, 2));
        return;
      }

      if (clients.length === 0) {
        console.log('  No clients recorded yet.');
        return;
      }

      for (const client of clients) {
        const seen = new Date(client.lastUpdated).toISOString();
        const codecs = Object.keys(client.codecConfidence).length;
        const containers = Object.keys(client.containerConfidence).length;
        console.log(
          `  ${client.deviceId.padEnd(24)} ${client.category.padEnd(15)} ${client.clientName || '—'}` +
          `  (${codecs} codecs, ${containers} containers, last seen ${seen})`,
        );
      }
    });

  return cmd;
}
