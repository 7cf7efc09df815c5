import { Command } from 'commander';
import { ConfigManager } from '../../core/config.js';

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description('Write a default global config.yaml if none exists')
    .option('--config-dir <directory>', 'Global config directory (default: ~/.playwise)')
    .action((options: { configDir?: string }) => {
      const manager = new ConfigManager({ globalDir: options.configDir });
      const configPath = manager.createDefaultConfig();
      console.log(`  Config: ${configPath}`);
    });

  return cmd;
}
