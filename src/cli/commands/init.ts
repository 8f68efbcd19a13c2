/**
 * `voicekit init` — write the default global config if none exists.
 */

import { Command } from 'commander';
import { ConfigManager } from '../../core/config.js';

export function createInitCommand(): Command {
  const cmd = new Command('init');

  cmd
    .description('Create ~/.voicekit/config.yaml with default settings')
    .action(() => {
      const path = new ConfigManager().createDefaultConfig();
      console.log(`Config: ${path}`);
    });

  return cmd;
}
