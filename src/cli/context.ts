import { resolve } from 'path';
import type { Command } from 'commander';
import { ConfigManager } from '../core/config.js';
import { createLogger, setLogger, type Logger } from '../core/logger.js';
import type { VoiceKitConfig } from '../core/types.js';

export interface CliContext {
  config: VoiceKitConfig;
  logger: Logger;
}

/** Load config for a project directory and install the process logger. */
export function loadContext(dir: string, command: Command): CliContext {
  const verbose = command.optsWithGlobals().verbose === true;
  const config = new ConfigManager(resolve(dir)).load(verbose ? { ui: { verbose } } : undefined);
  const logger = createLogger('voicekit', config.ui.verbose);
  setLogger(logger);
  return { config, logger };
}
