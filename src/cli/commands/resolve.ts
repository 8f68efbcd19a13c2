/**
 * `voicekit resolve` — resolve a phrase to an action without any audio.
 */

import { Command } from 'commander';
import { loadContext } from '../context.js';
import { createLanguageModel, createResolver } from '../../voice-kit.js';
import { ActionDispatcher } from '../../resolver/action-dispatcher.js';
import { toError } from '../../core/errors.js';

interface ResolveOptions {
  dir: string;
  offline?: boolean;
  json?: boolean;
}

export function createResolveCommand(): Command {
  const cmd = new Command('resolve');

  cmd
    .description('Resolve a spoken or typed phrase to FOLLOW, STOP, JUMP, IDLE or BACKOFF')
    .argument('<phrase...>', 'Command phrase')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--offline', 'Skip the remote language-model fallback')
    .option('--json', 'Output as JSON')
    .action(async (words: string[], options: ResolveOptions, command: Command) => {
      await runResolve(words.join(' '), options, command);
    });

  return cmd;
}

async function runResolve(phrase: string, options: ResolveOptions, command: Command): Promise<void> {
  const { config, logger } = loadContext(options.dir, command);
  const provider = options.offline ? undefined : createLanguageModel(config, logger);
  const resolver = createResolver(config, { provider, logger });
  const dispatcher = new ActionDispatcher({}, { logger });

  let output: { phrase: string; action: string; tier: string; error?: string };
  try {
    const resolution = await resolver.resolve(phrase);
    output = { phrase: resolution.key, action: dispatcher.dispatch(resolution.action), tier: resolution.tier };
  } catch (err) {
    const error = toError(err);
    output = { phrase, action: dispatcher.dispatchFailure(error), tier: 'default', error: error.message };
  }

  if (options.json) {
    console.log(JSON.stringify(output, null, 2));
    return;
  }
  console.log(`${output.action}  (${output.tier})`);
  if (output.error) {
    console.log(`  ${output.error}`);
  }
}
