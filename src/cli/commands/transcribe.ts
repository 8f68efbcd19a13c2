/**
 * `voicekit transcribe` — send a WAV file through speech-to-text and,
 * unless disabled, resolve the transcript to an action.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { loadContext } from '../context.js';
import { createLanguageModel, createResolver, createTranscriber } from '../../voice-kit.js';
import { decodeWav, encodeWav } from '../../capture/wav.js';
import { ActionDispatcher } from '../../resolver/action-dispatcher.js';
import { TranscriptionError, toError } from '../../core/errors.js';

interface TranscribeOptions {
  dir: string;
  resolve: boolean;
  offline?: boolean;
}

export function createTranscribeCommand(): Command {
  const cmd = new Command('transcribe');

  cmd
    .description('Transcribe a PCM16 WAV file and resolve it to an action')
    .argument('<file>', 'Path to a .wav file')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--no-resolve', 'Print the transcript only')
    .option('--offline', 'Skip the remote language-model fallback when resolving')
    .action(async (file: string, options: TranscribeOptions, command: Command) => {
      await runTranscribe(resolve(file), options, command);
    });

  return cmd;
}

async function runTranscribe(file: string, options: TranscribeOptions, command: Command): Promise<void> {
  const { config, logger } = loadContext(options.dir, command);

  // re-encode so the upload is always the canonical 44-byte layout
  const clip = decodeWav(readFileSync(file));
  const text = await createTranscriber(config, logger).transcribe({
    audio: encodeWav(clip),
    sampleRate: clip.sampleRate,
    channels: clip.channels,
    language: config.transcription.language,
  });

  if (!text) {
    throw new TranscriptionError('Empty transcription');
  }
  console.log(`Transcript: ${text}`);
  if (!options.resolve) return;

  const provider = options.offline ? undefined : createLanguageModel(config, logger);
  const resolver = createResolver(config, { provider, logger });
  const dispatcher = new ActionDispatcher({}, { logger });
  try {
    const resolution = await resolver.resolve(text);
    console.log(`Action: ${dispatcher.dispatch(resolution.action)}  (${resolution.tier})`);
  } catch (err) {
    console.log(`Action: ${dispatcher.dispatchFailure(err)}  (default: ${toError(err).message})`);
  }
}
