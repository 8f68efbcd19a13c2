/**
 * Wiring for a host application: builds the resolver, dispatcher,
 * push-to-talk controller and typed-command entry from a loaded config.
 * Providers are created here once and handed to whatever needs them.
 */

import type { VoiceKitConfig } from './core/types.js';
import { EventBus } from './core/events.js';
import { getLogger, type Logger } from './core/logger.js';
import type { AudioInputDevice } from './capture/types.js';
import { CommandResolver } from './resolver/command-resolver.js';
import { ActionDispatcher, type ActionHandlers } from './resolver/action-dispatcher.js';
import { VoiceCommandController } from './controller/voice-command-controller.js';
import { TextCommandEntry } from './controller/text-command-entry.js';
import type { InputSuppressor, TriggerInput } from './controller/types.js';
import type { LLMProvider, SpeechToTextProvider } from './providers/types.js';
import { OpenAIProvider } from './providers/openai.js';
import { OpenAITranscriber } from './providers/openai-transcriber.js';

export interface VoiceKitDependencies {
  device: AudioInputDevice;
  trigger: TriggerInput;
  handlers: ActionHandlers;
  suppressor?: InputSuppressor;
  /** Overrides the OpenAI chat provider built from config */
  provider?: LLMProvider;
  /** Overrides the OpenAI transcriber built from config */
  transcriber?: SpeechToTextProvider;
  events?: EventBus;
  logger?: Logger;
}

export interface VoiceKit {
  controller: VoiceCommandController;
  entry: TextCommandEntry;
  resolver: CommandResolver;
  dispatcher: ActionDispatcher;
  events: EventBus;
}

export function createLanguageModel(config: VoiceKitConfig, logger?: Logger): LLMProvider | undefined {
  const apiKey = config.providers.openaiApiKey || process.env.OPENAI_API_KEY;
  if (!apiKey) return undefined;
  return new OpenAIProvider(
    { apiKey, baseUrl: config.providers.baseUrl, defaultModel: config.resolver.model },
    logger,
  );
}

export function createTranscriber(config: VoiceKitConfig, logger?: Logger): SpeechToTextProvider {
  return new OpenAITranscriber(
    {
      apiKey: config.providers.openaiApiKey,
      baseUrl: config.providers.baseUrl,
      defaultModel: config.transcription.model,
    },
    logger,
  );
}

export function createResolver(
  config: VoiceKitConfig,
  options: { provider?: LLMProvider; events?: EventBus; logger?: Logger } = {},
): CommandResolver {
  return new CommandResolver({
    provider: options.provider,
    model: config.resolver.model,
    maxTokens: config.resolver.maxTokens,
    temperature: config.resolver.temperature,
    cacheHeuristicMatches: config.resolver.cacheHeuristicMatches,
    events: options.events,
    logger: options.logger,
  });
}

export function createVoiceKit(config: VoiceKitConfig, deps: VoiceKitDependencies): VoiceKit {
  const events = deps.events ?? new EventBus();
  const logger = deps.logger ?? getLogger();

  const resolver = createResolver(config, {
    provider: deps.provider ?? createLanguageModel(config, logger),
    events,
    logger,
  });
  const dispatcher = new ActionDispatcher(deps.handlers, { events, logger });

  const controller = new VoiceCommandController({
    device: deps.device,
    trigger: deps.trigger,
    transcriber: deps.transcriber ?? createTranscriber(config, logger),
    resolver,
    dispatcher,
    captureSettings: config.capture,
    tickIntervalMs: config.controller.tickIntervalMs,
    cancelStale: config.controller.cancelStale,
    language: config.transcription.language,
    events,
    logger,
  });

  const entry = new TextCommandEntry(controller, { suppressor: deps.suppressor, events, logger });

  return { controller, entry, resolver, dispatcher, events };
}
