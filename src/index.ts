/**
 * voice-command-kit — push-to-talk voice commands for a controlled entity
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ConfigManager, createVoiceKit } from 'voice-command-kit';
 *
 * const config = new ConfigManager().load();
 * const kit = createVoiceKit(config, {
 *   device,
 *   trigger,
 *   handlers: { FOLLOW: () => agent.follow(), STOP: () => agent.stop() },
 * });
 * await kit.controller.start();
 * ```
 */

// Core
export { EventBus } from './core/events.js';
export { ConfigManager } from './core/config.js';
export { createLogger, getLogger, setLogger, type Logger } from './core/logger.js';
export {
  VoiceKitError,
  ConfigError,
  ProviderError,
  DeviceUnavailableError,
  DeviceNotReadyError,
  NotReadyError,
  SessionActiveError,
  InvalidAudioError,
  TranscriptionError,
  EmptyCommandError,
  RemoteResolutionError,
  UnknownActionError,
} from './core/errors.js';
export {
  VoiceKitConfigSchema,
  type VoiceKitConfig,
  type VoiceKitEvents,
  type ResolutionTier,
} from './core/types.js';

// Capture
export * from './capture/index.js';

// Resolution
export * from './resolver/index.js';

// Providers
export { BaseLLMProvider } from './providers/base.js';
export { OpenAIProvider } from './providers/openai.js';
export { OpenAITranscriber } from './providers/openai-transcriber.js';
export type {
  LLMMessage,
  LLMRequest,
  LLMResponse,
  LLMProvider,
  SpeechToTextProvider,
  TranscriptionRequest,
  ProviderConfig,
} from './providers/types.js';

// Controller
export { VoiceCommandController, type VoiceCommandControllerOptions, type CaptureSettings } from './controller/voice-command-controller.js';
export { TextCommandEntry, type CommandSink, type TextCommandEntryOptions } from './controller/text-command-entry.js';
export type { TriggerInput, InputSuppressor, PipelineResult, AbandonReason } from './controller/types.js';

// Wiring
export {
  createVoiceKit,
  createResolver,
  createLanguageModel,
  createTranscriber,
  type VoiceKit,
  type VoiceKitDependencies,
} from './voice-kit.js';

export { VERSION, NAME } from './version.js';
