import OpenAI, { toFile } from 'openai';
import type { ProviderConfig, SpeechToTextProvider, TranscriptionRequest } from './types.js';
import { getLogger, type Logger } from '../core/logger.js';
import { TranscriptionError, toError } from '../core/errors.js';

/**
 * Speech-to-text over the OpenAI audio transcription endpoint. The clip is
 * uploaded as `audio.wav`; one attempt per call.
 */
export class OpenAITranscriber implements SpeechToTextProvider {
  readonly name = 'openai-whisper';
  readonly defaultModel = 'whisper-1';

  private client: OpenAI | null = null;
  private readonly logger: Logger;

  constructor(private readonly config: ProviderConfig = {}, logger?: Logger) {
    this.logger = logger ?? getLogger();
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.config.apiKey || process.env.OPENAI_API_KEY,
        ...(this.config.baseUrl ? { baseURL: this.config.baseUrl } : {}),
        timeout: this.config.timeout,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async transcribe(request: TranscriptionRequest): Promise<string> {
    const model = this.config.defaultModel || this.defaultModel;
    this.logger.debug(
      { provider: this.name, model, bytes: request.audio.length, sampleRate: request.sampleRate },
      'Transcription request',
    );

    try {
      const file = await toFile(request.audio, 'audio.wav', { type: 'audio/wav' });
      const result = await this.getClient().audio.transcriptions.create(
        {
          file,
          model,
          ...(request.language ? { language: request.language } : {}),
        },
        request.signal ? { signal: request.signal } : undefined,
      );
      return result.text.trim();
    } catch (err) {
      const error = toError(err);
      throw new TranscriptionError(`Transcription failed: ${error.message}`, error);
    }
  }
}
