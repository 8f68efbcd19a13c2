export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMRequest {
  messages: LLMMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason: 'stop' | 'length' | 'error';
  raw?: unknown;
}

export interface LLMProvider {
  readonly name: string;
  readonly defaultModel: string;

  complete(request: LLMRequest): Promise<LLMResponse>;
  isAvailable(): Promise<boolean>;
}

export interface TranscriptionRequest {
  /** Encoded RIFF/WAVE container */
  audio: Buffer;
  sampleRate: number;
  channels: number;
  language?: string;
  signal?: AbortSignal;
}

export interface SpeechToTextProvider {
  readonly name: string;

  /** Plain-text transcription; may be empty when nothing was said */
  transcribe(request: TranscriptionRequest): Promise<string>;
}

export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  defaultModel?: string;
  timeout?: number;
}
