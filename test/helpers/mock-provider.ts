/**
 * Mock providers for testing
 */

import type {
  LLMProvider,
  LLMRequest,
  LLMResponse,
  SpeechToTextProvider,
  TranscriptionRequest,
} from '../../src/providers/types.js';

export class MockProvider implements LLMProvider {
  readonly name = 'mock';
  readonly defaultModel = 'mock-model';
  calls: LLMRequest[] = [];
  private replies: Array<string | Error>;
  private replyIndex = 0;

  constructor(replies: Array<string | Error> = ['IDLE']) {
    this.replies = replies;
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    this.calls.push(request);
    const reply = this.replies[this.replyIndex % this.replies.length];
    this.replyIndex++;
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      content: reply,
      model: request.model ?? this.defaultModel,
      usage: { inputTokens: 10, outputTokens: 1, totalTokens: 11 },
      finishReason: 'stop',
    };
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

/** Provider whose reply is released by the test, to hold a call in flight. */
export class DeferredProvider implements LLMProvider {
  readonly name = 'deferred';
  readonly defaultModel = 'mock-model';
  calls: LLMRequest[] = [];
  private pending: Array<(content: string) => void> = [];

  complete(request: LLMRequest): Promise<LLMResponse> {
    this.calls.push(request);
    return new Promise((resolve, reject) => {
      request.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      this.pending.push(content => resolve({
        content,
        model: this.defaultModel,
        usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
        finishReason: 'stop',
      }));
    });
  }

  reply(content: string): void {
    const next = this.pending.shift();
    if (!next) throw new Error('No pending request');
    next(content);
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

export class MockTranscriber implements SpeechToTextProvider {
  readonly name = 'mock-stt';
  calls: TranscriptionRequest[] = [];

  constructor(private readonly result: string | Error = 'follow me') {}

  async transcribe(request: TranscriptionRequest): Promise<string> {
    this.calls.push(request);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}
