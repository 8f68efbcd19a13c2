import OpenAI from 'openai';
import { BaseLLMProvider } from './base.js';
import type { LLMRequest, LLMResponse, ProviderConfig } from './types.js';
import type { Logger } from '../core/logger.js';

export class OpenAIProvider extends BaseLLMProvider {
  readonly name = 'openai';
  readonly defaultModel = 'gpt-4o-mini';

  private client: OpenAI | null = null;

  constructor(config: ProviderConfig = {}, logger?: Logger) {
    super(config, logger);
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

  async isAvailable(): Promise<boolean> {
    return !!(this.config.apiKey || process.env.OPENAI_API_KEY);
  }

  protected async _complete(request: LLMRequest): Promise<LLMResponse> {
    const model = request.model || this.defaultModel;
    const response = await this.getClient().chat.completions.create(
      {
        model,
        messages: request.messages.map(m => ({ role: m.role, content: m.content })),
        max_tokens: request.maxTokens || 4096,
        ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      },
      request.signal ? { signal: request.signal } : undefined,
    );

    const choice = response.choices[0];
    if (!choice) {
      throw new Error('Response contained no choices');
    }

    return {
      content: choice.message.content || '',
      model: response.model,
      usage: {
        inputTokens: response.usage?.prompt_tokens || 0,
        outputTokens: response.usage?.completion_tokens || 0,
        totalTokens: response.usage?.total_tokens || 0,
      },
      finishReason: choice.finish_reason === 'length' ? 'length' : 'stop',
      raw: response,
    };
  }
}
