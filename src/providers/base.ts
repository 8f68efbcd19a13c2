import type { LLMProvider, LLMRequest, LLMResponse, ProviderConfig } from './types.js';
import { getLogger, type Logger } from '../core/logger.js';
import { ProviderError, toError } from '../core/errors.js';

/**
 * Shared request path for language-model providers. Each call is a single
 * attempt; failures surface as ProviderError and the caller decides what
 * a failed resolution means.
 */
export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly defaultModel: string;

  protected logger: Logger;
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}, logger?: Logger) {
    this.config = {
      timeout: 120000,
      ...config,
    };
    this.logger = logger ?? getLogger();
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const model = request.model || this.config.defaultModel || this.defaultModel;
    this.logger.debug({ provider: this.name, model }, 'LLM request');

    try {
      return await this._complete({ ...request, model });
    } catch (err) {
      const error = toError(err);
      this.logger.warn({ provider: this.name, model, error: error.message }, 'LLM request failed');
      throw new ProviderError(`${this.name} request failed: ${error.message}`, this.name, error);
    }
  }

  abstract isAvailable(): Promise<boolean>;

  protected abstract _complete(request: LLMRequest): Promise<LLMResponse>;
}
