/**
 * CommandResolver — free text to a single action token.
 *
 * Tiers run strictly in order and stop at the first answer:
 *   1. exact-match cache on the normalized phrase
 *   2. local keyword heuristics (see heuristics.ts)
 *   3. remote language-model fallback
 * Successful answers are written back to the cache.
 */

import type { Action, HeuristicRule } from './types.js';
import { isAction, normalizeToken } from './types.js';
import { CommandCache } from './command-cache.js';
import { DEFAULT_RULES, NEGATION_MARKERS, classify, normalizePhrase } from './heuristics.js';
import type { LLMProvider } from '../providers/types.js';
import type { EventBus } from '../core/events.js';
import type { ResolutionTier } from '../core/types.js';
import { EmptyCommandError, RemoteResolutionError, toError } from '../core/errors.js';
import { getLogger, type Logger } from '../core/logger.js';

export const RESOLVER_INSTRUCTION =
  'Given a user command, respond with one action name from: FOLLOW, STOP, JUMP, IDLE, BACKOFF. ' +
  'Infer intent and choose the best action. If ambiguous, infer from context.\n\n' +
  'Output: The action word (uppercase), with no explanation or punctuation.\n' +
  'Only use the allowed actions.\n' +
  'No extra text.';

export interface CommandResolverOptions {
  /** Remote fallback; without one, unmatched phrases fail */
  provider?: LLMProvider;
  rules?: readonly HeuristicRule[];
  negationMarkers?: readonly string[];
  cache?: CommandCache;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Also cache heuristic answers, not only remote ones */
  cacheHeuristicMatches?: boolean;
  events?: EventBus;
  logger?: Logger;
}

export interface Resolution {
  /** Normalized phrase used as the cache key */
  key: string;
  /** Uppercase token; only remote answers can fall outside the action set */
  action: string;
  tier: ResolutionTier;
}

export class CommandResolver {
  private readonly cache: CommandCache;
  private readonly rules: readonly HeuristicRule[];
  private readonly negationMarkers: readonly string[];
  private readonly logger: Logger;

  constructor(private readonly options: CommandResolverOptions = {}) {
    this.cache = options.cache ?? new CommandCache();
    this.rules = options.rules ?? DEFAULT_RULES;
    this.negationMarkers = options.negationMarkers ?? NEGATION_MARKERS;
    this.logger = options.logger ?? getLogger();
  }

  async resolve(text: string, signal?: AbortSignal): Promise<Resolution> {
    const key = normalizePhrase(text);
    if (!key) {
      throw new EmptyCommandError();
    }

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.logger.debug({ phrase: key, action: cached }, 'Cache hit');
      return this.resolved(key, cached, 'cache');
    }

    const local = this.classify(key);
    if (local) {
      this.logger.debug({ phrase: key, action: local }, 'Local parse');
      if (this.options.cacheHeuristicMatches !== false) {
        this.cache.set(key, local);
      }
      return this.resolved(key, local, 'heuristic');
    }

    return this.resolveRemote(key, text.trim(), signal);
  }

  /** Heuristic tier alone, with no cache or network involvement. */
  classify(normalized: string): Action | null {
    return classify(normalized, this.rules, this.negationMarkers);
  }

  getCache(): CommandCache {
    return this.cache;
  }

  private async resolveRemote(key: string, phrase: string, signal?: AbortSignal): Promise<Resolution> {
    const provider = this.options.provider;
    if (!provider) {
      this.fail(key, 'No language-model provider configured');
      throw new RemoteResolutionError('No language-model provider configured', phrase);
    }

    this.logger.debug({ phrase: key, provider: provider.name }, 'LLM parse');

    let reply: string;
    try {
      const response = await provider.complete({
        messages: [
          { role: 'system', content: RESOLVER_INSTRUCTION },
          { role: 'user', content: phrase },
        ],
        model: this.options.model,
        maxTokens: this.options.maxTokens ?? 4,
        temperature: this.options.temperature ?? 0,
        signal,
      });
      reply = response.content;
    } catch (err) {
      const error = toError(err);
      this.fail(key, error.message);
      throw new RemoteResolutionError(`Remote resolution failed: ${error.message}`, phrase, error);
    }

    const action = normalizeToken(reply);
    if (action) {
      this.cache.set(key, action);
    }
    if (!isAction(action)) {
      this.logger.warn({ phrase: key, reply }, 'Remote reply is not a known action');
    }
    return this.resolved(key, action, 'remote');
  }

  private resolved(key: string, action: string, tier: ResolutionTier): Resolution {
    this.options.events?.emit('command:resolved', { phrase: key, action, tier });
    return { key, action, tier };
  }

  private fail(key: string, message: string): void {
    this.logger.error({ phrase: key, error: message }, 'Command resolution failed');
    this.options.events?.emit('command:failed', { phrase: key, error: message });
  }
}
