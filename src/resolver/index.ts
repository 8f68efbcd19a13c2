/**
 * Command resolution
 *
 * Barrel exports for the cache → heuristic → remote resolver and dispatch.
 */

export { CommandResolver, RESOLVER_INSTRUCTION, type CommandResolverOptions, type Resolution } from './command-resolver.js';
export { CommandCache } from './command-cache.js';
export { ActionDispatcher, type ActionHandler, type ActionHandlers, type ActionDispatcherOptions } from './action-dispatcher.js';
export { DEFAULT_RULES, NEGATION_MARKERS, classify, normalizePhrase } from './heuristics.js';
export { ACTIONS, SAFE_ACTION, isAction, normalizeToken, type Action, type HeuristicRule } from './types.js';
