import type { Action, HeuristicRule } from './types.js';

/** Rule table in priority order; the first rule with a keyword hit wins. */
export const DEFAULT_RULES: readonly HeuristicRule[] = [
  { action: 'STOP', keywords: ['stop', 'freeze', 'halt', 'hold', 'quit', 'enough'], negated: 'FOLLOW' },
  { action: 'JUMP', keywords: ['jump', 'leap', 'hop'], negated: 'IDLE' },
  { action: 'FOLLOW', keywords: ['follow', 'come', 'chase', 'tail me'], negated: 'STOP' },
  { action: 'BACKOFF', keywords: ['back off', 'backoff', 'back up', 'backup', 'step back'], negated: 'FOLLOW' },
  { action: 'IDLE', keywords: ['idle', 'relax', 'rest', 'chill', 'wait', 'standby'], negated: 'FOLLOW' },
];

export const NEGATION_MARKERS: readonly string[] = ["don't", 'do not'];

/** Trim and lower-case a phrase; this is also the cache key. */
export function normalizePhrase(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Classify an already-normalized phrase against an ordered rule table.
 * Negation anywhere in the phrase flips the winning rule to its negated
 * action. Returns null when no keyword matches.
 */
export function classify(
  normalized: string,
  rules: readonly HeuristicRule[] = DEFAULT_RULES,
  negationMarkers: readonly string[] = NEGATION_MARKERS,
): Action | null {
  if (!normalized) return null;

  const negated = negationMarkers.some(marker => normalized.includes(marker));

  for (const rule of rules) {
    if (rule.keywords.some(keyword => normalized.includes(keyword.toLowerCase()))) {
      return negated ? rule.negated : rule.action;
    }
  }
  return null;
}
