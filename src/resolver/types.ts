/**
 * Command Resolution Types
 *
 * The closed action vocabulary and the rule shape used by the local
 * heuristic classifier.
 */

export const ACTIONS = ['FOLLOW', 'STOP', 'JUMP', 'IDLE', 'BACKOFF'] as const;

export type Action = (typeof ACTIONS)[number];

/** Action taken whenever resolution fails or returns something unusable */
export const SAFE_ACTION: Action = 'IDLE';

export function isAction(token: string): token is Action {
  return (ACTIONS as readonly string[]).includes(token);
}

export function normalizeToken(token: string): string {
  return token.trim().toUpperCase();
}

export interface HeuristicRule {
  /** Action produced when a keyword is present */
  action: Action;
  /** Substrings matched against the lower-cased phrase */
  keywords: readonly string[];
  /** Action produced instead when the phrase is negated */
  negated: Action;
}
