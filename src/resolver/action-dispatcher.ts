/**
 * ActionDispatcher — runs the host callback for a resolved token.
 *
 * Exactly one handler runs per dispatch. Anything outside the action set,
 * and any failed resolution, lands on IDLE so the controlled entity is
 * always left in a defined state.
 */

import { ACTIONS, SAFE_ACTION, isAction, normalizeToken, type Action } from './types.js';
import type { EventBus } from '../core/events.js';
import { UnknownActionError, toError } from '../core/errors.js';
import { getLogger, type Logger } from '../core/logger.js';

export type ActionHandler = () => void;

export type ActionHandlers = Partial<Record<Action, ActionHandler>>;

export interface ActionDispatcherOptions {
  events?: EventBus;
  logger?: Logger;
}

export class ActionDispatcher {
  private handlers = new Map<Action, ActionHandler>();
  private readonly logger: Logger;

  constructor(handlers: ActionHandlers = {}, private readonly options: ActionDispatcherOptions = {}) {
    this.logger = options.logger ?? getLogger();
    for (const action of ACTIONS) {
      const handler = handlers[action];
      if (handler) this.handlers.set(action, handler);
    }
  }

  register(action: Action, handler: ActionHandler): void {
    this.handlers.set(action, handler);
  }

  unregister(action: Action): void {
    this.handlers.delete(action);
  }

  /** Dispatch a token and return the action that actually ran. */
  dispatch(token: string): Action {
    const normalized = normalizeToken(token);

    if (!isAction(normalized)) {
      const warning = new UnknownActionError(token);
      this.logger.warn({ token, code: warning.code }, warning.message);
      this.options.events?.emit('action:unknown', { token });
      return this.invoke(SAFE_ACTION, token);
    }

    return this.invoke(normalized, token);
  }

  /** Safe default after a failed resolution. */
  dispatchFailure(error: unknown): Action {
    this.logger.error({ error: toError(error).message }, 'Resolution failed; defaulting to idle');
    return this.invoke(SAFE_ACTION, SAFE_ACTION);
  }

  private invoke(action: Action, token: string): Action {
    this.logger.info({ action }, 'Executing action');
    const handler = this.handlers.get(action);
    if (handler) {
      try {
        handler();
      } catch (err) {
        this.logger.error({ action, error: toError(err).message }, 'Action handler threw');
      }
    }
    this.options.events?.emit('action:dispatched', { action, token });
    return action;
  }
}
