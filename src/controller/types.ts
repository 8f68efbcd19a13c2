import type { Action } from '../resolver/types.js';
import type { ResolutionTier } from '../core/types.js';

/** The push-to-talk trigger, sampled once per tick. */
export interface TriggerInput {
  isPressed(): boolean;
}

/**
 * Narrow capability exposed by whatever owns the host's movement input.
 * Typed-command entry switches it on while the entry is open.
 */
export interface InputSuppressor {
  suppressInput(suppressed: boolean): void;
}

export type AbandonReason =
  | 'transcription-failed'
  | 'empty-transcription'
  | 'empty-command'
  | 'error';

export type PipelineResult =
  | { status: 'dispatched'; action: Action; token: string; tier: ResolutionTier }
  | { status: 'defaulted'; action: Action; error: string }
  | { status: 'abandoned'; reason: AbandonReason }
  | { status: 'cancelled' };
