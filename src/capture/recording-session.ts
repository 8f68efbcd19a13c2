/**
 * RecordingSession — one press-to-release interval against a running capture.
 *
 * The session value is owned by whoever handles the trigger. A second
 * begin() while recording is rejected so the in-flight start cursor is
 * never overwritten.
 */

import type { CaptureState, SessionLimits, SessionOutcome } from './types.js';
import { NotReadyError, SessionActiveError } from '../core/errors.js';

export type SessionState = 'idle' | 'recording';

export class RecordingSession {
  private startCursor = -1;
  private startTimestamp = 0;
  private state: SessionState = 'idle';

  /**
   * Mark the start of an utterance, backing up by the pre-roll so the
   * first syllable is not clipped. Returns the wrapped start cursor.
   */
  begin(capture: CaptureState, preRollSeconds: number, now: number = Date.now()): number {
    if (this.state === 'recording') {
      throw new SessionActiveError();
    }
    if (!capture.active) {
      throw new NotReadyError();
    }

    const capacity = capture.capacity;
    const preRoll = Number.isFinite(preRollSeconds) ? preRollSeconds : 0;
    const preRollFrames = clamp(Math.round(preRoll * capture.sampleRate), 0, Math.max(0, capacity - 1));
    const cursor = capture.currentCursor();

    this.startCursor = mod(cursor - preRollFrames, capacity);
    this.startTimestamp = now;
    this.state = 'recording';
    return this.startCursor;
  }

  /**
   * Close the interval and cut the clip. Too-short recordings come back
   * as `discarded`; the session is idle again however this returns.
   */
  end(capture: CaptureState, limits: SessionLimits): SessionOutcome {
    if (this.state !== 'recording') {
      throw new NotReadyError('No recording session is active');
    }
    const startCursor = this.startCursor;
    try {
      if (!capture.active) {
        throw new NotReadyError();
      }

      const capacity = capture.capacity;
      const sampleRate = capture.sampleRate;
      const stopCursor = capture.currentCursor();

      const maxFrames = Math.round(limits.maxSeconds * sampleRate);
      const framesToCopy = Math.min(mod(stopCursor - startCursor, capacity), maxFrames);
      const durationSec = framesToCopy / sampleRate;

      if (durationSec < limits.minSeconds) {
        return { kind: 'discarded', frames: framesToCopy, durationSec };
      }

      const samples = capture.extract(startCursor, framesToCopy);
      return {
        kind: 'extracted',
        durationSec,
        clip: {
          samples,
          frameCount: framesToCopy,
          channels: capture.channels,
          sampleRate,
        },
      };
    } finally {
      this.reset();
    }
  }

  /** Drop an in-flight session without extracting anything. */
  cancel(): void {
    this.reset();
  }

  isActive(): boolean {
    return this.state === 'recording';
  }

  getState(): SessionState {
    return this.state;
  }

  getStartCursor(): number | null {
    return this.state === 'recording' ? this.startCursor : null;
  }

  getStartTimestamp(): number | null {
    return this.state === 'recording' ? this.startTimestamp : null;
  }

  private reset(): void {
    this.startCursor = -1;
    this.startTimestamp = 0;
    this.state = 'idle';
  }
}

function mod(value: number, modulus: number): number {
  return ((value % modulus) + modulus) % modulus;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
