/**
 * Audio Capture Types
 *
 * Type definitions for the capture subsystem: the input device seam,
 * the looped capture handle it returns, and the clips cut from it.
 */

// ═══════════════════════════════════════════════════════════════
// DEVICE
// ═══════════════════════════════════════════════════════════════

export interface CaptureRequest {
  /** Device name; undefined selects the system default */
  device?: string;
  /** Requested sample rate in Hz */
  sampleRate: number;
  /** Length of the looped buffer in seconds */
  loopSeconds: number;
}

/**
 * A live, looped recording. The device writes into its own circular
 * storage and keeps overwriting the oldest frames once it wraps.
 */
export interface CaptureHandle {
  /** Actual sample rate reported by the device */
  readonly sampleRate: number;
  readonly channels: number;
  /** Capacity of the loop in frames */
  readonly frames: number;
  /** Next frame the device will overwrite */
  position(): number;
  /**
   * Copy `out.length / channels` interleaved frames starting at
   * `offsetFrames`. Callers never ask for a range that crosses the end.
   */
  read(offsetFrames: number, out: Float32Array): void;
  close(): void;
}

export interface AudioInputDevice {
  listDevices(): string[];
  open(request: CaptureRequest): CaptureHandle;
}

// ═══════════════════════════════════════════════════════════════
// CLIPS
// ═══════════════════════════════════════════════════════════════

export interface TrimmedClip {
  /** Interleaved samples in [-1, 1]; length is frameCount * channels */
  samples: Float32Array;
  frameCount: number;
  channels: number;
  sampleRate: number;
}

/** Read-only view of a running capture, as a session needs it */
export interface CaptureState {
  readonly active: boolean;
  readonly capacity: number;
  readonly sampleRate: number;
  readonly channels: number;
  currentCursor(): number;
  extract(startFrame: number, frameCount: number): Float32Array;
}

export interface SessionLimits {
  maxSeconds: number;
  minSeconds: number;
}

export type SessionOutcome =
  | { kind: 'extracted'; clip: TrimmedClip; durationSec: number }
  | { kind: 'discarded'; frames: number; durationSec: number };
