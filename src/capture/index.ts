/**
 * Audio capture
 *
 * Barrel exports for the rolling capture, sessions and WAV codec.
 */

export { RingCapture, type RingCaptureOptions } from './ring-capture.js';
export { RecordingSession, type SessionState } from './recording-session.js';
export { encodeWav, decodeWav, toPcm16, WAV_HEADER_BYTES } from './wav.js';
export type {
  AudioInputDevice,
  CaptureHandle,
  CaptureRequest,
  CaptureState,
  TrimmedClip,
  SessionLimits,
  SessionOutcome,
} from './types.js';
