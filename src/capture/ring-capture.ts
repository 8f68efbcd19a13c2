/**
 * RingCapture — Continuous Looped Audio Capture
 *
 * Keeps an input device recording into a fixed-capacity circular buffer
 * for as long as the feature is enabled. Sessions never start or stop the
 * device; they only read the cursor and pull frames back out through
 * extract(), which handles the wrap at the end of the loop.
 */

import type { AudioInputDevice, CaptureHandle, CaptureState } from './types.js';
import { DeviceNotReadyError, DeviceUnavailableError, NotReadyError, toError } from '../core/errors.js';
import { getLogger, type Logger } from '../core/logger.js';
import { sleep } from '../utils/sleep.js';

export interface RingCaptureOptions {
  /** Polls of the device cursor before giving up on readiness */
  readinessAttempts?: number;
  /** Delay between readiness polls */
  pollIntervalMs?: number;
  logger?: Logger;
}

export class RingCapture implements CaptureState {
  private handle: CaptureHandle | null = null;
  private ready = false;
  private starting: Promise<void> | null = null;
  private readonly readinessAttempts: number;
  private readonly pollIntervalMs: number;
  private readonly logger: Logger;

  constructor(options: RingCaptureOptions = {}) {
    this.readinessAttempts = options.readinessAttempts ?? 200;
    this.pollIntervalMs = options.pollIntervalMs ?? 5;
    this.logger = options.logger ?? getLogger();
  }

  // ─────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────

  /**
   * Open the device in looped mode and wait until it has produced at
   * least one frame. Resolves once the cursor is meaningful; callers that
   * arrive while a start is still polling share its outcome.
   */
  start(
    device: AudioInputDevice,
    sampleRate: number,
    loopSeconds: number,
    deviceName?: string,
  ): Promise<void> {
    if (this.starting) return this.starting;
    if (this.handle && this.ready) return Promise.resolve();

    const starting = this.open(device, sampleRate, loopSeconds, deviceName).finally(() => {
      if (this.starting === starting) this.starting = null;
    });
    this.starting = starting;
    return starting;
  }

  private async open(
    device: AudioInputDevice,
    sampleRate: number,
    loopSeconds: number,
    deviceName?: string,
  ): Promise<void> {
    const available = device.listDevices();
    if (available.length === 0) {
      throw new DeviceUnavailableError();
    }
    if (deviceName !== undefined && !available.includes(deviceName)) {
      throw new DeviceUnavailableError(`Capture device not found: ${deviceName}`);
    }

    let handle: CaptureHandle;
    try {
      handle = device.open({ device: deviceName, sampleRate, loopSeconds });
    } catch (err) {
      throw new DeviceUnavailableError('Failed to open capture device', toError(err));
    }
    this.handle = handle;

    for (let attempt = 0; attempt < this.readinessAttempts; attempt++) {
      if (this.handle !== handle) {
        throw new NotReadyError('Capture stopped while waiting for the device');
      }
      if (handle.position() > 0) {
        this.ready = true;
        this.logger.info(
          { sampleRate: handle.sampleRate, channels: handle.channels, capacity: handle.frames },
          'Capture ready (rolling buffer)',
        );
        return;
      }
      await sleep(this.pollIntervalMs);
    }

    this.stop();
    throw new DeviceNotReadyError(this.readinessAttempts);
  }

  /** Release the device. Safe to call repeatedly. */
  stop(): void {
    if (!this.handle) return;
    const handle = this.handle;
    this.handle = null;
    this.ready = false;
    handle.close();
    this.logger.debug('Capture stopped');
  }

  // ─────────────────────────────────────────────────────────
  // STATE
  // ─────────────────────────────────────────────────────────

  get active(): boolean {
    return this.handle !== null && this.ready;
  }

  get capacity(): number {
    return this.requireHandle().frames;
  }

  get sampleRate(): number {
    return this.requireHandle().sampleRate;
  }

  get channels(): number {
    return this.requireHandle().channels;
  }

  currentCursor(): number {
    const handle = this.requireHandle();
    return handle.position() % handle.frames;
  }

  // ─────────────────────────────────────────────────────────
  // EXTRACTION
  // ─────────────────────────────────────────────────────────

  /**
   * Copy `frameCount` frames beginning at `startFrame`. A range running
   * past the end of the loop is stitched from the tail and the head.
   */
  extract(startFrame: number, frameCount: number): Float32Array {
    const handle = this.requireHandle();
    const capacity = handle.frames;
    const channels = handle.channels;

    if (!Number.isInteger(startFrame) || startFrame < 0 || startFrame >= capacity) {
      throw new RangeError(`startFrame ${startFrame} outside [0, ${capacity})`);
    }
    if (!Number.isInteger(frameCount) || frameCount < 0 || frameCount > capacity) {
      throw new RangeError(`frameCount ${frameCount} outside [0, ${capacity}]`);
    }

    const out = new Float32Array(frameCount * channels);
    const tail = Math.min(frameCount, capacity - startFrame);
    if (tail > 0) {
      handle.read(startFrame, out.subarray(0, tail * channels));
    }
    const head = frameCount - tail;
    if (head > 0) {
      handle.read(0, out.subarray(tail * channels));
    }
    return out;
  }

  private requireHandle(): CaptureHandle {
    if (!this.handle || !this.ready) {
      throw new NotReadyError();
    }
    return this.handle;
  }
}
