/**
 * VoiceCommandController — push-to-talk orchestration.
 *
 * Samples the trigger once per tick. The press edge opens a session on the
 * rolling capture; the release edge cuts the clip synchronously, then the
 * clip goes through transcription → resolution → dispatch as a tracked
 * task. Those tasks never reject: every failure ends in a PipelineResult.
 */

import { nanoid } from 'nanoid';
import { RingCapture } from '../capture/ring-capture.js';
import { RecordingSession } from '../capture/recording-session.js';
import { encodeWav } from '../capture/wav.js';
import type { AudioInputDevice, SessionOutcome, TrimmedClip } from '../capture/types.js';
import type { CommandResolver, Resolution } from '../resolver/command-resolver.js';
import type { ActionDispatcher } from '../resolver/action-dispatcher.js';
import type { SpeechToTextProvider } from '../providers/types.js';
import type { PipelineResult, TriggerInput } from './types.js';
import type { EventBus } from '../core/events.js';
import { VoiceKitConfigSchema, type VoiceKitConfig } from '../core/types.js';
import { EmptyCommandError, VoiceKitError, toError } from '../core/errors.js';
import { getLogger, type Logger } from '../core/logger.js';

export type CaptureSettings = VoiceKitConfig['capture'];

const DEFAULT_CAPTURE: CaptureSettings = VoiceKitConfigSchema.shape.capture.parse({});

export interface VoiceCommandControllerOptions {
  device: AudioInputDevice;
  trigger: TriggerInput;
  transcriber: SpeechToTextProvider;
  resolver: CommandResolver;
  dispatcher: ActionDispatcher;
  capture?: RingCapture;
  captureSettings?: Partial<CaptureSettings>;
  tickIntervalMs?: number;
  /** Abort in-flight pipelines when a new command starts */
  cancelStale?: boolean;
  language?: string;
  events?: EventBus;
  logger?: Logger;
}

export class VoiceCommandController {
  private readonly capture: RingCapture;
  private readonly session = new RecordingSession();
  private readonly settings: CaptureSettings;
  private readonly logger: Logger;
  private readonly inFlight = new Map<Promise<PipelineResult>, { id: string; controller: AbortController }>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private wasPressed = false;

  constructor(private readonly options: VoiceCommandControllerOptions) {
    this.settings = { ...DEFAULT_CAPTURE, ...options.captureSettings };
    this.logger = options.logger ?? getLogger();
    this.capture = options.capture ?? new RingCapture({
      readinessAttempts: this.settings.readinessAttempts,
      logger: this.logger,
    });
  }

  // ─────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────

  /**
   * Start the rolling capture. A missing or silent device is logged and
   * leaves voice input inactive; typed commands keep working.
   */
  async enable(): Promise<boolean> {
    const { sampleRate, loopSeconds, device } = this.settings;
    try {
      await this.capture.start(this.options.device, sampleRate, loopSeconds, device);
    } catch (err) {
      const error = toError(err);
      const code = error instanceof VoiceKitError ? error.code : 'CAPTURE_ERROR';
      this.logger.warn({ code, error: error.message }, 'Voice capture unavailable');
      this.options.events?.emit('capture:unavailable', { code, message: error.message });
      return false;
    }
    this.options.events?.emit('capture:started', {
      sampleRate: this.capture.sampleRate,
      channels: this.capture.channels,
      capacity: this.capture.capacity,
    });
    return true;
  }

  disable(): void {
    this.session.cancel();
    this.capture.stop();
    this.options.events?.emit('capture:stopped', {});
  }

  /** Enable capture and begin ticking on a timer. */
  async start(): Promise<boolean> {
    const ready = await this.enable();
    if (!this.timer) {
      this.timer = setInterval(() => this.tick(), this.options.tickIntervalMs ?? 16);
    }
    return ready;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.wasPressed = false;
    this.disable();
  }

  isRecording(): boolean {
    return this.session.isActive();
  }

  isCaptureActive(): boolean {
    return this.capture.active;
  }

  // ─────────────────────────────────────────────────────────
  // INPUT
  // ─────────────────────────────────────────────────────────

  /** Sample the trigger and act on press/release edges. */
  tick(now: number = Date.now()): void {
    const pressed = this.options.trigger.isPressed();
    if (pressed && !this.wasPressed) {
      this.press(now);
    } else if (!pressed && this.wasPressed && this.session.isActive()) {
      void this.release();
    }
    this.wasPressed = pressed;
  }

  press(now: number = Date.now()): boolean {
    let startCursor: number;
    try {
      startCursor = this.session.begin(this.capture, this.settings.preRollSeconds, now);
    } catch (err) {
      const error = toError(err);
      this.logger.warn({ error: error.message }, 'Recording not started');
      this.options.events?.emit('session:rejected', { reason: error.message });
      return false;
    }

    // only a press that actually records supersedes earlier commands
    if (this.options.cancelStale) {
      this.cancelPending();
    }
    this.logger.debug({ startCursor }, 'Recording started');
    this.options.events?.emit('session:started', { startCursor, timestamp: now });
    return true;
  }

  /**
   * Close the session and launch the pipeline for its clip. Returns null
   * when nothing was recorded or the clip was too short.
   */
  release(): Promise<PipelineResult> | null {
    if (!this.session.isActive()) return null;

    let outcome: SessionOutcome;
    try {
      outcome = this.session.end(this.capture, {
        maxSeconds: this.settings.maxRecordSeconds,
        minSeconds: this.settings.minRecordSeconds,
      });
    } catch (err) {
      this.logger.warn({ error: toError(err).message }, 'Recording could not be extracted');
      return null;
    }

    if (outcome.kind === 'discarded') {
      this.logger.debug({ durationSec: outcome.durationSec }, 'Recording too short, ignored');
      this.options.events?.emit('session:discarded', { frames: outcome.frames, durationSec: outcome.durationSec });
      return null;
    }

    const { clip, durationSec } = outcome;
    this.options.events?.emit('session:extracted', { frames: clip.frameCount, durationSec });
    return this.track((signal, log) => this.runClip(clip, signal, log));
  }

  /** Typed-command path: resolve and dispatch without audio. */
  submitText(text: string): Promise<PipelineResult> {
    if (this.options.cancelStale) {
      this.cancelPending();
    }
    return this.track((signal, log) => this.runText(text, signal, log));
  }

  // ─────────────────────────────────────────────────────────
  // TASKS
  // ─────────────────────────────────────────────────────────

  pendingCount(): number {
    return this.inFlight.size;
  }

  /** Resolves once every tracked pipeline has settled. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.keys());
    }
  }

  cancelPending(): void {
    for (const { id, controller } of this.inFlight.values()) {
      if (!controller.signal.aborted) {
        controller.abort();
        this.options.events?.emit('pipeline:cancelled', { pipelineId: id });
      }
    }
  }

  private track(run: (signal: AbortSignal, log: Logger) => Promise<PipelineResult>): Promise<PipelineResult> {
    const controller = new AbortController();
    const id = nanoid(10);
    const log = this.logger.child({ pipelineId: id });
    const task: Promise<PipelineResult> = run(controller.signal, log)
      .catch((err: unknown): PipelineResult => {
        log.error({ error: toError(err).message }, 'Voice pipeline failed');
        return { status: 'abandoned', reason: 'error' };
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.set(task, { id, controller });
    return task;
  }

  private async runClip(clip: TrimmedClip, signal: AbortSignal, log: Logger): Promise<PipelineResult> {
    const audio = encodeWav(clip);

    let text: string;
    try {
      text = await this.options.transcriber.transcribe({
        audio,
        sampleRate: clip.sampleRate,
        channels: clip.channels,
        language: this.options.language,
        signal,
      });
    } catch (err) {
      if (signal.aborted) return { status: 'cancelled' };
      const message = toError(err).message;
      log.error({ error: message }, 'Transcription failed');
      this.options.events?.emit('transcription:failed', { error: message });
      return { status: 'abandoned', reason: 'transcription-failed' };
    }

    if (signal.aborted) return { status: 'cancelled' };

    if (!text.trim()) {
      log.info('Empty transcription');
      this.options.events?.emit('transcription:failed', { error: 'empty transcription' });
      return { status: 'abandoned', reason: 'empty-transcription' };
    }

    log.info({ text }, 'Transcribed');
    this.options.events?.emit('transcription:complete', { text });
    return this.runText(text, signal, log);
  }

  private async runText(text: string, signal: AbortSignal, log: Logger): Promise<PipelineResult> {
    let resolution: Resolution;
    try {
      resolution = await this.options.resolver.resolve(text, signal);
    } catch (err) {
      if (signal.aborted) return { status: 'cancelled' };
      if (err instanceof EmptyCommandError) {
        log.debug('Empty command, nothing to dispatch');
        return { status: 'abandoned', reason: 'empty-command' };
      }
      const action = this.options.dispatcher.dispatchFailure(err);
      return { status: 'defaulted', action, error: toError(err).message };
    }

    if (signal.aborted) return { status: 'cancelled' };

    const action = this.options.dispatcher.dispatch(resolution.action);
    return { status: 'dispatched', action, token: resolution.action, tier: resolution.tier };
  }
}
