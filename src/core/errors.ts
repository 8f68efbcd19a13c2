export class VoiceKitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'VoiceKitError';
  }
}

export class ConfigError extends VoiceKitError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class ProviderError extends VoiceKitError {
  constructor(message: string, public readonly provider: string, cause?: Error) {
    super(message, 'PROVIDER_ERROR', 'remote', cause);
    this.name = 'ProviderError';
  }
}

// ── Capture ──────────────────────────────────────────────────

export class DeviceUnavailableError extends VoiceKitError {
  constructor(message = 'No audio capture device found', cause?: Error) {
    super(message, 'DEVICE_UNAVAILABLE', 'capture', cause);
    this.name = 'DeviceUnavailableError';
  }
}

export class DeviceNotReadyError extends VoiceKitError {
  constructor(public readonly attempts: number) {
    super(`Capture device produced no frames after ${attempts} attempts`, 'DEVICE_NOT_READY', 'capture');
    this.name = 'DeviceNotReadyError';
  }
}

export class NotReadyError extends VoiceKitError {
  constructor(message = 'Capture is not active') {
    super(message, 'NOT_READY', 'session');
    this.name = 'NotReadyError';
  }
}

export class SessionActiveError extends VoiceKitError {
  constructor() {
    super('A recording session is already active', 'SESSION_ACTIVE', 'session');
    this.name = 'SessionActiveError';
  }
}

export class InvalidAudioError extends VoiceKitError {
  constructor(message: string) {
    super(message, 'INVALID_AUDIO', 'encode');
    this.name = 'InvalidAudioError';
  }
}

// ── Resolution ───────────────────────────────────────────────

export class TranscriptionError extends VoiceKitError {
  constructor(message: string, cause?: Error) {
    super(message, 'TRANSCRIPTION_FAILURE', 'transcribe', cause);
    this.name = 'TranscriptionError';
  }
}

export class EmptyCommandError extends VoiceKitError {
  constructor() {
    super('Command text is empty', 'EMPTY_COMMAND', 'resolve');
    this.name = 'EmptyCommandError';
  }
}

export class RemoteResolutionError extends VoiceKitError {
  constructor(message: string, public readonly phrase: string, cause?: Error) {
    super(message, 'REMOTE_RESOLUTION_FAILURE', 'resolve', cause);
    this.name = 'RemoteResolutionError';
  }
}

export class UnknownActionError extends VoiceKitError {
  constructor(public readonly token: string) {
    super(`Unknown action received: ${token}`, 'UNKNOWN_ACTION', 'dispatch');
    this.name = 'UnknownActionError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
