import { EventEmitter } from 'eventemitter3';
import type { VoiceKitEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof VoiceKitEvents>(event: K, listener: (data: VoiceKitEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof VoiceKitEvents>(event: K, listener: (data: VoiceKitEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof VoiceKitEvents>(event: K, listener: (data: VoiceKitEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof VoiceKitEvents>(event: K, data: VoiceKitEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
