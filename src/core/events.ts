import { EventEmitter } from 'eventemitter3';
import type { ReasonerEvents } from './types.js';

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof ReasonerEvents>(event: K, listener: (data: ReasonerEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof ReasonerEvents>(event: K, listener: (data: ReasonerEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof ReasonerEvents>(event: K, listener: (data: ReasonerEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof ReasonerEvents>(event: K, data: ReasonerEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: keyof ReasonerEvents): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
