/**
 * Host event bus shared by the orchestrator, the turn monitor and the host.
 */

import type { HostEvent, HostEventCallback, HostEventInput } from './types';

export class HostEventEmitter {
  private callbacks: HostEventCallback[] = [];
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /**
   * Registers an event listener.
   */
  onEvent(callback: HostEventCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      const idx = this.callbacks.indexOf(callback);
      if (idx !== -1) {
        this.callbacks.splice(idx, 1);
      }
    };
  }

  /**
   * Stamps an event and delivers it to all listeners.
   */
  emit(input: HostEventInput): HostEvent {
    const event: HostEvent = { ...input, timestamp: new Date(this.now()) };
    for (const callback of this.callbacks) {
      try {
        callback(event);
      } catch (err) {
        console.error('Event callback error:', err);
      }
    }
    return event;
  }
}
