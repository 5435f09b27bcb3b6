/**
 * Per-session mutual exclusion.
 *
 * At most one holder per session at any instant; different sessions never
 * contend. `tryRun` refuses instead of queueing, which is what orchestrator
 * entries need. `run` waits its turn in FIFO order.
 */

import { ConcurrentAdvanceInProgressError } from '../errors';
import type { SessionId } from '../lifecycle/types';

type Waiter = () => void;

export class SessionLock {
  private held: Set<SessionId> = new Set();
  private waiters: Map<SessionId, Waiter[]> = new Map();

  isLocked(sessionId: SessionId): boolean {
    return this.held.has(sessionId);
  }

  /**
   * Takes the lock if it is free. Returns a release function, or null.
   */
  tryAcquire(sessionId: SessionId): (() => void) | null {
    if (this.held.has(sessionId)) return null;
    this.held.add(sessionId);
    return this.releaser(sessionId);
  }

  /**
   * Waits for the lock.
   */
  acquire(sessionId: SessionId): Promise<() => void> {
    const release = this.tryAcquire(sessionId);
    if (release) return Promise.resolve(release);

    return new Promise((resolve) => {
      const queue = this.waiters.get(sessionId) ?? [];
      // Ownership passes straight to the waiter, the session never looks free
      queue.push(() => resolve(this.releaser(sessionId)));
      this.waiters.set(sessionId, queue);
    });
  }

  /**
   * Runs `fn` holding the lock, rejecting if it is already held.
   */
  async tryRun<T>(sessionId: SessionId, fn: () => Promise<T> | T): Promise<T> {
    const release = this.tryAcquire(sessionId);
    if (!release) {
      throw new ConcurrentAdvanceInProgressError(sessionId);
    }
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Runs `fn` holding the lock, waiting for it if necessary.
   */
  async run<T>(sessionId: SessionId, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(sessionId);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(sessionId: SessionId): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const queue = this.waiters.get(sessionId);
      const next = queue?.shift();
      if (queue && queue.length === 0) {
        this.waiters.delete(sessionId);
      }
      if (next) {
        next();
      } else {
        this.held.delete(sessionId);
      }
    };
  }
}
