/**
 * Single-owner registry of process handles.
 *
 * Each session has at most one handle, and only the orchestrator holds the
 * registry.
 */

import { InvalidArgumentError } from '../errors';
import type { SessionId } from '../lifecycle/types';
import type { ProcessHandle } from './types';

export class ProcessRegistry {
  private handles: Map<SessionId, ProcessHandle> = new Map();

  register(sessionId: SessionId, handle: ProcessHandle): void {
    if (this.handles.has(sessionId)) {
      throw new InvalidArgumentError(`Session ${sessionId} already owns a process handle`, { sessionId });
    }
    this.handles.set(sessionId, handle);
  }

  get(sessionId: SessionId): ProcessHandle | null {
    return this.handles.get(sessionId) ?? null;
  }

  has(sessionId: SessionId): boolean {
    return this.handles.has(sessionId);
  }

  /**
   * Removes and returns the session's handle.
   */
  release(sessionId: SessionId): ProcessHandle | null {
    const handle = this.get(sessionId);
    this.handles.delete(sessionId);
    return handle;
  }

  sessions(): SessionId[] {
    return Array.from(this.handles.keys());
  }
}
