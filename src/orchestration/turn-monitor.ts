/**
 * Turn monitor.
 *
 * Watches running sessions for turns the engine processed on its own (all
 * players submitted, or the engine's internal clock ran out) and for game
 * processes that died. It never touches a process handle itself; liveness
 * and status come through the orchestrator.
 */

import { ConcurrentAdvanceInProgressError, isHostError } from '../errors';
import type { HostRepository } from '../db/repository';
import type { SessionId } from '../lifecycle/types';
import type { SessionLock } from './lock';
import type { TurnOrchestrator } from './orchestrator';

/**
 * Configuration for the turn monitor.
 */
export interface TurnMonitorConfig {
  /** Poll interval in milliseconds */
  monitorIntervalMs: number;
}

export const DEFAULT_MONITOR_CONFIG: TurnMonitorConfig = {
  monitorIntervalMs: 5000,
};

/**
 * What one poll did for one session.
 */
export type MonitorOutcome =
  | 'no-process'   // Nothing to watch
  | 'busy'         // Lock held or a hook is in flight
  | 'idle'         // Alive, nothing new
  | 'advanced'     // Raised a turn-completed event
  | 'died'         // Death just detected and reported
  | 'dead'         // Still dead, already reported
  | 'error';       // The raised advance failed

export interface TurnMonitorDeps {
  repo: HostRepository;
  lock: SessionLock;
  orchestrator: TurnOrchestrator;
}

export class TurnMonitor {
  private deps: TurnMonitorDeps;
  private config: TurnMonitorConfig;

  private pollTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private polling: Promise<void> | null = null;
  private reportedDead: Set<SessionId> = new Set();

  constructor(deps: TurnMonitorDeps, config: Partial<TurnMonitorConfig> = {}) {
    this.deps = deps;
    this.config = { ...DEFAULT_MONITOR_CONFIG, ...config };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.scheduleNext();
  }

  /**
   * Stops polling and waits for a poll in progress.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.polling) {
      await this.polling;
    }
  }

  private scheduleNext(): void {
    this.pollTimer = setTimeout(() => {
      this.polling = this.pollOnce()
        .then(() => undefined)
        .catch((err: unknown) => {
          console.error('[TurnMonitor] Poll failed:', err);
        })
        .finally(() => {
          this.polling = null;
          if (this.running) this.scheduleNext();
        });
    }, this.config.monitorIntervalMs);
  }

  /**
   * Checks every launched or started session once.
   */
  async pollOnce(): Promise<Map<SessionId, MonitorOutcome>> {
    const outcomes = new Map<SessionId, MonitorOutcome>();
    for (const session of this.deps.repo.listSessions(['LAUNCHED', 'STARTED'])) {
      outcomes.set(session.id, await this.checkSession(session.id));
    }
    return outcomes;
  }

  async checkSession(sessionId: SessionId): Promise<MonitorOutcome> {
    const { orchestrator, lock, repo } = this.deps;

    if (!orchestrator.hasProcess(sessionId)) return 'no-process';
    if (lock.isLocked(sessionId) || orchestrator.hasPendingHook(sessionId)) return 'busy';

    if (!(await orchestrator.isAlive(sessionId))) {
      if (this.reportedDead.has(sessionId)) return 'dead';
      try {
        const reason = await lock.tryRun(sessionId, () => orchestrator.reportProcessDeath(sessionId));
        console.error(`[TurnMonitor] Game process for ${sessionId} is not running: ${reason}`);
        this.reportedDead.add(sessionId);
        return 'died';
      } catch (err) {
        if (err instanceof ConcurrentAdvanceInProgressError) return 'busy';
        throw err;
      }
    }
    this.reportedDead.delete(sessionId);

    // Failed or interrupted turns are for the operator or restart recovery
    if (repo.getUnresolvedTurnRecord(sessionId)) return 'idle';

    const probe = await orchestrator.probe(sessionId);
    if (!probe) return 'idle';

    if (!orchestrator.isUnrecordedTurn(sessionId, probe.engineTurn)) return 'idle';

    try {
      await orchestrator.advance(sessionId, { kind: 'turn-completed', engineTurn: probe.engineTurn });
      return 'advanced';
    } catch (err) {
      if (err instanceof ConcurrentAdvanceInProgressError) return 'busy';
      const message = isHostError(err) ? `${err.code}: ${err.message}` : String(err);
      console.error(`[TurnMonitor] Recording engine turn ${probe.engineTurn} for ${sessionId} failed: ${message}`);
      return 'error';
    }
  }
}
