/**
 * Timer scheduler.
 *
 * One tick loop drives every session's countdown. Sessions whose lock is
 * held are skipped for that tick and picked up on the next one; their
 * `lastTick` is left alone so the skipped time is charged later rather than
 * lost. Deadline handlers are fired without being awaited so a slow advance
 * never delays other sessions.
 */

import { InvalidArgumentError, SessionNotFoundError } from '../errors';
import type { HostRepository } from '../db/repository';
import type { SessionId } from '../lifecycle/types';
import type { SessionLock } from '../orchestration/lock';
import {
  TimerState,
  chargeElapsed,
  createTimer,
  extendTimer,
  pauseTimer,
  reconstructTimer,
  resetTimer,
  resumeTimer,
  setRemaining,
  tickTimer,
} from './timer-state';

/**
 * Configuration for the timer scheduler.
 */
export interface TimerSchedulerConfig {
  /** Tick interval in milliseconds */
  tickIntervalMs: number;
  /** Remaining time at which the low-time warning fires (0 = never) */
  warningThresholdMs: number;
}

export const DEFAULT_SCHEDULER_CONFIG: TimerSchedulerConfig = {
  tickIntervalMs: 1000,
  warningThresholdMs: 60 * 60 * 1000,   // 1 hour
};

/**
 * Handlers invoked for timer edges.
 */
export interface TimerHandlers {
  onDeadline(sessionId: SessionId): Promise<void>;
  onWarning?(sessionId: SessionId, remainingMs: number): Promise<void>;
}

/**
 * Outcome of a single tick, for observability and tests.
 */
export interface TickSummary {
  ticked: SessionId[];
  skipped: SessionId[];
  deadlines: SessionId[];
  warnings: SessionId[];
}

export class TimerScheduler {
  private repo: HostRepository;
  private lock: SessionLock;
  private handlers: TimerHandlers;
  private config: TimerSchedulerConfig;
  private now: () => number;

  private tickTimer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private pending: Set<Promise<void>> = new Set();

  constructor(
    repo: HostRepository,
    lock: SessionLock,
    handlers: TimerHandlers,
    config: Partial<TimerSchedulerConfig> = {},
    now: () => number = Date.now
  ) {
    this.repo = repo;
    this.lock = lock;
    this.handlers = handlers;
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.now = now;
  }

  /**
   * Starts the tick loop.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.scheduleNext(this.config.tickIntervalMs);
  }

  /**
   * Stops the tick loop and waits for in-flight deadline handlers.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.tickTimer) {
      clearTimeout(this.tickTimer);
      this.tickTimer = null;
    }
    await Promise.allSettled(this.pending);
  }

  isRunning(): boolean {
    return this.running;
  }

  private scheduleNext(delayMs: number): void {
    this.tickTimer = setTimeout(() => {
      const started = this.now();
      try {
        this.tickOnce();
      } catch (err) {
        console.error('[TimerScheduler] Tick failed:', err);
      }
      if (!this.running) return;
      // Sleep for the remainder of the interval to avoid drift
      const elapsed = this.now() - started;
      this.scheduleNext(Math.max(0, this.config.tickIntervalMs - elapsed));
    }, delayMs);
  }

  /**
   * Runs one tick over all running timers.
   */
  tickOnce(): TickSummary {
    const summary: TickSummary = { ticked: [], skipped: [], deadlines: [], warnings: [] };
    const now = this.now();

    for (const timer of this.repo.listRunningTimers()) {
      if (this.lock.isLocked(timer.sessionId)) {
        summary.skipped.push(timer.sessionId);
        continue;
      }

      const result = tickTimer(timer, now, this.config.warningThresholdMs);
      this.repo.saveTimer(result.state);
      summary.ticked.push(timer.sessionId);

      if (result.warningCrossed) {
        summary.warnings.push(timer.sessionId);
        const onWarning = this.handlers.onWarning;
        if (onWarning) {
          this.track(onWarning.call(this.handlers, timer.sessionId, result.state.remainingMs), timer.sessionId);
        }
      }

      if (result.deadlineCrossed) {
        summary.deadlines.push(timer.sessionId);
        this.track(this.handlers.onDeadline(timer.sessionId), timer.sessionId);
      }
    }

    return summary;
  }

  private track(promise: Promise<void>, sessionId: SessionId): void {
    const tracked = promise.catch((err: unknown) => {
      console.error(`[TimerScheduler] Handler failed for session ${sessionId}:`, err);
    });
    this.pending.add(tracked);
    void tracked.finally(() => this.pending.delete(tracked));
  }

  /**
   * Waits for all handlers fired so far.
   */
  async flush(): Promise<void> {
    await Promise.allSettled(this.pending);
  }

  // ---------------------------------------------------------------------------
  // Timer operations. Callers hold the session lock.
  // ---------------------------------------------------------------------------

  getTimer(sessionId: SessionId): TimerState {
    const timer = this.repo.getTimer(sessionId);
    if (!timer) {
      throw new SessionNotFoundError(sessionId);
    }
    return timer;
  }

  /**
   * Creates the timer for a new session, paused at the session default.
   */
  initTimer(sessionId: SessionId, durationMs: number): TimerState {
    const timer = createTimer(sessionId, durationMs, this.now(), false);
    this.repo.saveTimer(timer);
    return timer;
  }

  pause(sessionId: SessionId): TimerState {
    return this.save(pauseTimer(this.getTimer(sessionId), this.now()));
  }

  resume(sessionId: SessionId): TimerState {
    return this.save(resumeTimer(this.getTimer(sessionId), this.now()));
  }

  /**
   * Applies a signed delta to the remaining time, clamping at zero.
   */
  extend(sessionId: SessionId, deltaMs: number): TimerState {
    if (!Number.isFinite(deltaMs)) {
      throw new InvalidArgumentError('Extension delta must be a finite number', { sessionId });
    }
    // Charge elapsed time first so the delta applies to the current value
    const current = chargeElapsed(this.getTimer(sessionId), this.now());
    return this.save(extendTimer(current, deltaMs));
  }

  setRemaining(sessionId: SessionId, remainingMs: number): TimerState {
    if (!Number.isFinite(remainingMs) || remainingMs < 0) {
      throw new InvalidArgumentError('Remaining time must be a non-negative number', { sessionId });
    }
    const current = this.getTimer(sessionId);
    return this.save(setRemaining({ ...current, lastTick: this.now() }, remainingMs));
  }

  /**
   * Changes the session's default turn duration. The running turn keeps its
   * remaining time; the new default applies from the next turn.
   */
  setDefault(sessionId: SessionId, durationMs: number): number {
    if (!Number.isFinite(durationMs) || durationMs <= 0) {
      throw new InvalidArgumentError('Default turn duration must be positive', { sessionId });
    }
    const session = this.repo.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    this.repo.updateSession({ ...session, defaultTurnDurationMs: durationMs });
    return durationMs;
  }

  /**
   * Starts a new turn at the given duration (or the session default).
   */
  reset(sessionId: SessionId, durationMs?: number): TimerState {
    const session = this.repo.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    const duration = durationMs ?? session.defaultTurnDurationMs;
    return this.save(resetTimer(this.getTimer(sessionId), duration, this.now()));
  }

  /**
   * Restart recovery: charges downtime to timers that were running.
   */
  reconstructAll(): TimerState[] {
    const now = this.now();
    return this.repo.listTimers().map((timer) => this.save(reconstructTimer(timer, now)));
  }

  private save(timer: TimerState): TimerState {
    this.repo.saveTimer(timer);
    return timer;
  }
}
