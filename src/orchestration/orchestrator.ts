/**
 * Turn orchestrator.
 *
 * Drives the backup, advance, backup, notify protocol for each session under
 * its exclusivity lock, and is the only component that controls game
 * processes. Every step persists its phase on the turn record before moving
 * on, so an advance interrupted by a crash resumes from the step it stopped
 * at instead of starting over.
 */

import {
  BackupFailureError,
  ConcurrentAdvanceInProgressError,
  HostError,
  InvalidArgumentError,
  NoUnresolvedTurnError,
  ProcessStartError,
  ProcessUnresponsiveError,
  SessionFailedError,
  SessionNotRunningError,
  TurnNotFoundError,
} from '../errors';
import type { HostRepository } from '../db/repository';
import type { ExtensionLedger } from '../ledger/extension-ledger';
import { isRunningLifecycle } from '../lifecycle/state-machine';
import type { SessionStateMachine } from '../lifecycle/state-machine';
import type { Session, SessionId } from '../lifecycle/types';
import type { ProcessRegistry } from '../process/registry';
import type { ProcessHandle, ProcessHandleFactory, StatusProbe } from '../process/types';
import type { BackupStore } from '../store/backup-store';
import type { BackupPhase, BackupSnapshot } from '../store/types';
import type { TimerScheduler } from '../timer/scheduler';
import { TimerState, deadlineOf } from '../timer/timer-state';
import type { HostEventEmitter } from './events';
import type { SessionLock } from './lock';
import { TimeoutError, backoffDelay, sleep, withAbortTimeout, withTimeout } from './retry';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  OrchestratorConfig,
  TurnAdvanceResult,
  TurnRecord,
  TurnTrigger,
} from './types';

/**
 * Collaborators of the orchestrator.
 */
export interface OrchestratorDeps {
  repo: HostRepository;
  lifecycle: SessionStateMachine;
  scheduler: TimerScheduler;
  ledger: ExtensionLedger;
  store: BackupStore;
  lock: SessionLock;
  processes: ProcessRegistry;
  processFactory: ProcessHandleFactory;
  events: HostEventEmitter;
  now?: () => number;
}

/**
 * Outcome of a rollback.
 */
export interface RollbackResult {
  sessionId: SessionId;
  toTurnNumber: number;
  snapshot: BackupSnapshot;
  discardedTurns: number[];
  timer: TimerState;
}

/**
 * What one look at the process revealed.
 */
interface Observation {
  alive: boolean;
  advanced: boolean;
  engineTurn: number | null;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class TurnOrchestrator {
  private deps: OrchestratorDeps;
  private config: OrchestratorConfig;
  private now: () => number;

  constructor(deps: OrchestratorDeps, config: Partial<OrchestratorConfig> = {}) {
    this.deps = deps;
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };
    this.now = deps.now ?? Date.now;
  }

  getConfig(): OrchestratorConfig {
    return { ...this.config };
  }

  // ===========================================================================
  // Turn advance
  // ===========================================================================

  /**
   * Single entry point for deadline, turn-completed, force, resume and
   * recovery triggers. Refuses instead of queueing when the session is busy.
   */
  async advance(sessionId: SessionId, trigger: TurnTrigger): Promise<TurnAdvanceResult> {
    return this.deps.lock.tryRun(sessionId, async () => {
      const { session, handle } = this.requireRunning(sessionId);
      let record = this.deps.repo.getUnresolvedTurnRecord(sessionId);

      if (record) {
        if (record.failed) {
          // Only an operator re-enters a failed turn
          if (trigger.kind !== 'force' && trigger.kind !== 'resume') {
            throw new SessionFailedError(sessionId, record.turnNumber, record.failure ?? 'unknown failure');
          }
          record = this.save({ ...record, failed: false, failure: null });
        } else if (this.isAwaitingPostHook(record) && trigger.kind !== 'resume') {
          throw new ConcurrentAdvanceInProgressError(sessionId);
        }
      } else {
        if (trigger.kind === 'resume') {
          throw new NoUnresolvedTurnError(sessionId);
        }
        record = await this.openRecord(session, trigger, trigger.kind === 'turn-completed');
      }

      return this.drive(session, handle, record, trigger);
    });
  }

  /**
   * Called by the process wrapper before it advances a turn. Takes the pre
   * backup and leaves the record waiting for the post hook.
   */
  async preAdvanceHook(sessionId: SessionId): Promise<TurnRecord> {
    return this.deps.lock.tryRun(sessionId, async () => {
      const { session } = this.requireRunning(sessionId);
      const unresolved = this.deps.repo.getUnresolvedTurnRecord(sessionId);

      if (unresolved) {
        if (unresolved.failed) {
          throw new SessionFailedError(sessionId, unresolved.turnNumber, unresolved.failure ?? 'unknown failure');
        }
        // A repeated pre hook for the same turn gets the pending record back
        if (this.isAwaitingPostHook(unresolved)) return unresolved;
        throw new ConcurrentAdvanceInProgressError(sessionId);
      }

      const record = await this.openRecord(session, { kind: 'hook' }, false);
      return this.takePreBackup(session, record, { kind: 'hook' });
    });
  }

  /**
   * Called by the process wrapper after it advanced a turn. Completes the
   * pending hook record, or records the turn from scratch when no pre hook
   * was seen. Without a pending record the engine must show a turn newer
   * than the last recorded one; otherwise the latest turn is returned as is.
   */
  async postAdvanceHook(sessionId: SessionId): Promise<TurnAdvanceResult> {
    return this.deps.lock.tryRun(sessionId, async () => {
      const { session, handle } = this.requireRunning(sessionId);
      let record = this.deps.repo.getUnresolvedTurnRecord(sessionId);

      if (record) {
        if (record.failed) {
          throw new SessionFailedError(sessionId, record.turnNumber, record.failure ?? 'unknown failure');
        }
        if (record.trigger !== 'hook') {
          throw new ConcurrentAdvanceInProgressError(sessionId);
        }
      } else {
        const latest = this.deps.repo.getLatestTurnRecord(sessionId);
        if (latest && latest.engineTurn !== null) {
          const probe = await this.probe(sessionId);
          if (!probe || probe.engineTurn <= latest.engineTurn) {
            console.warn(
              `[TurnOrchestrator] Post hook for ${sessionId} shows no turn after engine turn ${latest.engineTurn}, ` +
              `keeping turn ${latest.turnNumber}`
            );
            return this.resultOf(session, latest, this.deps.scheduler.getTimer(sessionId), probe);
          }
        }
        record = await this.openRecord(session, { kind: 'hook' }, true);
      }

      return this.drive(session, handle, record, { kind: 'hook' });
    });
  }

  private isAwaitingPostHook(record: TurnRecord): boolean {
    return record.trigger === 'hook' && record.phase === 'ADVANCING' && !record.failed;
  }

  /**
   * Engine turn of the last recorded turn. Before any record it is the turn
   * before `firstEngineTurn`; null when the records never learned one.
   */
  private lastRecordedEngineTurn(sessionId: SessionId): number | null {
    const latest = this.deps.repo.getLatestTurnRecord(sessionId);
    if (!latest) return this.config.firstEngineTurn - 1;
    return latest.engineTurn ?? latest.baselineEngineTurn;
  }

  /**
   * Whether the engine reports a turn that no record accounts for yet.
   */
  isUnrecordedTurn(sessionId: SessionId, engineTurn: number): boolean {
    const recorded = this.lastRecordedEngineTurn(sessionId);
    return recorded !== null && engineTurn > recorded;
  }

  /**
   * Creates the next turn record. The engine turn baseline comes from the
   * last recorded turn when the advance already happened. Otherwise it is the
   * probed turn, capped at the last recorded one: a turn the engine processed
   * on its own becomes this record's turn and is not signalled again.
   */
  private async openRecord(session: Session, trigger: TurnTrigger, alreadyAdvanced: boolean): Promise<TurnRecord> {
    const latest = this.deps.repo.getLatestTurnRecord(session.id);
    let baselineEngineTurn: number | null;
    if (alreadyAdvanced) {
      baselineEngineTurn = latest?.engineTurn ?? null;
    } else {
      const probed = (await this.probe(session.id))?.engineTurn ?? null;
      const recorded = this.lastRecordedEngineTurn(session.id);
      baselineEngineTurn = probed !== null && recorded !== null ? Math.min(probed, recorded) : probed;
    }

    const record: TurnRecord = {
      sessionId: session.id,
      turnNumber: (latest?.turnNumber ?? 0) + 1,
      phase: 'PRE_BACKUP_IN_FLIGHT',
      trigger: trigger.kind,
      failed: false,
      failure: null,
      baselineEngineTurn,
      engineTurn: null,
      preBackupRef: null,
      postBackupRef: null,
      startedAt: this.now(),
      completedAt: null,
    };
    this.deps.repo.insertTurnRecord(record);
    return record;
  }

  /**
   * Runs the remaining steps of a record from its persisted phase.
   */
  private async drive(
    session: Session,
    handle: ProcessHandle,
    initial: TurnRecord,
    trigger: TurnTrigger
  ): Promise<TurnAdvanceResult> {
    let record = initial;

    if (record.phase === 'IDLE' || record.phase === 'PRE_BACKUP_IN_FLIGHT') {
      record = await this.takePreBackup(session, record, trigger);
    }
    if (record.phase === 'ADVANCING') {
      const engineTurn = await this.confirmAdvance(session, handle, record, trigger);
      record = this.save({ ...record, engineTurn, phase: 'POST_BACKUP_IN_FLIGHT' });
    }
    if (record.phase === 'POST_BACKUP_IN_FLIGHT') {
      const snapshot = await this.backup(session, record, 'post', trigger);
      record = this.save({ ...record, postBackupRef: snapshot.id, completedAt: this.now(), phase: 'NOTIFYING' });
    }
    return this.complete(session, record, trigger);
  }

  private async takePreBackup(session: Session, record: TurnRecord, trigger: TurnTrigger): Promise<TurnRecord> {
    const snapshot = await this.backup(session, record, 'pre', trigger);
    return this.save({ ...record, preBackupRef: snapshot.id, phase: 'ADVANCING' });
  }

  /**
   * Writes a snapshot within the backup timeout. Any failure marks the record
   * failed and is rethrown as a BackupFailureError.
   */
  private async backup(
    session: Session,
    record: TurnRecord,
    phase: BackupPhase,
    trigger: TurnTrigger
  ): Promise<BackupSnapshot> {
    try {
      return await withAbortTimeout(
        (signal) => this.deps.store.writeSnapshot(session.id, record.turnNumber, phase, session.workingDir, signal),
        this.config.backupTimeoutMs,
        `${phase} backup`
      );
    } catch (err) {
      const error =
        err instanceof BackupFailureError
          ? err
          : new BackupFailureError(session.id, record.turnNumber, phase, describe(err));
      this.markFailed(record, error, trigger, phase);
      throw error;
    }
  }

  /**
   * Establishes the engine turn the advance produced.
   */
  private async confirmAdvance(
    session: Session,
    handle: ProcessHandle,
    record: TurnRecord,
    trigger: TurnTrigger
  ): Promise<number | null> {
    if (trigger.kind === 'turn-completed') {
      return trigger.engineTurn;
    }
    if (trigger.kind === 'hook') {
      // The wrapper's call is the confirmation; the probe only names the turn
      const probe = await this.probe(session.id);
      const baseline = record.baselineEngineTurn;
      if (baseline === null) return probe?.engineTurn ?? null;
      return Math.max(baseline + 1, probe?.engineTurn ?? 0);
    }
    return this.signalAndConfirm(session, handle, record, trigger);
  }

  /**
   * Signals the engine and waits for a newer turn, with bounded retries.
   */
  private async signalAndConfirm(
    session: Session,
    handle: ProcessHandle,
    record: TurnRecord,
    trigger: TurnTrigger
  ): Promise<number | null> {
    const { maxAdvanceAttempts, retryBaseDelayMs, signalTimeoutMs, confirmTimeoutMs } = this.config;
    const baseline = record.baselineEngineTurn;
    let reason = 'engine did not report a new turn';
    let attempts = 0;

    for (let attempt = 0; attempt < maxAdvanceAttempts; attempt++) {
      if (attempt > 0) {
        const delay = backoffDelay(retryBaseDelayMs, attempt - 1);
        console.warn(
          `[TurnOrchestrator] Advance retry ${attempt}/${maxAdvanceAttempts - 1} for ${session.id}, waiting ${delay}ms...`
        );
        await sleep(delay);
      }

      // A previous attempt (or a run before a restart) may already have gone through
      const before = await this.observe(handle, baseline);
      if (before.advanced) return before.engineTurn;
      if (!before.alive) {
        reason = `process not running: ${await this.safeDescribeFailure(handle)}`;
        break;
      }

      attempts++;
      try {
        await withTimeout(() => handle.signalAdvance(), signalTimeoutMs, 'advance signal');
      } catch (err) {
        reason = `signal failed: ${describe(err)}`;
        continue;
      }

      const after = await this.waitForAdvance(handle, baseline);
      if (after.advanced) return after.engineTurn;
      if (!after.alive) {
        reason = `process died: ${await this.safeDescribeFailure(handle)}`;
        break;
      }
      reason = `no new turn within ${confirmTimeoutMs}ms`;
    }

    const error = new ProcessUnresponsiveError(session.id, attempts, reason);
    this.markFailed(record, error, trigger, null);
    this.deps.events.emit({
      type: 'TURN_STALLED',
      sessionId: session.id,
      turnNumber: record.turnNumber,
      attempts,
      reason,
    });
    throw error;
  }

  /**
   * Polls liveness and status until the engine reports a newer turn, the
   * process dies, or the confirmation window closes.
   */
  private async waitForAdvance(handle: ProcessHandle, baseline: number | null): Promise<Observation> {
    const { confirmTimeoutMs, confirmPollIntervalMs } = this.config;
    const polls = Math.max(1, Math.ceil(confirmTimeoutMs / Math.max(1, confirmPollIntervalMs)));
    let last: Observation = { alive: true, advanced: false, engineTurn: null };

    for (let i = 0; i < polls; i++) {
      await sleep(Math.min(confirmPollIntervalMs, confirmTimeoutMs));
      last = await this.observe(handle, baseline);
      if (last.advanced || !last.alive) return last;
    }
    return last;
  }

  private async observe(handle: ProcessHandle, baseline: number | null): Promise<Observation> {
    const alive = await handle.isAlive();
    const probe = await this.probeHandle(handle);
    if (!probe) {
      return { alive, advanced: false, engineTurn: null };
    }
    const advanced = baseline === null || probe.engineTurn > baseline;
    return { alive, advanced, engineTurn: probe.engineTurn };
  }

  /**
   * Final step: clock and bank resets, lifecycle promotion and the record's
   * completion commit together, then listeners are notified.
   */
  private async complete(session: Session, record: TurnRecord, trigger: TurnTrigger): Promise<TurnAdvanceResult> {
    const probe = await this.probe(session.id);
    const durationMs = trigger.kind === 'force' ? trigger.nextTurnDurationMs : undefined;

    const { timer, completed } = this.deps.repo.transaction(() => {
      let current = this.deps.lifecycle.get(session.id);
      if (current.lifecycle === 'LAUNCHED') {
        current = this.deps.lifecycle.transition(session.id, 'startPlay');
      }
      this.deps.ledger.resetTurn(session.id, current.perTurnBankBonusMs);
      const timer = this.deps.scheduler.reset(session.id, durationMs);
      const completed: TurnRecord = {
        ...record,
        phase: 'COMPLETED',
        completedAt: record.completedAt ?? this.now(),
      };
      this.deps.repo.updateTurnRecord(completed);
      return { timer, completed };
    });

    const result = this.resultOf(session, completed, timer, probe);

    this.deps.events.emit({
      type: 'TURN_ADVANCED',
      sessionId: session.id,
      turnNumber: result.turnNumber,
      engineTurn: result.engineTurn,
      trigger: trigger.kind,
      deadline: result.deadline === null ? null : new Date(result.deadline),
      remainingMs: result.remainingMs,
      outstandingPlayers: result.outstandingPlayers,
      missedPlayers: result.missedPlayers,
    });

    return result;
  }

  private resultOf(
    session: Session,
    record: TurnRecord,
    timer: TimerState,
    probe: StatusProbe | null
  ): TurnAdvanceResult {
    return {
      sessionId: session.id,
      turnNumber: record.turnNumber,
      engineTurn: record.engineTurn,
      remainingMs: timer.remainingMs,
      deadline: deadlineOf(timer),
      outstandingPlayers: probe?.outstandingPlayers ?? [],
      missedPlayers: probe?.missedPlayers ?? [],
    };
  }

  private markFailed(record: TurnRecord, error: HostError, trigger: TurnTrigger, backupPhase: BackupPhase | null): void {
    const current = this.deps.repo.getTurnRecord(record.sessionId, record.turnNumber) ?? record;
    this.save({ ...current, failed: true, failure: error.message });
    console.error(`[TurnOrchestrator] Turn ${record.turnNumber} of ${record.sessionId} failed: ${error.message}`);
    this.deps.events.emit({
      type: 'ADVANCE_FAILED',
      sessionId: record.sessionId,
      turnNumber: record.turnNumber,
      phase: current.phase,
      trigger: trigger.kind,
      code: error.code,
      reason: error.message,
      backupPhase,
    });
  }

  private save(record: TurnRecord): TurnRecord {
    this.deps.repo.updateTurnRecord(record);
    return record;
  }

  // ===========================================================================
  // Recovery
  // ===========================================================================

  /**
   * Restores the session to the state recorded for `toTurnNumber` and
   * truncates later history. Turn 0 is the pre-game state.
   */
  async rollback(sessionId: SessionId, toTurnNumber: number): Promise<RollbackResult> {
    if (!Number.isInteger(toTurnNumber) || toTurnNumber < 0) {
      throw new InvalidArgumentError('Turn number must be a non-negative integer', { sessionId });
    }

    return this.deps.lock.tryRun(sessionId, async () => {
      const session = this.deps.lifecycle.get(sessionId);
      if (!isRunningLifecycle(session.lifecycle)) {
        throw new SessionNotRunningError(sessionId, session.lifecycle);
      }
      const unresolved = this.deps.repo.getUnresolvedTurnRecord(sessionId);
      if (unresolved && !unresolved.failed) {
        throw new ConcurrentAdvanceInProgressError(sessionId);
      }

      const { snapshot, keepThrough } = this.resolveRollbackTarget(sessionId, toTurnNumber);

      if (!(await this.deps.store.verify(snapshot))) {
        throw new BackupFailureError(sessionId, snapshot.turnNumber, snapshot.phase, `checksum mismatch for snapshot ${snapshot.id}`);
      }

      const handle = this.deps.processes.get(sessionId);
      const wasAlive = handle ? await handle.isAlive() : false;
      if (handle && wasAlive) {
        await handle.stop();
      }

      try {
        await withAbortTimeout(
          (signal) => this.deps.store.restoreSnapshot(snapshot, session.workingDir, signal),
          this.config.backupTimeoutMs,
          'restore'
        );
      } catch (err) {
        if (err instanceof TimeoutError) {
          throw new BackupFailureError(sessionId, snapshot.turnNumber, snapshot.phase, err.message);
        }
        throw err;
      }

      const { discardedTurns, timer } = this.deps.repo.transaction(() => {
        const discardedTurns = this.deps.repo.deleteTurnRecordsAfter(sessionId, keepThrough);
        this.deps.ledger.resetTurn(sessionId, 0);
        const timer = this.deps.scheduler.reset(sessionId);
        return { discardedTurns, timer };
      });

      console.warn(
        `[TurnOrchestrator] DESTRUCTIVE rollback of ${sessionId} to turn ${toTurnNumber} ` +
        `from ${snapshot.phase} snapshot ${snapshot.id}, discarded turns [${discardedTurns.join(', ')}]`
      );
      this.deps.events.emit({
        type: 'ROLLED_BACK',
        sessionId,
        toTurnNumber,
        snapshotId: snapshot.id,
        snapshotPhase: snapshot.phase,
        discardedTurns,
      });

      if (handle && wasAlive) {
        await this.startHandle(this.deps.lifecycle.get(sessionId), handle);
      }

      return { sessionId, toTurnNumber, snapshot, discardedTurns, timer };
    });
  }

  /**
   * Picks the snapshot for a rollback and the last record that survives it.
   */
  private resolveRollbackTarget(
    sessionId: SessionId,
    toTurnNumber: number
  ): { snapshot: BackupSnapshot; keepThrough: number } {
    const store = this.deps.store;

    if (toTurnNumber === 0) {
      const first = this.deps.repo.getTurnRecord(sessionId, 1);
      const snapshot = first?.preBackupRef ? store.get(first.preBackupRef) : null;
      if (!snapshot) throw new TurnNotFoundError(sessionId, 0);
      return { snapshot, keepThrough: 0 };
    }

    const record = this.deps.repo.getTurnRecord(sessionId, toTurnNumber);
    if (!record) throw new TurnNotFoundError(sessionId, toTurnNumber);

    if (record.postBackupRef) {
      const snapshot = store.get(record.postBackupRef);
      if (snapshot) return { snapshot, keepThrough: toTurnNumber };
    }
    if (record.preBackupRef) {
      // The turn never completed: restoring its pre state discards the record too
      const snapshot = store.get(record.preBackupRef);
      if (snapshot) return { snapshot, keepThrough: toTurnNumber - 1 };
    }
    throw new TurnNotFoundError(sessionId, toTurnNumber);
  }

  /**
   * Drops a failed turn record so automatic advances can proceed. Its
   * snapshots stay in the store.
   */
  async discardFailedTurn(sessionId: SessionId): Promise<number> {
    return this.deps.lock.tryRun(sessionId, () => {
      this.deps.lifecycle.get(sessionId);
      const unresolved = this.deps.repo.getUnresolvedTurnRecord(sessionId);
      if (!unresolved) {
        throw new NoUnresolvedTurnError(sessionId);
      }
      if (!unresolved.failed) {
        throw new ConcurrentAdvanceInProgressError(sessionId);
      }
      this.deps.repo.deleteTurnRecordsAfter(sessionId, unresolved.turnNumber - 1);
      console.warn(`[TurnOrchestrator] Discarded failed turn ${unresolved.turnNumber} of ${sessionId}`);
      this.deps.events.emit({ type: 'TURN_DISCARDED', sessionId, turnNumber: unresolved.turnNumber });
      return unresolved.turnNumber;
    });
  }

  /**
   * Sessions with an in-flight record that is not waiting on a hook or an
   * operator. Found at startup after an engine crash.
   */
  interruptedSessions(): SessionId[] {
    return this.deps.repo
      .listSessions(['LAUNCHED', 'STARTED'])
      .filter((session) => {
        const record = this.deps.repo.getUnresolvedTurnRecord(session.id);
        return record !== null && !record.failed && !this.isAwaitingPostHook(record);
      })
      .map((session) => session.id);
  }

  // ===========================================================================
  // Process control. Callers of start/stop hold the session lock.
  // ===========================================================================

  /**
   * Registers a handle for a session that has a live process from before an
   * engine restart.
   */
  adopt(session: Session): ProcessHandle {
    const existing = this.deps.processes.get(session.id);
    if (existing) return existing;
    const handle = this.deps.processFactory(session);
    this.deps.processes.register(session.id, handle);
    return handle;
  }

  /**
   * Starts (or restarts) the session's game process.
   */
  async startProcess(session: Session): Promise<Session> {
    const handle = this.adopt(session);
    return this.startHandle(session, handle);
  }

  private async startHandle(session: Session, handle: ProcessHandle): Promise<Session> {
    try {
      await handle.start();
    } catch (err) {
      throw new ProcessStartError(session.id, `${describe(err)} (${await this.safeDescribeFailure(handle)})`);
    }
    if (!(await handle.isAlive())) {
      throw new ProcessStartError(session.id, await this.safeDescribeFailure(handle));
    }

    const updated: Session = { ...this.deps.lifecycle.get(session.id), processPid: handle.pid };
    this.deps.repo.updateSession(updated);
    this.deps.events.emit({ type: 'PROCESS_STARTED', sessionId: session.id, pid: handle.pid });
    return updated;
  }

  /**
   * Stops the session's game process and gives up its handle.
   */
  async stopProcess(sessionId: SessionId): Promise<void> {
    const handle = this.deps.processes.release(sessionId);
    if (handle) {
      await handle.stop();
    }
    const session = this.deps.repo.getSession(sessionId);
    if (session && session.processPid !== null) {
      this.deps.repo.updateSession({ ...session, processPid: null });
    }
  }

  /**
   * Handles a process found dead: pauses the clock and reports why.
   * Caller holds the session lock.
   */
  async reportProcessDeath(sessionId: SessionId): Promise<string> {
    const handle = this.deps.processes.get(sessionId);
    const reason = handle ? await this.safeDescribeFailure(handle) : 'no process handle';
    const timer = this.deps.repo.getTimer(sessionId);
    if (timer?.running) {
      this.deps.scheduler.pause(sessionId);
    }
    this.deps.events.emit({ type: 'PROCESS_DIED', sessionId, pid: handle?.pid ?? null, reason });
    return reason;
  }

  hasProcess(sessionId: SessionId): boolean {
    return this.deps.processes.has(sessionId);
  }

  async isAlive(sessionId: SessionId): Promise<boolean> {
    const handle = this.deps.processes.get(sessionId);
    return handle ? handle.isAlive() : false;
  }

  /**
   * Current status of the session's engine, or null when unavailable.
   */
  async probe(sessionId: SessionId): Promise<StatusProbe | null> {
    const handle = this.deps.processes.get(sessionId);
    return handle ? this.probeHandle(handle) : null;
  }

  /**
   * Whether the session has a hook record waiting for its post hook.
   */
  hasPendingHook(sessionId: SessionId): boolean {
    const record = this.deps.repo.getUnresolvedTurnRecord(sessionId);
    return record !== null && this.isAwaitingPostHook(record);
  }

  private async probeHandle(handle: ProcessHandle): Promise<StatusProbe | null> {
    try {
      return await handle.probeStatus();
    } catch (err) {
      console.warn('[TurnOrchestrator] Status probe failed:', describe(err));
      return null;
    }
  }

  private async safeDescribeFailure(handle: ProcessHandle): Promise<string> {
    try {
      return await handle.describeFailure();
    } catch (err) {
      return `could not read failure details: ${describe(err)}`;
    }
  }

  private requireRunning(sessionId: SessionId): { session: Session; handle: ProcessHandle } {
    const session = this.deps.lifecycle.get(sessionId);
    if (!isRunningLifecycle(session.lifecycle)) {
      throw new SessionNotRunningError(sessionId, session.lifecycle);
    }
    const handle = this.deps.processes.get(sessionId);
    if (!handle) {
      throw new SessionNotRunningError(sessionId, session.lifecycle);
    }
    return { session, handle };
  }
}

