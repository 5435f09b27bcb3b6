/**
 * TurnHost - the public face of the turn orchestration engine.
 *
 * Wires the components together, serializes operator actions per session
 * and turns every outcome into an OperationResult the chat layer can
 * render. Nothing outside this class touches persistence or game processes.
 */

import type Database from 'better-sqlite3';
import {
  ConcurrentAdvanceInProgressError,
  HostErrorCode,
  OperationResult,
  SessionNotRunningError,
  okResult,
  toErrorInfo,
  toErrorResult,
} from '../errors';
import { migrate } from '../db/migrations';
import { HostRepository } from '../db/repository';
import { ExtensionLedger } from '../ledger/extension-ledger';
import type { ExtensionGrant, PlayerTimeBank, RegisterPlayerOptions } from '../ledger/types';
import { SessionStateMachine, isRunningLifecycle, toFlags } from '../lifecycle/state-machine';
import type { CreateSessionInput, Session, SessionFlags, SessionId } from '../lifecycle/types';
import { ProcessRegistry } from '../process/registry';
import type { ProcessHandleFactory } from '../process/types';
import { BackupStore } from '../store/backup-store';
import { TimerScheduler, TimerSchedulerConfig } from '../timer/scheduler';
import { TimerState, deadlineOf } from '../timer/timer-state';
import { HostEventEmitter } from './events';
import { SessionLock } from './lock';
import { RollbackResult, TurnOrchestrator } from './orchestrator';
import { TurnMonitor, TurnMonitorConfig } from './turn-monitor';
import type {
  HostEventCallback,
  OrchestratorConfig,
  OrchestratorPhase,
  TimerAction,
  TurnAdvanceResult,
  TurnRecord,
} from './types';

export interface TurnHostOptions {
  db: Database.Database;
  backupDir: string;
  processFactory: ProcessHandleFactory;
  excludedExtensions?: string[];
  /** Turn duration for sessions created without one */
  defaultTurnDurationMs?: number;
  scheduler?: Partial<TimerSchedulerConfig>;
  monitor?: Partial<TurnMonitorConfig>;
  orchestrator?: Partial<OrchestratorConfig>;
  now?: () => number;
}

/**
 * Everything the chat layer shows about one session.
 */
export interface SessionView {
  session: Session;
  flags: SessionFlags;
  timer: TimerState | null;
  deadline: number | null;
  banks: PlayerTimeBank[];
  turns: TurnRecord[];
  orchestratorPhase: OrchestratorPhase;
  processAlive: boolean;
}

/**
 * What restart recovery found and did.
 */
export interface RecoveryReport {
  reconstructedTimers: number;
  adoptedProcesses: SessionId[];
  resumedTurns: SessionId[];
  failedTurns: SessionId[];
}

export class TurnHost {
  readonly repo: HostRepository;
  readonly lock: SessionLock;
  readonly lifecycle: SessionStateMachine;
  readonly scheduler: TimerScheduler;
  readonly ledger: ExtensionLedger;
  readonly store: BackupStore;
  readonly orchestrator: TurnOrchestrator;
  readonly monitor: TurnMonitor;

  private events: HostEventEmitter;
  private defaultTurnDurationMs: number | undefined;
  private now: () => number;
  private started = false;

  constructor(options: TurnHostOptions) {
    this.now = options.now ?? Date.now;
    this.defaultTurnDurationMs = options.defaultTurnDurationMs;

    migrate(options.db);
    this.repo = new HostRepository(options.db);
    this.lock = new SessionLock();
    this.events = new HostEventEmitter(this.now);
    this.lifecycle = new SessionStateMachine(this.repo, this.now);
    this.scheduler = new TimerScheduler(
      this.repo,
      this.lock,
      {
        onDeadline: (sessionId) => this.handleDeadline(sessionId),
        onWarning: (sessionId, remainingMs) => this.handleWarning(sessionId, remainingMs),
      },
      options.scheduler,
      this.now
    );
    this.ledger = new ExtensionLedger(this.repo, this.scheduler);
    this.store = new BackupStore(
      this.repo,
      { backupDir: options.backupDir, excludedExtensions: options.excludedExtensions },
      this.now
    );
    this.orchestrator = new TurnOrchestrator(
      {
        repo: this.repo,
        lifecycle: this.lifecycle,
        scheduler: this.scheduler,
        ledger: this.ledger,
        store: this.store,
        lock: this.lock,
        processes: new ProcessRegistry(),
        processFactory: options.processFactory,
        events: this.events,
        now: this.now,
      },
      options.orchestrator
    );
    this.monitor = new TurnMonitor(
      { repo: this.repo, lock: this.lock, orchestrator: this.orchestrator },
      options.monitor
    );

    this.lifecycle.onTransition((session, from, event) => {
      const privileged = event === 'resetStarted';
      if (privileged) {
        console.warn(`[TurnHost] PRIVILEGED transition of ${session.id}: ${from} -> ${session.lifecycle} (${event})`);
      }
      this.events.emit({
        type: 'SESSION_TRANSITIONED',
        sessionId: session.id,
        from,
        to: session.lifecycle,
        event,
        privileged,
      });
    });
  }

  /**
   * Registers a host event listener.
   */
  onEvent(callback: HostEventCallback): () => void {
    return this.events.onEvent(callback);
  }

  // ===========================================================================
  // Startup and shutdown
  // ===========================================================================

  /**
   * Restart recovery, then starts the tick loop and the turn monitor.
   */
  async start(): Promise<RecoveryReport> {
    const report: RecoveryReport = {
      reconstructedTimers: this.scheduler.reconstructAll().length,
      adoptedProcesses: [],
      resumedTurns: [],
      failedTurns: [],
    };

    for (const session of this.repo.listSessions(['LAUNCHED', 'STARTED'])) {
      if (session.processPid !== null) {
        this.orchestrator.adopt(session);
        report.adoptedProcesses.push(session.id);
      }
    }

    for (const sessionId of this.orchestrator.interruptedSessions()) {
      try {
        await this.orchestrator.advance(sessionId, { kind: 'recovery' });
        report.resumedTurns.push(sessionId);
      } catch (err) {
        console.error(`[TurnHost] Recovery of interrupted turn for ${sessionId} failed:`, toErrorInfo(err).message);
        report.failedTurns.push(sessionId);
      }
    }

    this.scheduler.start();
    this.monitor.start();
    this.started = true;
    console.log(
      `[TurnHost] Started: ${report.reconstructedTimers} timer(s), ` +
      `${report.adoptedProcesses.length} process(es) adopted, ${report.resumedTurns.length} turn(s) resumed`
    );
    return report;
  }

  /**
   * Stops background loops. Game processes keep running and are adopted on
   * the next start.
   */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    await this.monitor.stop();
    await this.scheduler.stop();
    console.log('[TurnHost] Stopped');
  }

  private async handleDeadline(sessionId: SessionId): Promise<void> {
    try {
      await this.orchestrator.advance(sessionId, { kind: 'deadline' });
    } catch (err) {
      if (err instanceof ConcurrentAdvanceInProgressError) {
        console.log(`[TurnHost] Deadline for ${sessionId} skipped, session busy`);
        return;
      }
      const info = toErrorInfo(err);
      console.error(`[TurnHost] Deadline advance for ${sessionId} failed (${info.code}): ${info.message}`);
    }
  }

  private async handleWarning(sessionId: SessionId, remainingMs: number): Promise<void> {
    const probe = await this.orchestrator.probe(sessionId);
    const timer = this.repo.getTimer(sessionId);
    const deadline = timer ? deadlineOf(timer) : null;
    this.events.emit({
      type: 'TIMER_WARNING',
      sessionId,
      remainingMs,
      deadline: deadline === null ? null : new Date(deadline),
      outstandingPlayers: probe?.outstandingPlayers ?? [],
    });
  }

  // ===========================================================================
  // Lifecycle operations
  // ===========================================================================

  async createSession(input: CreateSessionInput): Promise<OperationResult<Session>> {
    return this.execute('createSession', () => {
      const session = this.repo.transaction(() => {
        const session = this.lifecycle.create({
          ...input,
          defaultTurnDurationMs: input.defaultTurnDurationMs ?? this.defaultTurnDurationMs,
        });
        this.scheduler.initTimer(session.id, session.defaultTurnDurationMs);
        return session;
      });
      this.events.emit({ type: 'SESSION_CREATED', sessionId: session.id, name: session.name });
      return session;
    });
  }

  /**
   * Starts the game process and puts the first turn on the clock.
   * Relaunching a running session restarts the process without changing its
   * lifecycle and resumes the clock where it stopped.
   */
  async launch(sessionId: SessionId): Promise<OperationResult<Session>> {
    return this.execute('launch', () =>
      this.lock.run(sessionId, async () => {
        const session = this.lifecycle.assertCanTransition(sessionId, 'launch');
        await this.orchestrator.startProcess(session);
        const launched = this.lifecycle.transition(sessionId, 'launch');
        if (session.lifecycle === 'CREATED') {
          this.scheduler.reset(sessionId);
        } else {
          this.scheduler.resume(sessionId);
        }
        return launched;
      })
    );
  }

  /**
   * Starts play explicitly and restarts the first turn's clock.
   */
  async startPlay(sessionId: SessionId): Promise<OperationResult<Session>> {
    return this.execute('startPlay', () =>
      this.lock.run(sessionId, () => {
        const session = this.lifecycle.transition(sessionId, 'startPlay');
        this.scheduler.reset(sessionId);
        return session;
      })
    );
  }

  async endGame(sessionId: SessionId): Promise<OperationResult<Session>> {
    return this.execute('endGame', () =>
      this.lock.run(sessionId, async () => {
        this.lifecycle.assertCanTransition(sessionId, 'endGame');
        await this.orchestrator.stopProcess(sessionId);
        this.scheduler.pause(sessionId);
        return this.lifecycle.transition(sessionId, 'endGame');
      })
    );
  }

  async deleteSession(sessionId: SessionId): Promise<OperationResult<Session>> {
    return this.execute('deleteSession', () =>
      this.lock.run(sessionId, () => this.lifecycle.transition(sessionId, 'deleteLobby'))
    );
  }

  /**
   * Privileged: returns a started session to the launched state and stops
   * its clock.
   */
  async resetStarted(sessionId: SessionId): Promise<OperationResult<Session>> {
    return this.execute('resetStarted', () =>
      this.lock.run(sessionId, () => {
        const session = this.lifecycle.transition(sessionId, 'resetStarted');
        this.scheduler.pause(sessionId);
        return session;
      })
    );
  }

  // ===========================================================================
  // Timer operations
  // ===========================================================================

  async pauseTimer(sessionId: SessionId): Promise<OperationResult<TimerState>> {
    return this.timerOperation(sessionId, 'pause', () => this.scheduler.pause(sessionId));
  }

  async resumeTimer(sessionId: SessionId): Promise<OperationResult<TimerState>> {
    return this.timerOperation(sessionId, 'resume', () => {
      const session = this.lifecycle.get(sessionId);
      if (!isRunningLifecycle(session.lifecycle)) {
        throw new SessionNotRunningError(sessionId, session.lifecycle);
      }
      return this.scheduler.resume(sessionId);
    });
  }

  /**
   * Adds (or with a negative delta removes) time from the current turn.
   */
  async extendTimer(sessionId: SessionId, deltaMs: number): Promise<OperationResult<TimerState>> {
    return this.timerOperation(sessionId, 'extend', () => this.scheduler.extend(sessionId, deltaMs));
  }

  async setTimerRemaining(sessionId: SessionId, remainingMs: number): Promise<OperationResult<TimerState>> {
    return this.timerOperation(sessionId, 'set-remaining', () => this.scheduler.setRemaining(sessionId, remainingMs));
  }

  /**
   * Changes the duration of future turns.
   */
  async setTimerDefault(sessionId: SessionId, durationMs: number): Promise<OperationResult<TimerState>> {
    return this.timerOperation(sessionId, 'set-default', () => {
      this.scheduler.setDefault(sessionId, durationMs);
      return this.scheduler.getTimer(sessionId);
    });
  }

  private async timerOperation(
    sessionId: SessionId,
    action: TimerAction,
    fn: () => TimerState
  ): Promise<OperationResult<TimerState>> {
    return this.execute(`timer:${action}`, () =>
      this.lock.run(sessionId, () => {
        const timer = fn();
        const session = this.lifecycle.get(sessionId);
        this.events.emit({
          type: 'TIMER_UPDATED',
          sessionId,
          action,
          remainingMs: timer.remainingMs,
          running: timer.running,
          defaultTurnDurationMs: session.defaultTurnDurationMs,
        });
        return timer;
      })
    );
  }

  // ===========================================================================
  // Extension ledger
  // ===========================================================================

  async registerPlayer(
    sessionId: SessionId,
    player: string,
    options: RegisterPlayerOptions = {}
  ): Promise<OperationResult<PlayerTimeBank>> {
    return this.execute('registerPlayer', () =>
      this.lock.run(sessionId, () => this.ledger.registerPlayer(sessionId, player, options))
    );
  }

  async requestExtension(
    sessionId: SessionId,
    player: string,
    deltaMs: number
  ): Promise<OperationResult<ExtensionGrant>> {
    return this.execute('requestExtension', () =>
      this.lock.run(sessionId, () => {
        const grant = this.ledger.requestExtension(sessionId, player, deltaMs);
        this.events.emit({
          type: 'EXTENSION_GRANTED',
          sessionId,
          player: grant.bank.player,
          deltaMs,
          balanceMs: grant.bank.balanceMs,
          extensionsUsedThisTurn: grant.bank.extensionsUsedThisTurn,
          remainingMs: grant.timer.remainingMs,
        });
        return grant;
      })
    );
  }

  /**
   * Operator grant (positive) or charge (negative) against a player's bank.
   */
  async adjustBalance(sessionId: SessionId, player: string, deltaMs: number): Promise<OperationResult<PlayerTimeBank>> {
    return this.execute('adjustBalance', () =>
      this.lock.run(sessionId, () => this.ledger.adjustBalance(sessionId, player, deltaMs))
    );
  }

  // ===========================================================================
  // Turn orchestration
  // ===========================================================================

  /**
   * Advances the turn now, whatever the clock says.
   */
  async forceAdvance(sessionId: SessionId, nextTurnDurationMs?: number): Promise<OperationResult<TurnAdvanceResult>> {
    return this.execute('forceAdvance', () =>
      this.orchestrator.advance(sessionId, { kind: 'force', nextTurnDurationMs })
    );
  }

  /**
   * Re-enters the session's unresolved turn from its last completed step.
   */
  async resumeAdvance(sessionId: SessionId): Promise<OperationResult<TurnAdvanceResult>> {
    return this.execute('resumeAdvance', () => this.orchestrator.advance(sessionId, { kind: 'resume' }));
  }

  async discardFailedTurn(sessionId: SessionId): Promise<OperationResult<number>> {
    return this.execute('discardFailedTurn', () => this.orchestrator.discardFailedTurn(sessionId));
  }

  async rollback(sessionId: SessionId, toTurnNumber: number): Promise<OperationResult<RollbackResult>> {
    return this.execute('rollback', () => this.orchestrator.rollback(sessionId, toTurnNumber));
  }

  async preAdvanceHook(sessionId: SessionId): Promise<OperationResult<TurnRecord>> {
    return this.execute('preAdvanceHook', () => this.orchestrator.preAdvanceHook(sessionId));
  }

  async postAdvanceHook(sessionId: SessionId): Promise<OperationResult<TurnAdvanceResult>> {
    return this.execute('postAdvanceHook', () => this.orchestrator.postAdvanceHook(sessionId));
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async getSessionView(sessionId: SessionId): Promise<OperationResult<SessionView>> {
    return this.execute('getSessionView', async () => {
      const session = this.lifecycle.get(sessionId);
      const timer = this.repo.getTimer(sessionId);
      const unresolved = this.repo.getUnresolvedTurnRecord(sessionId);
      return {
        session,
        flags: toFlags(session.lifecycle),
        timer,
        deadline: timer ? deadlineOf(timer) : null,
        banks: this.repo.listBanks(sessionId),
        turns: this.repo.listTurnRecords(sessionId),
        orchestratorPhase: unresolved ? unresolved.phase : 'IDLE',
        processAlive: await this.orchestrator.isAlive(sessionId),
      };
    });
  }

  listSessions(): Session[] {
    return this.repo.listSessions();
  }

  /**
   * Runs an operation and converts the outcome into a result value.
   */
  private async execute<T>(operation: string, fn: () => Promise<T> | T): Promise<OperationResult<T>> {
    try {
      return okResult(await fn());
    } catch (err) {
      const result = toErrorResult<T>(err);
      if (!result.ok && result.error.code === HostErrorCode.INTERNAL_ERROR) {
        console.error(`[TurnHost] ${operation} failed unexpectedly:`, err);
      }
      return result;
    }
  }
}
