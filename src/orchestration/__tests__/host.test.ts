/**
 * Tests for the TurnHost facade: lifecycle, timer, ledger and recovery.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HostErrorCode } from '../../errors';
import type { TurnRecord } from '../types';
import {
  START_TIME,
  TestHost,
  createTestHost,
  eventsOfType,
  expectError,
  expectOk,
  removeDir,
} from '../../test/helpers';

const TURN_MS = 1440 * 1000;

describe('TurnHost', () => {
  let t: TestHost;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    t = createTestHost();
  });

  afterEach(async () => {
    await t.host.stop();
    removeDir(t.root);
    vi.restoreAllMocks();
  });

  describe('lifecycle', () => {
    it('should create a lobby with a paused clock', async () => {
      const session = expectOk(await t.host.createSession({ name: 'islands', workingDir: t.workingDir('islands') }));

      expect(session.lifecycle).toBe('CREATED');
      expect(session.defaultTurnDurationMs).toBe(24 * 60 * 60 * 1000);
      expect(session.createdAt).toBe(START_TIME);
      expect(t.host.scheduler.getTimer(session.id)).toMatchObject({
        remainingMs: 24 * 60 * 60 * 1000,
        running: false,
      });
      expect(eventsOfType(t.events, 'SESSION_CREATED')).toEqual([
        expect.objectContaining({ sessionId: session.id, name: 'islands' }),
      ]);
    });

    it('should walk a session from lobby to deletion', async () => {
      const session = await t.launchSession('islands');
      expect(session.lifecycle).toBe('LAUNCHED');

      expect(expectOk(await t.host.startPlay(session.id)).lifecycle).toBe('STARTED');
      expect(expectOk(await t.host.endGame(session.id)).lifecycle).toBe('ENDED');
      expect(expectOk(await t.host.deleteSession(session.id)).lifecycle).toBe('DELETED');

      const transitions = eventsOfType(t.events, 'SESSION_TRANSITIONED').map((e) => `${e.from}->${e.to}`);
      expect(transitions).toEqual(['CREATED->LAUNCHED', 'LAUNCHED->STARTED', 'STARTED->ENDED', 'ENDED->DELETED']);
    });

    it('should reject transitions outside the table without changing state', async () => {
      const created = expectOk(await t.host.createSession({ name: 'lobby', workingDir: t.workingDir('lobby') }));

      const error = expectError(await t.host.startPlay(created.id), HostErrorCode.INVALID_STATE_TRANSITION);
      expect(error.context).toEqual({ sessionId: created.id, from: 'CREATED', event: 'startPlay' });
      expectError(await t.host.endGame(created.id), HostErrorCode.INVALID_STATE_TRANSITION);
      expectError(await t.host.deleteSession(created.id), HostErrorCode.INVALID_STATE_TRANSITION);

      expect(t.host.lifecycle.get(created.id).lifecycle).toBe('CREATED');
    });

    it('should report unknown sessions', async () => {
      expectError(await t.host.launch('ses_missing'), HostErrorCode.SESSION_NOT_FOUND);
      expectError(await t.host.getSessionView('ses_missing'), HostErrorCode.SESSION_NOT_FOUND);
    });

    it('should put the first turn on the clock at launch', async () => {
      const session = await t.launchSession('islands');
      expect(t.host.scheduler.getTimer(session.id)).toMatchObject({ running: true, remainingMs: TURN_MS });

      t.clock.advance(60_000);
      t.host.scheduler.tickOnce();
      expectOk(await t.host.startPlay(session.id));

      expect(t.host.scheduler.getTimer(session.id)).toMatchObject({ running: true, remainingMs: TURN_MS });
    });

    it('should resume a stopped clock on relaunch', async () => {
      const session = await t.launchSession('islands');
      t.clock.advance(60_000);
      expectOk(await t.host.pauseTimer(session.id));

      expectOk(await t.host.launch(session.id));

      expect(t.host.scheduler.getTimer(session.id)).toMatchObject({ running: true, remainingMs: TURN_MS - 60_000 });
    });

    it('should restart the process on relaunch without changing the tag', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.startPlay(session.id));

      const relaunched = expectOk(await t.host.launch(session.id));

      expect(relaunched.lifecycle).toBe('STARTED');
      expect(t.handle(session.id).starts).toBe(2);
      expect(relaunched.processPid).toBe(t.handle(session.id).pid);
    });

    it('should stop the process and clock when the game ends', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.startPlay(session.id));
      const handle = t.handle(session.id);

      const ended = expectOk(await t.host.endGame(session.id));

      expect(ended.processPid).toBeNull();
      expect(handle.stops).toBe(1);
      expect(t.host.orchestrator.hasProcess(session.id)).toBe(false);
      expect(t.host.scheduler.getTimer(session.id).running).toBe(false);
    });

    it('should reset a started session as a privileged transition', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.startPlay(session.id));

      expect(expectOk(await t.host.resetStarted(session.id)).lifecycle).toBe('LAUNCHED');

      const reset = eventsOfType(t.events, 'SESSION_TRANSITIONED').filter((e) => e.event === 'resetStarted');
      expect(reset).toHaveLength(1);
      expect(reset[0].privileged).toBe(true);
      expect(t.host.scheduler.getTimer(session.id).running).toBe(false);
      expect(console.warn).toHaveBeenCalled();
    });

    it('should list sessions', async () => {
      await t.launchSession('islands');
      await t.launchSession('valley');

      expect(t.host.listSessions().map((s) => s.name).sort()).toEqual(['islands', 'valley']);
    });
  });

  describe('timer operations', () => {
    it('should pause and resume the clock', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.startPlay(session.id));
      t.clock.advance(60_000);

      const paused = expectOk(await t.host.pauseTimer(session.id));
      expect(paused).toMatchObject({ running: false, remainingMs: TURN_MS - 60_000 });

      t.clock.advance(600_000);
      const resumed = expectOk(await t.host.resumeTimer(session.id));
      expect(resumed).toMatchObject({ running: true, remainingMs: TURN_MS - 60_000 });

      expect(eventsOfType(t.events, 'TIMER_UPDATED').map((e) => e.action)).toEqual(['pause', 'resume']);
    });

    it('should refuse to resume the clock of a lobby', async () => {
      const created = expectOk(await t.host.createSession({ name: 'lobby', workingDir: t.workingDir('lobby') }));
      expectError(await t.host.resumeTimer(created.id), HostErrorCode.SESSION_NOT_RUNNING);
    });

    it('should extend and shorten the current turn', async () => {
      const session = await t.launchSession('islands');

      expect(expectOk(await t.host.extendTimer(session.id, 60_000)).remainingMs).toBe(TURN_MS + 60_000);
      expect(expectOk(await t.host.extendTimer(session.id, -10 * TURN_MS)).remainingMs).toBe(0);
    });

    it('should set the remaining time', async () => {
      const session = await t.launchSession('islands');

      expect(expectOk(await t.host.setTimerRemaining(session.id, 5000)).remainingMs).toBe(5000);
      expectError(await t.host.setTimerRemaining(session.id, -1), HostErrorCode.INVALID_ARGUMENT);
      expect(t.host.scheduler.getTimer(session.id).remainingMs).toBe(5000);
    });

    it('should apply a new default from the next turn', async () => {
      const session = await t.launchSession('islands');

      const timer = expectOk(await t.host.setTimerDefault(session.id, 3_600_000));

      expect(timer.remainingMs).toBe(TURN_MS);
      expect(eventsOfType(t.events, 'TIMER_UPDATED')[0]).toMatchObject({
        action: 'set-default',
        defaultTurnDurationMs: 3_600_000,
      });

      const advanced = expectOk(await t.host.forceAdvance(session.id));
      expect(advanced.remainingMs).toBe(3_600_000);
    });

    it('should reject a non-positive default', async () => {
      const session = await t.launchSession('islands');
      expectError(await t.host.setTimerDefault(session.id, 0), HostErrorCode.INVALID_ARGUMENT);
    });
  });

  describe('extensions', () => {
    it('should move banked time onto the turn clock', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.registerPlayer(session.id, 'Atlantis', { balanceMs: 120_000, maxExtensionsPerTurn: 1 }));

      const grant = expectOk(await t.host.requestExtension(session.id, 'Atlantis', 30_000));

      expect(grant.bank).toMatchObject({ balanceMs: 90_000, extensionsUsedThisTurn: 1 });
      expect(grant.timer.remainingMs).toBe(TURN_MS + 30_000);
      expect(eventsOfType(t.events, 'EXTENSION_GRANTED')[0]).toMatchObject({
        player: 'Atlantis',
        deltaMs: 30_000,
        balanceMs: 90_000,
        remainingMs: TURN_MS + 30_000,
      });
    });

    it('should leave bank and clock untouched when over the limit', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.registerPlayer(session.id, 'Atlantis', { balanceMs: 120_000, maxExtensionsPerTurn: 1 }));
      expectOk(await t.host.requestExtension(session.id, 'Atlantis', 30_000));

      expectError(await t.host.requestExtension(session.id, 'Atlantis', 30_000), HostErrorCode.LIMIT_EXCEEDED);

      expect(t.host.ledger.getBank(session.id, 'Atlantis').balanceMs).toBe(90_000);
      expect(t.host.scheduler.getTimer(session.id).remainingMs).toBe(TURN_MS + 30_000);
      expect(eventsOfType(t.events, 'EXTENSION_GRANTED')).toHaveLength(1);
    });

    it('should refuse extensions beyond the balance', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.registerPlayer(session.id, 'Babel', { balanceMs: 1000 }));

      expectError(await t.host.requestExtension(session.id, 'Babel', 5000), HostErrorCode.INSUFFICIENT_BALANCE);
      expectError(await t.host.requestExtension(session.id, 'Celtica', 5000), HostErrorCode.PLAYER_NOT_FOUND);
    });

    it('should let operators grant and charge banked time', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.registerPlayer(session.id, 'Atlantis', { balanceMs: 1000 }));

      expect(expectOk(await t.host.adjustBalance(session.id, 'Atlantis', 4000)).balanceMs).toBe(5000);
      expectError(await t.host.adjustBalance(session.id, 'Atlantis', -6000), HostErrorCode.INSUFFICIENT_BALANCE);
      expect(t.host.ledger.getBank(session.id, 'Atlantis').balanceMs).toBe(5000);
    });

    it('should add the per-turn bonus when a turn completes', async () => {
      const created = expectOk(
        await t.host.createSession({
          name: 'bonus',
          workingDir: t.workingDir('bonus'),
          initialBankMs: 10_000,
          perTurnBankBonusMs: 5000,
        })
      );
      expectOk(await t.host.launch(created.id));
      expectOk(await t.host.registerPlayer(created.id, 'Atlantis'));

      expectOk(await t.host.forceAdvance(created.id));

      expect(t.host.ledger.getBank(created.id, 'Atlantis').balanceMs).toBe(15_000);
    });
  });

  describe('getSessionView', () => {
    it('should describe a running session', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.startPlay(session.id));
      expectOk(await t.host.registerPlayer(session.id, 'Atlantis', { balanceMs: 1000 }));
      expectOk(await t.host.forceAdvance(session.id));

      const view = expectOk(await t.host.getSessionView(session.id));

      expect(view.session.lifecycle).toBe('STARTED');
      expect(view.flags).toEqual({ active: true, started: true, ended: false });
      expect(view.deadline).toBe(START_TIME + TURN_MS);
      expect(view.banks.map((b) => b.player)).toEqual(['Atlantis']);
      expect(view.turns.map((r) => r.turnNumber)).toEqual([1]);
      expect(view.orchestratorPhase).toBe('IDLE');
      expect(view.processAlive).toBe(true);
    });

    it('should keep the deadline fixed while the clock runs down', async () => {
      const session = await t.launchSession('islands');
      t.clock.advance(60_000);
      expect(expectOk(await t.host.getSessionView(session.id)).deadline).toBe(START_TIME + TURN_MS);

      t.host.scheduler.tickOnce();
      t.clock.advance(30_000);
      expect(expectOk(await t.host.getSessionView(session.id)).deadline).toBe(START_TIME + TURN_MS);
    });

    it('should show no deadline while the clock is paused', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.pauseTimer(session.id));
      const view = expectOk(await t.host.getSessionView(session.id));
      expect(view.deadline).toBeNull();
      expect(view.flags).toEqual({ active: true, started: false, ended: false });
    });
  });

  describe('restart recovery', () => {
    function interruptedRecord(sessionId: string, overrides: Partial<TurnRecord> = {}): TurnRecord {
      return {
        sessionId,
        turnNumber: 1,
        phase: 'PRE_BACKUP_IN_FLIGHT',
        trigger: 'deadline',
        failed: false,
        failure: null,
        baselineEngineTurn: 0,
        engineTurn: null,
        preBackupRef: null,
        postBackupRef: null,
        startedAt: START_TIME,
        completedAt: null,
        ...overrides,
      };
    }

    it('should adopt running processes and finish interrupted turns', async () => {
      const session = await t.launchSession('islands');
      t.host.repo.insertTurnRecord(interruptedRecord(session.id));

      const restarted = createTestHost({ db: t.db, root: t.root });
      const report = await restarted.host.start();
      await restarted.host.stop();

      expect(report.reconstructedTimers).toBe(1);
      expect(report.adoptedProcesses).toEqual([session.id]);
      expect(report.resumedTurns).toEqual([session.id]);
      expect(report.failedTurns).toEqual([]);

      const record = restarted.host.repo.getTurnRecord(session.id, 1);
      expect(record).toMatchObject({ phase: 'COMPLETED', engineTurn: 1 });
      expect(restarted.handle(session.id).pid).toBe(session.processPid);
      expect(restarted.handle(session.id).starts).toBe(0);
      expect(restarted.handle(session.id).signals).toBe(1);
    });

    it('should mark turns that cannot be finished as failed', async () => {
      const session = await t.launchSession('islands');
      t.host.repo.insertTurnRecord(interruptedRecord(session.id));
      removeDir(session.workingDir);

      const restarted = createTestHost({ db: t.db, root: t.root });
      const report = await restarted.host.start();
      await restarted.host.stop();

      expect(report.resumedTurns).toEqual([]);
      expect(report.failedTurns).toEqual([session.id]);
      expect(restarted.host.repo.getTurnRecord(session.id, 1)?.failed).toBe(true);
    });

    it('should leave hook records waiting for their post hook', async () => {
      const session = await t.launchSession('islands');
      t.host.repo.insertTurnRecord(interruptedRecord(session.id, { phase: 'ADVANCING', trigger: 'hook' }));

      const restarted = createTestHost({ db: t.db, root: t.root });
      const report = await restarted.host.start();
      await restarted.host.stop();

      expect(report.resumedTurns).toEqual([]);
      expect(restarted.host.orchestrator.hasPendingHook(session.id)).toBe(true);
    });

    it('should charge downtime to running clocks', async () => {
      const session = await t.launchSession('islands');
      expectOk(await t.host.startPlay(session.id));

      const restarted = createTestHost({ db: t.db, root: t.root });
      restarted.clock.advance(120_000);
      await restarted.host.start();
      await restarted.host.stop();

      expect(restarted.host.scheduler.getTimer(session.id).remainingMs).toBe(TURN_MS - 120_000);
    });
  });
});
