/**
 * Tests for the timer scheduler: ticking, edge handlers and timer operations.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { InvalidArgumentError, SessionNotFoundError } from '../../errors';
import type { HostRepository } from '../../db/repository';
import { SessionStateMachine } from '../../lifecycle/state-machine';
import { SessionLock } from '../../orchestration/lock';
import { TimerScheduler } from '../scheduler';
import { ManualClock, createTestRepo } from '../../test/helpers';

describe('TimerScheduler', () => {
  let repo: HostRepository;
  let clock: ManualClock;
  let lock: SessionLock;
  let onDeadline: Mock<(sessionId: string) => Promise<void>>;
  let onWarning: Mock<(sessionId: string, remainingMs: number) => Promise<void>>;
  let scheduler: TimerScheduler;
  let sessionId: string;

  beforeEach(() => {
    repo = createTestRepo().repo;
    clock = new ManualClock();
    lock = new SessionLock();
    onDeadline = vi.fn<(sessionId: string) => Promise<void>>().mockResolvedValue(undefined);
    onWarning = vi.fn<(sessionId: string, remainingMs: number) => Promise<void>>().mockResolvedValue(undefined);
    scheduler = new TimerScheduler(
      repo,
      lock,
      { onDeadline, onWarning },
      { tickIntervalMs: 1000, warningThresholdMs: 300_000 },
      clock.now
    );

    const machine = new SessionStateMachine(repo, clock.now);
    sessionId = machine.create({ name: 'Lobby', workingDir: '/games/lobby', defaultTurnDurationMs: 1440_000 }).id;
    scheduler.initTimer(sessionId, 1440_000);
  });

  describe('initTimer', () => {
    it('should create a paused timer at the session default', () => {
      const timer = scheduler.getTimer(sessionId);
      expect(timer.remainingMs).toBe(1440_000);
      expect(timer.running).toBe(false);
    });

    it('should not tick paused timers', () => {
      clock.advance(60_000);
      const summary = scheduler.tickOnce();
      expect(summary.ticked).toEqual([]);
      expect(scheduler.getTimer(sessionId).remainingMs).toBe(1440_000);
    });
  });

  describe('tickOnce', () => {
    beforeEach(() => {
      scheduler.reset(sessionId);
    });

    it('should count down and persist running timers', () => {
      clock.advance(40_000);
      const summary = scheduler.tickOnce();

      expect(summary.ticked).toEqual([sessionId]);
      expect(repo.getTimer(sessionId)?.remainingMs).toBe(1400_000);
    });

    it('should fire the deadline handler once when the timer reaches zero', async () => {
      clock.advance(1440_000);
      const first = scheduler.tickOnce();
      clock.advance(1000);
      const second = scheduler.tickOnce();
      await scheduler.flush();

      expect(first.deadlines).toEqual([sessionId]);
      expect(second.deadlines).toEqual([]);
      expect(onDeadline).toHaveBeenCalledTimes(1);
      expect(onDeadline).toHaveBeenCalledWith(sessionId);
      expect(scheduler.getTimer(sessionId).remainingMs).toBe(0);
    });

    it('should fire the warning handler when crossing the threshold', async () => {
      clock.advance(1440_000 - 299_000);
      const summary = scheduler.tickOnce();
      await scheduler.flush();

      expect(summary.warnings).toEqual([sessionId]);
      expect(onWarning).toHaveBeenCalledWith(sessionId, 299_000);
    });

    it('should skip locked sessions and charge the time on a later tick', () => {
      const release = lock.tryAcquire(sessionId);
      clock.advance(10_000);
      const skipped = scheduler.tickOnce();
      expect(skipped.skipped).toEqual([sessionId]);
      expect(skipped.ticked).toEqual([]);
      expect(repo.getTimer(sessionId)?.remainingMs).toBe(1440_000);

      release?.();
      clock.advance(5000);
      scheduler.tickOnce();
      expect(repo.getTimer(sessionId)?.remainingMs).toBe(1425_000);
    });

    it('should keep ticking when a deadline handler rejects', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      onDeadline.mockRejectedValueOnce(new Error('advance exploded'));

      clock.advance(1440_000);
      scheduler.tickOnce();
      await scheduler.flush();

      expect(errorSpy).toHaveBeenCalled();
      clock.advance(1000);
      expect(() => scheduler.tickOnce()).not.toThrow();
      errorSpy.mockRestore();
    });
  });

  describe('timer operations', () => {
    it('should pause and resume without crediting paused time', () => {
      scheduler.reset(sessionId);
      clock.advance(10_000);
      expect(scheduler.pause(sessionId).remainingMs).toBe(1430_000);

      clock.advance(500_000);
      scheduler.resume(sessionId);
      clock.advance(1000);
      scheduler.tickOnce();
      expect(scheduler.getTimer(sessionId).remainingMs).toBe(1429_000);
    });

    it('should charge elapsed time before applying an extension', () => {
      scheduler.reset(sessionId);
      clock.advance(20_000);
      expect(scheduler.extend(sessionId, 60_000).remainingMs).toBe(1480_000);
    });

    it('should clamp a negative extension at zero', () => {
      expect(scheduler.extend(sessionId, -2000_000).remainingMs).toBe(0);
    });

    it('should still raise the deadline after an extension charged the clock down to zero', async () => {
      scheduler.reset(sessionId);
      clock.advance(1440_000 - 100);
      scheduler.tickOnce();
      clock.advance(200);

      const timer = scheduler.extend(sessionId, -50);
      expect(timer).toMatchObject({ remainingMs: 0, running: true, deadlineRaised: false });

      const first = scheduler.tickOnce();
      const second = scheduler.tickOnce();
      await scheduler.flush();

      expect(first.deadlines).toEqual([sessionId]);
      expect(second.deadlines).toEqual([]);
      expect(onDeadline).toHaveBeenCalledTimes(1);
    });

    it('should reject a non-finite extension', () => {
      expect(() => scheduler.extend(sessionId, Number.NaN)).toThrow(InvalidArgumentError);
    });

    it('should set the remaining time', () => {
      expect(scheduler.setRemaining(sessionId, 90_000).remainingMs).toBe(90_000);
      expect(() => scheduler.setRemaining(sessionId, -1)).toThrow(InvalidArgumentError);
    });

    it('should apply a new default from the next turn', () => {
      scheduler.reset(sessionId);
      clock.advance(1000);
      expect(scheduler.setDefault(sessionId, 600_000)).toBe(600_000);
      expect(scheduler.getTimer(sessionId).remainingMs).toBe(1440_000);

      expect(scheduler.reset(sessionId).remainingMs).toBe(600_000);
      expect(repo.getSession(sessionId)?.defaultTurnDurationMs).toBe(600_000);
    });

    it('should reject a non-positive default', () => {
      expect(() => scheduler.setDefault(sessionId, 0)).toThrow(InvalidArgumentError);
    });

    it('should reset to an explicit duration', () => {
      const timer = scheduler.reset(sessionId, 30_000);
      expect(timer.remainingMs).toBe(30_000);
      expect(timer.running).toBe(true);
    });

    it('should throw SessionNotFoundError for unknown sessions', () => {
      expect(() => scheduler.getTimer('ses_missing')).toThrow(SessionNotFoundError);
      expect(() => scheduler.reset('ses_missing')).toThrow(SessionNotFoundError);
    });
  });

  describe('reconstructAll', () => {
    it('should charge downtime only to running timers', () => {
      const machine = new SessionStateMachine(repo, clock.now);
      const pausedId = machine.create({ name: 'Paused', workingDir: '/games/paused' }).id;
      scheduler.initTimer(pausedId, 50_000);
      scheduler.reset(sessionId);

      clock.advance(100_000);
      scheduler.reconstructAll();

      expect(scheduler.getTimer(sessionId).remainingMs).toBe(1340_000);
      expect(scheduler.getTimer(pausedId).remainingMs).toBe(50_000);
    });
  });

  describe('start and stop', () => {
    it('should report whether the loop is running', async () => {
      expect(scheduler.isRunning()).toBe(false);
      scheduler.start();
      expect(scheduler.isRunning()).toBe(true);
      await scheduler.stop();
      expect(scheduler.isRunning()).toBe(false);
    });
  });
});
