/**
 * Tests for turn announcements: rendering and signed delivery to relays.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HostErrorCode } from '../../errors';
import type { HostEvent } from '../../orchestration/types';
import { TurnAnnouncer, describeDuration, signBody, toAnnouncement } from '../announcer';

const AT = new Date('2026-03-01T12:00:00.000Z');
const RELAY = 'https://relay.example/turns';

const advanced: HostEvent = {
  type: 'TURN_ADVANCED',
  sessionId: 'ses_1',
  timestamp: AT,
  turnNumber: 3,
  engineTurn: 3,
  trigger: 'deadline',
  deadline: new Date('2026-03-02T12:00:00.000Z'),
  remainingMs: 86_400_000,
  outstandingPlayers: ['Babel'],
  missedPlayers: ['Atlantis', 'Babel'],
};

describe('describeDuration', () => {
  it('should spell out each unit and drop empty ones', () => {
    expect(describeDuration(93_784_500)).toBe('1 day, 2 hours, 3 minutes, 4 seconds');
    expect(describeDuration(60_000)).toBe('1 minute');
    expect(describeDuration(0)).toBe('0 seconds');
  });
});

describe('toAnnouncement', () => {
  it('should announce the start of a turn with its deadline and missed players', () => {
    expect(toAnnouncement(advanced)).toEqual({
      sessionId: 'ses_1',
      kind: 'turn-started',
      title: 'Start of turn 3',
      lines: ['Next turn: 2026-03-02T12:00:00.000Z in 1 day', 'Players who missed the turn: Atlantis, Babel'],
      timestamp: '2026-03-01T12:00:00.000Z',
    });
  });

  it('should warn about a paused clock without a deadline', () => {
    const announcement = toAnnouncement({
      type: 'TIMER_WARNING',
      sessionId: 'ses_1',
      timestamp: AT,
      remainingMs: 300_000,
      deadline: null,
      outstandingPlayers: [],
    });

    expect(announcement?.title).toBe('5 minutes left this turn');
    expect(announcement?.lines).toEqual(['Timer paused with 5 minutes left', 'Still to submit: None']);
  });

  it('should announce backup failures but leave stalls to their own event', () => {
    const failed = {
      type: 'ADVANCE_FAILED',
      sessionId: 'ses_1',
      timestamp: AT,
      turnNumber: 2,
      phase: 'PRE_BACKUP_IN_FLIGHT',
      trigger: 'deadline',
      code: HostErrorCode.BACKUP_FAILURE,
      reason: 'disk full',
    } as const;

    expect(toAnnouncement({ ...failed, backupPhase: 'pre' })).toMatchObject({
      kind: 'advance-failed',
      title: 'Turn 2 is on hold',
      lines: ['The pre backup failed: disk full'],
    });
    expect(toAnnouncement({ ...failed, backupPhase: null })).toBeNull();
  });

  it('should skip events players do not see', () => {
    expect(
      toAnnouncement({
        type: 'TIMER_UPDATED',
        sessionId: 'ses_1',
        timestamp: AT,
        action: 'pause',
        remainingMs: 1000,
        running: false,
        defaultTurnDurationMs: 1000,
      })
    ).toBeNull();
  });
});

describe('TurnAnnouncer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should post a signed announcement to every relay', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response(null, { status: 204 }));
    const announcer = new TurnAnnouncer({ urls: [RELAY], secret: 'test-secret' });

    const announcement = announcer.announce(advanced);
    await announcer.flush();

    const body = JSON.stringify(announcement);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0][0]).toBe(RELAY);
    expect(fetchSpy.mock.calls[0][1]).toMatchObject({
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Announcement-Signature': signBody(body, 'test-secret') },
      body,
    });
    expect(announcer.getFailures()).toEqual([]);
  });

  it('should retry a failed post', async () => {
    const fetchSpy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(new Response(null, { status: 500 }))
      .mockResolvedValueOnce(new Response(null, { status: 200 }));
    const announcer = new TurnAnnouncer({ urls: [RELAY], baseDelayMs: 1 });

    announcer.announce(advanced);
    await announcer.flush();

    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(announcer.getFailures()).toEqual([]);
  });

  it('should record the last error once every attempt failed', async () => {
    vi.spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(new Response(null, { status: 502 }))
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const announcer = new TurnAnnouncer({ urls: [RELAY], maxAttempts: 2, baseDelayMs: 1 });

    announcer.announce(advanced);
    await announcer.flush();

    expect(announcer.getFailures()).toEqual([
      { url: RELAY, announcement: toAnnouncement(advanced), attempts: 2, reason: 'connect ECONNREFUSED' },
    ]);
  });

  it('should only render when no relay is configured', async () => {
    const fetchSpy = vi.spyOn(globalThis, 'fetch');
    const announcer = new TurnAnnouncer();

    expect(announcer.announce(advanced)?.title).toBe('Start of turn 3');
    await announcer.flush();

    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
