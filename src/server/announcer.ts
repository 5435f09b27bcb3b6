/**
 * Turn announcer.
 *
 * Renders the host events players care about into short announcements
 * (start of turn, deadline warning, stalled turn, dead game process) and
 * POSTs them to the chat relays configured for the host. Bodies are signed
 * with the shared secret so a relay can reject forged announcements.
 */

import { hmac } from '@noble/hashes/hmac.js';
import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils.js';
import { backoffDelay, sleep } from '../orchestration/retry';
import type { HostEvent, HostEventCallback } from '../orchestration/types';

export type AnnouncementKind =
  | 'turn-started'
  | 'deadline-warning'
  | 'turn-stalled'
  | 'advance-failed'
  | 'process-died'
  | 'rolled-back';

export interface Announcement {
  sessionId: string;
  kind: AnnouncementKind;
  title: string;
  lines: string[];
  /** ISO time of the event that caused it */
  timestamp: string;
}

export interface AnnouncerConfig {
  /** Relay endpoints; none means announcements are only rendered */
  urls: string[];
  /** Shared secret for the signature header */
  secret: string;
  maxAttempts: number;
  /** Delay before the second attempt, doubled after that */
  baseDelayMs: number;
  /** Limit on one POST */
  timeoutMs: number;
}

export const DEFAULT_ANNOUNCER_CONFIG: AnnouncerConfig = {
  urls: [],
  secret: '',
  maxAttempts: 3,
  baseDelayMs: 1000,
  timeoutMs: 10 * 1000,
};

export interface FailedAnnouncement {
  url: string;
  announcement: Announcement;
  attempts: number;
  reason: string;
}

export const SIGNATURE_HEADER = 'X-Announcement-Signature';

export function signBody(body: string, secret: string): string {
  return `sha256=${bytesToHex(hmac(sha256, utf8ToBytes(secret), utf8ToBytes(body)))}`;
}

const UNITS: [string, number][] = [
  ['day', 86_400_000],
  ['hour', 3_600_000],
  ['minute', 60_000],
  ['second', 1000],
];

/**
 * "1 day, 2 hours, 5 minutes". Sub-second remainders are dropped.
 */
export function describeDuration(ms: number): string {
  let rest = Math.max(0, Math.floor(ms / 1000) * 1000);
  const parts: string[] = [];
  for (const [unit, size] of UNITS) {
    const count = Math.floor(rest / size);
    rest -= count * size;
    if (count > 0) parts.push(`${count} ${unit}${count === 1 ? '' : 's'}`);
  }
  return parts.length > 0 ? parts.join(', ') : '0 seconds';
}

function listOrNone(names: string[]): string {
  return names.length > 0 ? names.join(', ') : 'None';
}

function nextDeadline(deadline: Date | null, remainingMs: number): string {
  return deadline === null
    ? `Timer paused with ${describeDuration(remainingMs)} left`
    : `Next turn: ${deadline.toISOString()} in ${describeDuration(remainingMs)}`;
}

/**
 * The announcement for an event, or null for events players don't see.
 */
export function toAnnouncement(event: HostEvent): Announcement | null {
  const base = { sessionId: event.sessionId, timestamp: event.timestamp.toISOString() };

  switch (event.type) {
    case 'TURN_ADVANCED':
      return {
        ...base,
        kind: 'turn-started',
        title: `Start of turn ${event.turnNumber}`,
        lines: [
          nextDeadline(event.deadline, event.remainingMs),
          `Players who missed the turn: ${listOrNone(event.missedPlayers)}`,
        ],
      };
    case 'TIMER_WARNING':
      return {
        ...base,
        kind: 'deadline-warning',
        title: `${describeDuration(event.remainingMs)} left this turn`,
        lines: [
          nextDeadline(event.deadline, event.remainingMs),
          `Still to submit: ${listOrNone(event.outstandingPlayers)}`,
        ],
      };
    case 'TURN_STALLED':
      return {
        ...base,
        kind: 'turn-stalled',
        title: `Turn ${event.turnNumber} is stuck`,
        lines: [`The game did not advance after ${event.attempts} attempt(s): ${event.reason}`],
      };
    case 'ADVANCE_FAILED':
      // Stalls get their own announcement
      if (event.backupPhase === null) return null;
      return {
        ...base,
        kind: 'advance-failed',
        title: `Turn ${event.turnNumber} is on hold`,
        lines: [`The ${event.backupPhase} backup failed: ${event.reason}`],
      };
    case 'PROCESS_DIED':
      return {
        ...base,
        kind: 'process-died',
        title: 'The game has stopped',
        lines: [`The clock is paused. ${event.reason}`],
      };
    case 'ROLLED_BACK':
      return {
        ...base,
        kind: 'rolled-back',
        title: `Game rolled back to turn ${event.toTurnNumber}`,
        lines: event.discardedTurns.length > 0 ? [`Discarded turns: ${event.discardedTurns.join(', ')}`] : [],
      };
    default:
      return null;
  }
}

/**
 * Posts announcements to every configured relay, in the background.
 */
export class TurnAnnouncer {
  private config: AnnouncerConfig;
  private pending: Set<Promise<void>> = new Set();
  private failures: FailedAnnouncement[] = [];

  constructor(config: Partial<AnnouncerConfig> = {}) {
    this.config = { ...DEFAULT_ANNOUNCER_CONFIG, ...config };
  }

  /**
   * Subscribes to a host event source. Returns the unsubscribe function.
   */
  attach(source: { onEvent(callback: HostEventCallback): () => void }): () => void {
    return source.onEvent((event) => {
      this.announce(event);
    });
  }

  /**
   * Renders the event and starts delivery. Returns what was announced.
   */
  announce(event: HostEvent): Announcement | null {
    const announcement = toAnnouncement(event);
    if (!announcement) return null;

    for (const url of this.config.urls) {
      const delivery = this.deliver(url, announcement)
        .catch((err: unknown) => {
          console.error(`[TurnAnnouncer] Delivery to ${url} crashed:`, err);
        })
        .finally(() => this.pending.delete(delivery));
      this.pending.add(delivery);
    }
    return announcement;
  }

  private async deliver(url: string, announcement: Announcement): Promise<void> {
    const { maxAttempts, baseDelayMs, timeoutMs, secret } = this.config;
    const body = JSON.stringify(announcement);
    const signature = signBody(body, secret);
    let reason = 'not attempted';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        await sleep(backoffDelay(baseDelayMs, attempt - 2));
      }
      try {
        const response = await fetch(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json', [SIGNATURE_HEADER]: signature },
          body,
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (response.ok) return;
        reason = `HTTP ${response.status}`;
      } catch (err) {
        reason = err instanceof Error ? err.message : String(err);
      }
    }

    this.failures.push({ url, announcement, attempts: maxAttempts, reason });
    console.error(
      `[TurnAnnouncer] Gave up announcing "${announcement.title}" for ${announcement.sessionId} to ${url}: ${reason}`
    );
  }

  /**
   * Announcements every attempt failed for.
   */
  getFailures(): FailedAnnouncement[] {
    return [...this.failures];
  }

  /**
   * Waits for deliveries in progress.
   */
  async flush(): Promise<void> {
    await Promise.allSettled(this.pending);
  }
}
