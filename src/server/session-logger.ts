/**
 * Session Logger - Structured per-session logging.
 *
 * Writes JSONL logs to logs/sessions/{sessionId}.jsonl so an operator can
 * reconstruct what happened to a hosted game: lifecycle changes, every
 * turn advance and failure, clock changes, and destructive operations.
 */

import { existsSync, mkdirSync, appendFileSync, readFileSync, readdirSync, statSync } from 'fs';
import { join, dirname, basename } from 'path';
import type { HostEvent, HostEventCallback } from '../orchestration/types';

/**
 * Log event types for hosted sessions.
 */
export type SessionLogEvent =
  | { type: 'session_created'; name: string }
  | { type: 'lifecycle_transition'; from: string; to: string; event: string }
  | { type: 'privileged_transition'; from: string; to: string; event: string }
  | { type: 'process_started'; pid: number | null }
  | { type: 'process_died'; pid: number | null; reason: string }
  | { type: 'timer_updated'; action: string; remainingMs: number; running: boolean }
  | { type: 'timer_warning'; remainingMs: number; outstandingPlayers: string[] }
  | { type: 'extension_granted'; player: string; deltaMs: number; balanceMs: number }
  | { type: 'turn_advanced'; turnNumber: number; engineTurn: number | null; trigger: string; remainingMs: number; outstandingPlayers: string[]; missedPlayers: string[] }
  | { type: 'advance_failed'; turnNumber: number; phase: string; code: string; reason: string }
  | { type: 'turn_stalled'; turnNumber: number; attempts: number; reason: string }
  | { type: 'turn_discarded'; turnNumber: number }
  | { type: 'rollback'; toTurnNumber: number; snapshotId: string; discardedTurns: number[] }
  | { type: 'error'; error: string; context?: string }
  | { type: 'warning'; message: string; context?: string }
  | { type: 'debug'; message: string; data?: unknown };

/**
 * Full log entry with metadata.
 */
export interface SessionLogEntry {
  timestamp: string;
  sessionId: string;
  event: SessionLogEvent;
}

function defaultLogsDir(): string {
  return join(process.cwd(), 'logs', 'sessions');
}

/**
 * Logger for a single hosted session.
 */
export class SessionLogger {
  private sessionId: string;
  private logPath: string;
  private enabled: boolean;

  constructor(sessionId: string, logsDir?: string) {
    this.sessionId = sessionId;
    this.logPath = join(logsDir || defaultLogsDir(), `${sessionId}.jsonl`);
    this.enabled = true;

    // Ensure logs directory exists
    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Logs an event to the session log file.
   */
  log(event: SessionLogEvent, timestamp: Date = new Date()): void {
    if (!this.enabled) return;

    const entry: SessionLogEntry = {
      timestamp: timestamp.toISOString(),
      sessionId: this.sessionId,
      event,
    };

    try {
      appendFileSync(this.logPath, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error(`[SessionLogger] Failed to write log: ${error}`);
    }
  }

  error(error: string, context?: string): void {
    this.log({ type: 'error', error, context });
  }

  warning(message: string, context?: string): void {
    this.log({ type: 'warning', message, context });
  }

  debug(message: string, data?: unknown): void {
    this.log({ type: 'debug', message, data });
  }

  getLogPath(): string {
    return this.logPath;
  }

  /**
   * Disables logging (for tests).
   */
  disable(): void {
    this.enabled = false;
  }

  enable(): void {
    this.enabled = true;
  }
}

/**
 * Maps a host event to its log line.
 */
export function toLogEvent(event: HostEvent): SessionLogEvent {
  switch (event.type) {
    case 'SESSION_CREATED':
      return { type: 'session_created', name: event.name };
    case 'SESSION_TRANSITIONED':
      return {
        type: event.privileged ? 'privileged_transition' : 'lifecycle_transition',
        from: event.from,
        to: event.to,
        event: event.event,
      };
    case 'PROCESS_STARTED':
      return { type: 'process_started', pid: event.pid };
    case 'PROCESS_DIED':
      return { type: 'process_died', pid: event.pid, reason: event.reason };
    case 'TIMER_UPDATED':
      return { type: 'timer_updated', action: event.action, remainingMs: event.remainingMs, running: event.running };
    case 'TIMER_WARNING':
      return { type: 'timer_warning', remainingMs: event.remainingMs, outstandingPlayers: event.outstandingPlayers };
    case 'EXTENSION_GRANTED':
      return { type: 'extension_granted', player: event.player, deltaMs: event.deltaMs, balanceMs: event.balanceMs };
    case 'TURN_ADVANCED':
      return {
        type: 'turn_advanced',
        turnNumber: event.turnNumber,
        engineTurn: event.engineTurn,
        trigger: event.trigger,
        remainingMs: event.remainingMs,
        outstandingPlayers: event.outstandingPlayers,
        missedPlayers: event.missedPlayers,
      };
    case 'ADVANCE_FAILED':
      return { type: 'advance_failed', turnNumber: event.turnNumber, phase: event.phase, code: event.code, reason: event.reason };
    case 'TURN_STALLED':
      return { type: 'turn_stalled', turnNumber: event.turnNumber, attempts: event.attempts, reason: event.reason };
    case 'TURN_DISCARDED':
      return { type: 'turn_discarded', turnNumber: event.turnNumber };
    case 'ROLLED_BACK':
      return {
        type: 'rollback',
        toTurnNumber: event.toTurnNumber,
        snapshotId: event.snapshotId,
        discardedTurns: event.discardedTurns,
      };
  }
}

/**
 * Registry of active session loggers.
 */
const loggers = new Map<string, SessionLogger>();

/**
 * Gets or creates a logger for a session.
 */
export function getSessionLogger(sessionId: string, logsDir?: string): SessionLogger {
  let logger = loggers.get(sessionId);
  if (!logger) {
    logger = new SessionLogger(sessionId, logsDir);
    loggers.set(sessionId, logger);
  }
  return logger;
}

/**
 * Removes a logger from the registry.
 */
export function removeSessionLogger(sessionId: string): void {
  loggers.delete(sessionId);
}

/**
 * Subscribes per-session file logging to a host event source.
 * Returns the unsubscribe function.
 */
export function attachSessionLogging(
  source: { onEvent(callback: HostEventCallback): () => void },
  logsDir?: string
): () => void {
  return source.onEvent((event) => {
    getSessionLogger(event.sessionId, logsDir).log(toLogEvent(event), event.timestamp);
  });
}

function isSessionLogEntry(value: unknown): value is SessionLogEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('timestamp' in value) || !('sessionId' in value) || !('event' in value)) return false;
  const event = value.event;
  return typeof event === 'object' && event !== null && 'type' in event && typeof event.type === 'string';
}

/**
 * Reads all log entries from a session log file.
 */
export function readSessionLogs(sessionId: string, logsDir?: string): SessionLogEntry[] {
  const logPath = join(logsDir || defaultLogsDir(), `${sessionId}.jsonl`);

  if (!existsSync(logPath)) {
    return [];
  }

  const content = readFileSync(logPath, 'utf-8');
  const lines = content.trim().split('\n').filter(line => line.length > 0);

  const entries: SessionLogEntry[] = [];
  for (const line of lines) {
    try {
      const parsed: unknown = JSON.parse(line);
      if (isSessionLogEntry(parsed)) entries.push(parsed);
    } catch {
      // Torn last line from a crash mid-write
      continue;
    }
  }
  return entries;
}

/**
 * Lists all available session log files.
 */
export function listSessionLogs(logsDir?: string): { sessionId: string; path: string; size: number }[] {
  const baseDir = logsDir || defaultLogsDir();

  if (!existsSync(baseDir)) {
    return [];
  }

  return readdirSync(baseDir)
    .filter(f => f.endsWith('.jsonl'))
    .map(f => {
      const fullPath = join(baseDir, f);
      return {
        sessionId: basename(f, '.jsonl'),
        path: fullPath,
        size: statSync(fullPath).size,
      };
    });
}

/**
 * Filters log entries by type.
 */
export function filterLogsByType(logs: SessionLogEntry[], types: SessionLogEvent['type'][]): SessionLogEntry[] {
  return logs.filter(entry => types.includes(entry.event.type));
}
