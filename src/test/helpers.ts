/**
 * Shared fixtures for host tests: in-memory database, manual clock, a fake
 * game process, and a fully wired TurnHost over temporary folders.
 */

import type Database from 'better-sqlite3';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { MEMORY_DB, openDb } from '../db/connection';
import { migrate } from '../db/migrations';
import { HostRepository } from '../db/repository';
import type { HostErrorCode, HostErrorInfo, OperationResult } from '../errors';
import type { Session } from '../lifecycle/types';
import { TurnHost, TurnHostOptions } from '../orchestration/host';
import type { HostEvent, HostEventType } from '../orchestration/types';
import type { ProcessHandle, StatusProbe } from '../process/types';

export const START_TIME = Date.UTC(2026, 0, 1);

export function createTestRepo(): { db: Database.Database; repo: HostRepository } {
  const db = openDb(MEMORY_DB);
  migrate(db);
  return { db, repo: new HostRepository(db) };
}

/**
 * Clock that only moves when told to.
 */
export class ManualClock {
  private current: number;

  constructor(start: number = START_TIME) {
    this.current = start;
  }

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export function makeTempDir(prefix: string = 'turnkeeper-test-'): string {
  return mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Creates a folder holding the given files.
 */
export function writeFolder(dir: string, files: Record<string, string>): string {
  mkdirSync(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(path.join(dir, name), content);
  }
  return dir;
}

let nextPid = 4000;

export interface FakeProcessOptions {
  pid?: number | null;
  alive?: boolean;
  engineTurn?: number;
}

/**
 * In-memory stand-in for a game engine process. Each advance signal bumps
 * the engine turn unless `advancesOnSignal` is off.
 */
export class FakeProcessHandle implements ProcessHandle {
  pid: number | null;
  alive: boolean;
  engineTurn: number;
  advancesOnSignal = true;
  hasStatus = true;
  outstanding: string[] = [];
  missed: string[] = [];
  failure = 'No log file found';
  startError: Error | null = null;
  /** Runs after the engine turn moved on a signal */
  onSignal: ((handle: FakeProcessHandle) => void) | null = null;

  signals = 0;
  starts = 0;
  stops = 0;

  constructor(options: FakeProcessOptions = {}) {
    this.pid = options.pid ?? null;
    this.alive = options.alive ?? false;
    this.engineTurn = options.engineTurn ?? 0;
  }

  async start(): Promise<void> {
    if (this.startError) throw this.startError;
    this.starts++;
    this.alive = true;
    this.pid = nextPid++;
  }

  async stop(): Promise<void> {
    this.stops++;
    this.alive = false;
  }

  async isAlive(): Promise<boolean> {
    return this.alive;
  }

  async signalAdvance(): Promise<void> {
    this.signals++;
    if (this.advancesOnSignal) {
      this.engineTurn++;
      this.onSignal?.(this);
    }
  }

  async probeStatus(): Promise<StatusProbe | null> {
    if (!this.hasStatus) return null;
    return {
      engineTurn: this.engineTurn,
      nations: [],
      outstandingPlayers: [...this.outstanding],
      missedPlayers: [...this.missed],
    };
  }

  async describeFailure(): Promise<string> {
    return this.failure;
  }
}

/**
 * Unwraps a successful result, failing the test otherwise.
 */
export function expectOk<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

/**
 * Unwraps a failed result, failing the test unless it carries `code`.
 */
export function expectError<T>(result: OperationResult<T>, code: HostErrorCode): HostErrorInfo {
  if (result.ok) {
    throw new Error(`Expected ${code}, got success`);
  }
  if (result.error.code !== code) {
    throw new Error(`Expected ${code}, got ${result.error.code}: ${result.error.message}`);
  }
  return result.error;
}

/**
 * Recorded events of one type.
 */
export function eventsOfType<K extends HostEventType>(
  events: HostEvent[],
  type: K
): Extract<HostEvent, { type: K }>[] {
  return events.filter((event): event is Extract<HostEvent, { type: K }> => event.type === type);
}

/**
 * Orchestrator timings small enough for tests.
 */
export const FAST_ORCHESTRATOR = {
  backupTimeoutMs: 2000,
  signalTimeoutMs: 200,
  confirmTimeoutMs: 20,
  confirmPollIntervalMs: 5,
  maxAdvanceAttempts: 2,
  retryBaseDelayMs: 1,
};

export interface TestHostOptions {
  db?: Database.Database;
  root?: string;
  onHandleCreated?: (handle: FakeProcessHandle, session: Session) => void;
  overrides?: Partial<TurnHostOptions>;
}

export interface TestHost {
  host: TurnHost;
  db: Database.Database;
  clock: ManualClock;
  root: string;
  events: HostEvent[];
  handle(sessionId: string): FakeProcessHandle;
  /** Creates a working folder under the test root */
  workingDir(name: string, files?: Record<string, string>): string;
  /** Creates a session over a fresh working folder and launches it */
  launchSession(name?: string, turnDurationMs?: number): Promise<Session>;
}

/**
 * Wires a TurnHost over an in-memory database, a temporary backup folder and
 * fake game processes. Background loops are slow enough to never fire.
 */
export function createTestHost(options: TestHostOptions = {}): TestHost {
  const db = options.db ?? openDb(MEMORY_DB);
  const root = options.root ?? makeTempDir();
  const clock = new ManualClock();
  const handles = new Map<string, FakeProcessHandle>();
  const events: HostEvent[] = [];

  const host = new TurnHost({
    db,
    backupDir: path.join(root, 'backups'),
    processFactory: (session) => {
      // An adopted session keeps running under its recorded pid
      const handle = new FakeProcessHandle({ pid: session.processPid, alive: session.processPid !== null });
      handles.set(session.id, handle);
      options.onHandleCreated?.(handle, session);
      return handle;
    },
    scheduler: { tickIntervalMs: 60_000, warningThresholdMs: 0 },
    monitor: { monitorIntervalMs: 60_000 },
    orchestrator: FAST_ORCHESTRATOR,
    now: clock.now,
    ...options.overrides,
  });
  host.onEvent((event) => events.push(event));

  const workingDir = (name: string, files: Record<string, string> = { 'game.trn': 'state-0' }): string =>
    writeFolder(path.join(root, 'games', name), files);

  return {
    host,
    db,
    clock,
    root,
    events,
    handle(sessionId) {
      const handle = handles.get(sessionId);
      if (!handle) throw new Error(`No process handle for ${sessionId}`);
      return handle;
    },
    workingDir,
    async launchSession(name = 'test-game', turnDurationMs = 1440 * 1000) {
      const session = expectOk(
        await host.createSession({ name, workingDir: workingDir(name), defaultTurnDurationMs: turnDurationMs })
      );
      return expectOk(await host.launch(session.id));
    },
  };
}
