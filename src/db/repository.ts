/**
 * Persistence for sessions, timers, time banks, turn records and snapshot
 * metadata.
 *
 * Rows are mapped to domain objects at this boundary; nothing above it sees
 * snake_case columns or 0/1 booleans.
 */

import type Database from 'better-sqlite3';
import type { LifecycleTag, Session, SessionId } from '../lifecycle/types';
import type { PlayerTimeBank } from '../ledger/types';
import type { OrchestratorPhase, TriggerKind, TurnRecord } from '../orchestration/types';
import type { BackupPhase, BackupSnapshot } from '../store/types';
import type { TimerState } from '../timer/timer-state';

interface SessionRow {
  id: string;
  name: string;
  config: string;
  working_dir: string;
  lifecycle: LifecycleTag;
  default_turn_duration_ms: number;
  max_extensions_per_turn: number | null;
  initial_bank_ms: number;
  per_turn_bank_bonus_ms: number;
  process_pid: number | null;
  created_at: number;
}

interface TimerRow {
  session_id: string;
  remaining_ms: number;
  running: number;
  paused_at: number | null;
  last_tick: number;
  deadline_raised: number;
  warning_raised: number;
}

interface BankRow {
  session_id: string;
  player: string;
  balance_ms: number;
  extensions_used_this_turn: number;
  max_extensions_per_turn: number | null;
}

interface TurnRecordRow {
  session_id: string;
  turn_number: number;
  phase: OrchestratorPhase;
  trigger: TriggerKind;
  failed: number;
  failure: string | null;
  baseline_engine_turn: number | null;
  engine_turn: number | null;
  pre_backup_ref: string | null;
  post_backup_ref: string | null;
  started_at: number;
  completed_at: number | null;
}

interface SnapshotRow {
  id: string;
  session_id: string;
  turn_number: number;
  phase: BackupPhase;
  location_ref: string;
  checksum: string;
  file_count: number;
  written_at: number;
}

function parseConfig(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    console.warn('[HostRepository] Unreadable session config, using empty object:', err);
    return {};
  }
}

function toSessionRow(session: Session): SessionRow {
  return {
    id: session.id,
    name: session.name,
    config: JSON.stringify(session.config ?? {}),
    working_dir: session.workingDir,
    lifecycle: session.lifecycle,
    default_turn_duration_ms: session.defaultTurnDurationMs,
    max_extensions_per_turn: session.maxExtensionsPerTurn,
    initial_bank_ms: session.initialBankMs,
    per_turn_bank_bonus_ms: session.perTurnBankBonusMs,
    process_pid: session.processPid,
    created_at: session.createdAt,
  };
}

function fromSessionRow(row: SessionRow): Session {
  return {
    id: row.id,
    name: row.name,
    config: parseConfig(row.config),
    workingDir: row.working_dir,
    lifecycle: row.lifecycle,
    defaultTurnDurationMs: row.default_turn_duration_ms,
    maxExtensionsPerTurn: row.max_extensions_per_turn,
    initialBankMs: row.initial_bank_ms,
    perTurnBankBonusMs: row.per_turn_bank_bonus_ms,
    processPid: row.process_pid,
    createdAt: row.created_at,
  };
}

function toTimerRow(timer: TimerState): TimerRow {
  return {
    session_id: timer.sessionId,
    remaining_ms: Math.round(timer.remainingMs),
    running: timer.running ? 1 : 0,
    paused_at: timer.pausedAt,
    last_tick: timer.lastTick,
    deadline_raised: timer.deadlineRaised ? 1 : 0,
    warning_raised: timer.warningRaised ? 1 : 0,
  };
}

function fromTimerRow(row: TimerRow): TimerState {
  return {
    sessionId: row.session_id,
    remainingMs: row.remaining_ms,
    running: row.running === 1,
    pausedAt: row.paused_at,
    lastTick: row.last_tick,
    deadlineRaised: row.deadline_raised === 1,
    warningRaised: row.warning_raised === 1,
  };
}

function toBankRow(bank: PlayerTimeBank): BankRow {
  return {
    session_id: bank.sessionId,
    player: bank.player,
    balance_ms: bank.balanceMs,
    extensions_used_this_turn: bank.extensionsUsedThisTurn,
    max_extensions_per_turn: bank.maxExtensionsPerTurn,
  };
}

function fromBankRow(row: BankRow): PlayerTimeBank {
  return {
    sessionId: row.session_id,
    player: row.player,
    balanceMs: row.balance_ms,
    extensionsUsedThisTurn: row.extensions_used_this_turn,
    maxExtensionsPerTurn: row.max_extensions_per_turn,
  };
}

function toTurnRecordRow(record: TurnRecord): TurnRecordRow {
  return {
    session_id: record.sessionId,
    turn_number: record.turnNumber,
    phase: record.phase,
    trigger: record.trigger,
    failed: record.failed ? 1 : 0,
    failure: record.failure,
    baseline_engine_turn: record.baselineEngineTurn,
    engine_turn: record.engineTurn,
    pre_backup_ref: record.preBackupRef,
    post_backup_ref: record.postBackupRef,
    started_at: record.startedAt,
    completed_at: record.completedAt,
  };
}

function fromTurnRecordRow(row: TurnRecordRow): TurnRecord {
  return {
    sessionId: row.session_id,
    turnNumber: row.turn_number,
    phase: row.phase,
    trigger: row.trigger,
    failed: row.failed === 1,
    failure: row.failure,
    baselineEngineTurn: row.baseline_engine_turn,
    engineTurn: row.engine_turn,
    preBackupRef: row.pre_backup_ref,
    postBackupRef: row.post_backup_ref,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}

function toSnapshotRow(snapshot: BackupSnapshot): SnapshotRow {
  return {
    id: snapshot.id,
    session_id: snapshot.sessionId,
    turn_number: snapshot.turnNumber,
    phase: snapshot.phase,
    location_ref: snapshot.locationRef,
    checksum: snapshot.checksum,
    file_count: snapshot.fileCount,
    written_at: snapshot.writtenAt,
  };
}

function fromSnapshotRow(row: SnapshotRow): BackupSnapshot {
  return {
    id: row.id,
    sessionId: row.session_id,
    turnNumber: row.turn_number,
    phase: row.phase,
    locationRef: row.location_ref,
    checksum: row.checksum,
    fileCount: row.file_count,
    writtenAt: row.written_at,
  };
}

export class HostRepository {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Runs `fn` in one SQLite transaction. Nested calls join the outer one.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  insertSession(session: Session): void {
    this.db
      .prepare<SessionRow>(
        `INSERT INTO sessions (id, name, config, working_dir, lifecycle, default_turn_duration_ms,
           max_extensions_per_turn, initial_bank_ms, per_turn_bank_bonus_ms, process_pid, created_at)
         VALUES (@id, @name, @config, @working_dir, @lifecycle, @default_turn_duration_ms,
           @max_extensions_per_turn, @initial_bank_ms, @per_turn_bank_bonus_ms, @process_pid, @created_at)`
      )
      .run(toSessionRow(session));
  }

  getSession(sessionId: SessionId): Session | null {
    const row = this.db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?').get(sessionId);
    return row ? fromSessionRow(row) : null;
  }

  listSessions(lifecycles?: LifecycleTag[]): Session[] {
    const rows = this.db
      .prepare<[], SessionRow>('SELECT * FROM sessions ORDER BY created_at, id')
      .all()
      .map(fromSessionRow);
    return lifecycles ? rows.filter((s) => lifecycles.includes(s.lifecycle)) : rows;
  }

  updateSession(session: Session): void {
    this.db
      .prepare<SessionRow>(
        `UPDATE sessions SET name = @name, config = @config, working_dir = @working_dir,
           lifecycle = @lifecycle, default_turn_duration_ms = @default_turn_duration_ms,
           max_extensions_per_turn = @max_extensions_per_turn, initial_bank_ms = @initial_bank_ms,
           per_turn_bank_bonus_ms = @per_turn_bank_bonus_ms, process_pid = @process_pid,
           created_at = @created_at
         WHERE id = @id`
      )
      .run(toSessionRow(session));
  }

  // ---------------------------------------------------------------------------
  // Timers
  // ---------------------------------------------------------------------------

  getTimer(sessionId: SessionId): TimerState | null {
    const row = this.db.prepare<[string], TimerRow>('SELECT * FROM timers WHERE session_id = ?').get(sessionId);
    return row ? fromTimerRow(row) : null;
  }

  saveTimer(timer: TimerState): void {
    this.db
      .prepare<TimerRow>(
        `INSERT INTO timers (session_id, remaining_ms, running, paused_at, last_tick, deadline_raised, warning_raised)
         VALUES (@session_id, @remaining_ms, @running, @paused_at, @last_tick, @deadline_raised, @warning_raised)
         ON CONFLICT (session_id) DO UPDATE SET
           remaining_ms = excluded.remaining_ms,
           running = excluded.running,
           paused_at = excluded.paused_at,
           last_tick = excluded.last_tick,
           deadline_raised = excluded.deadline_raised,
           warning_raised = excluded.warning_raised`
      )
      .run(toTimerRow(timer));
  }

  listTimers(): TimerState[] {
    return this.db.prepare<[], TimerRow>('SELECT * FROM timers ORDER BY session_id').all().map(fromTimerRow);
  }

  listRunningTimers(): TimerState[] {
    return this.db
      .prepare<[], TimerRow>('SELECT * FROM timers WHERE running = 1 ORDER BY session_id')
      .all()
      .map(fromTimerRow);
  }

  // ---------------------------------------------------------------------------
  // Player time banks
  // ---------------------------------------------------------------------------

  insertBank(bank: PlayerTimeBank): void {
    this.db
      .prepare<BankRow>(
        `INSERT INTO player_banks (session_id, player, balance_ms, extensions_used_this_turn, max_extensions_per_turn)
         VALUES (@session_id, @player, @balance_ms, @extensions_used_this_turn, @max_extensions_per_turn)`
      )
      .run(toBankRow(bank));
  }

  getBank(sessionId: SessionId, player: string): PlayerTimeBank | null {
    const row = this.db
      .prepare<[string, string], BankRow>('SELECT * FROM player_banks WHERE session_id = ? AND player = ?')
      .get(sessionId, player);
    return row ? fromBankRow(row) : null;
  }

  saveBank(bank: PlayerTimeBank): void {
    this.db
      .prepare<BankRow>(
        `UPDATE player_banks SET balance_ms = @balance_ms,
           extensions_used_this_turn = @extensions_used_this_turn,
           max_extensions_per_turn = @max_extensions_per_turn
         WHERE session_id = @session_id AND player = @player`
      )
      .run(toBankRow(bank));
  }

  listBanks(sessionId: SessionId): PlayerTimeBank[] {
    return this.db
      .prepare<[string], BankRow>('SELECT * FROM player_banks WHERE session_id = ? ORDER BY player')
      .all(sessionId)
      .map(fromBankRow);
  }

  // ---------------------------------------------------------------------------
  // Turn records
  // ---------------------------------------------------------------------------

  insertTurnRecord(record: TurnRecord): void {
    this.db
      .prepare<TurnRecordRow>(
        `INSERT INTO turn_records (session_id, turn_number, phase, trigger, failed, failure,
           baseline_engine_turn, engine_turn, pre_backup_ref, post_backup_ref, started_at, completed_at)
         VALUES (@session_id, @turn_number, @phase, @trigger, @failed, @failure,
           @baseline_engine_turn, @engine_turn, @pre_backup_ref, @post_backup_ref, @started_at, @completed_at)`
      )
      .run(toTurnRecordRow(record));
  }

  updateTurnRecord(record: TurnRecord): void {
    this.db
      .prepare<TurnRecordRow>(
        `UPDATE turn_records SET phase = @phase, trigger = @trigger, failed = @failed, failure = @failure,
           baseline_engine_turn = @baseline_engine_turn, engine_turn = @engine_turn,
           pre_backup_ref = @pre_backup_ref, post_backup_ref = @post_backup_ref,
           started_at = @started_at, completed_at = @completed_at
         WHERE session_id = @session_id AND turn_number = @turn_number`
      )
      .run(toTurnRecordRow(record));
  }

  getTurnRecord(sessionId: SessionId, turnNumber: number): TurnRecord | null {
    const row = this.db
      .prepare<[string, number], TurnRecordRow>(
        'SELECT * FROM turn_records WHERE session_id = ? AND turn_number = ?'
      )
      .get(sessionId, turnNumber);
    return row ? fromTurnRecordRow(row) : null;
  }

  getLatestTurnRecord(sessionId: SessionId): TurnRecord | null {
    const row = this.db
      .prepare<[string], TurnRecordRow>(
        'SELECT * FROM turn_records WHERE session_id = ? ORDER BY turn_number DESC LIMIT 1'
      )
      .get(sessionId);
    return row ? fromTurnRecordRow(row) : null;
  }

  /**
   * The record still in flight or failed, if any. At most one exists per session.
   */
  getUnresolvedTurnRecord(sessionId: SessionId): TurnRecord | null {
    const row = this.db
      .prepare<[string], TurnRecordRow>(
        `SELECT * FROM turn_records WHERE session_id = ? AND phase != 'COMPLETED'
         ORDER BY turn_number DESC LIMIT 1`
      )
      .get(sessionId);
    return row ? fromTurnRecordRow(row) : null;
  }

  listTurnRecords(sessionId: SessionId): TurnRecord[] {
    return this.db
      .prepare<[string], TurnRecordRow>('SELECT * FROM turn_records WHERE session_id = ? ORDER BY turn_number')
      .all(sessionId)
      .map(fromTurnRecordRow);
  }

  /**
   * Deletes every record after `turnNumber`. Returns the deleted turn numbers.
   */
  deleteTurnRecordsAfter(sessionId: SessionId, turnNumber: number): number[] {
    const doomed = this.db
      .prepare<[string, number], { turn_number: number }>(
        'SELECT turn_number FROM turn_records WHERE session_id = ? AND turn_number > ? ORDER BY turn_number'
      )
      .all(sessionId, turnNumber)
      .map((row) => row.turn_number);
    this.db
      .prepare<[string, number]>('DELETE FROM turn_records WHERE session_id = ? AND turn_number > ?')
      .run(sessionId, turnNumber);
    return doomed;
  }

  // ---------------------------------------------------------------------------
  // Backup snapshots
  // ---------------------------------------------------------------------------

  insertSnapshot(snapshot: BackupSnapshot): void {
    this.db
      .prepare<SnapshotRow>(
        `INSERT INTO backup_snapshots (id, session_id, turn_number, phase, location_ref, checksum, file_count, written_at)
         VALUES (@id, @session_id, @turn_number, @phase, @location_ref, @checksum, @file_count, @written_at)`
      )
      .run(toSnapshotRow(snapshot));
  }

  getSnapshot(snapshotId: string): BackupSnapshot | null {
    const row = this.db
      .prepare<[string], SnapshotRow>('SELECT * FROM backup_snapshots WHERE id = ?')
      .get(snapshotId);
    return row ? fromSnapshotRow(row) : null;
  }

  listSnapshots(sessionId: SessionId, turnNumber?: number): BackupSnapshot[] {
    const rows = this.db
      .prepare<[string], SnapshotRow>(
        'SELECT * FROM backup_snapshots WHERE session_id = ? ORDER BY turn_number, written_at, id'
      )
      .all(sessionId)
      .map(fromSnapshotRow);
    return turnNumber === undefined ? rows : rows.filter((s) => s.turnNumber === turnNumber);
  }
}
