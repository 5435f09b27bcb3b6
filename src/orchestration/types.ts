/**
 * Types for turn orchestration.
 *
 * The orchestration layer drives the backup, advance, backup, notify
 * protocol for every hosted session and reports what happened through
 * host events.
 */

import type { HostErrorCode } from '../errors';
import type { LifecycleEvent, LifecycleTag, SessionId } from '../lifecycle/types';
import type { BackupPhase } from '../store/types';

/**
 * Orchestrator phase of a turn advance. Persisted on the turn record so an
 * interrupted advance resumes where it stopped.
 */
export type OrchestratorPhase =
  | 'IDLE'                    // No advance in flight
  | 'PRE_BACKUP_IN_FLIGHT'    // Taking the pre-advance snapshot
  | 'ADVANCING'               // Engine is processing the turn
  | 'POST_BACKUP_IN_FLIGHT'   // Taking the post-advance snapshot
  | 'NOTIFYING'               // Resetting clocks and notifying
  | 'COMPLETED';              // Turn fully recorded

/**
 * What caused an advance.
 */
export type TurnTrigger =
  | { kind: 'deadline' }
  | { kind: 'turn-completed'; engineTurn: number }
  | { kind: 'force'; nextTurnDurationMs?: number }
  | { kind: 'resume' }
  | { kind: 'recovery' }
  | { kind: 'hook' };

export type TriggerKind = TurnTrigger['kind'];

/**
 * One turn advance. Turn numbers are contiguous from 1; turn 0 is the
 * pre-game state and has no record.
 */
export interface TurnRecord {
  sessionId: SessionId;
  turnNumber: number;
  phase: OrchestratorPhase;
  trigger: TriggerKind;
  failed: boolean;
  failure: string | null;
  /** Engine turn counter observed before the advance */
  baselineEngineTurn: number | null;
  /** Engine turn counter confirmed after the advance */
  engineTurn: number | null;
  preBackupRef: string | null;
  postBackupRef: string | null;
  startedAt: number;
  completedAt: number | null;
}

/**
 * Outcome of a completed advance, relayed to the caller.
 */
export interface TurnAdvanceResult {
  sessionId: SessionId;
  turnNumber: number;
  engineTurn: number | null;
  remainingMs: number;
  deadline: number | null;
  outstandingPlayers: string[];
  missedPlayers: string[];
}

/**
 * Configuration for the turn orchestrator.
 */
export interface OrchestratorConfig {
  /** Limit on one snapshot write or restore */
  backupTimeoutMs: number;
  /** Limit on delivering one advance signal */
  signalTimeoutMs: number;
  /** How long to wait for the engine to confirm one signal */
  confirmTimeoutMs: number;
  /** Interval between confirmation probes */
  confirmPollIntervalMs: number;
  /** Signals sent before the turn is declared stalled */
  maxAdvanceAttempts: number;
  /** Base delay between attempts, doubled each retry */
  retryBaseDelayMs: number;
  /** Engine turn that marks the lobby becoming turn 1 */
  firstEngineTurn: number;
}

/**
 * Default orchestrator configuration.
 */
export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  backupTimeoutMs: 60 * 1000,         // 1 minute
  signalTimeoutMs: 10 * 1000,         // 10 seconds
  confirmTimeoutMs: 2 * 60 * 1000,    // 2 minutes
  confirmPollIntervalMs: 1000,        // 1 second
  maxAdvanceAttempts: 3,
  retryBaseDelayMs: 2000,             // 2 seconds
  firstEngineTurn: 1,
};

/**
 * Types of events emitted by the host.
 */
export type HostEventType =
  | 'SESSION_CREATED'
  | 'SESSION_TRANSITIONED'
  | 'PROCESS_STARTED'
  | 'PROCESS_DIED'
  | 'TIMER_UPDATED'
  | 'TIMER_WARNING'
  | 'EXTENSION_GRANTED'
  | 'TURN_ADVANCED'
  | 'ADVANCE_FAILED'
  | 'TURN_STALLED'
  | 'TURN_DISCARDED'
  | 'ROLLED_BACK';

/**
 * Base structure for host events.
 */
export interface HostEventBase {
  type: HostEventType;
  sessionId: SessionId;
  timestamp: Date;
}

export interface SessionCreatedEvent extends HostEventBase {
  type: 'SESSION_CREATED';
  name: string;
}

export interface SessionTransitionedEvent extends HostEventBase {
  type: 'SESSION_TRANSITIONED';
  from: LifecycleTag;
  to: LifecycleTag;
  event: LifecycleEvent;
  /** Operator escape hatch outside the normal order */
  privileged: boolean;
}

export interface ProcessStartedEvent extends HostEventBase {
  type: 'PROCESS_STARTED';
  pid: number | null;
}

/**
 * Event when the game process is found dead. The timer is paused.
 */
export interface ProcessDiedEvent extends HostEventBase {
  type: 'PROCESS_DIED';
  pid: number | null;
  reason: string;
}

export type TimerAction = 'pause' | 'resume' | 'extend' | 'set-remaining' | 'set-default';

export interface TimerUpdatedEvent extends HostEventBase {
  type: 'TIMER_UPDATED';
  action: TimerAction;
  remainingMs: number;
  running: boolean;
  defaultTurnDurationMs: number;
}

/**
 * Event when the turn clock drops below the warning threshold.
 */
export interface TimerWarningEvent extends HostEventBase {
  type: 'TIMER_WARNING';
  remainingMs: number;
  deadline: Date | null;
  /** Players that haven't submitted yet */
  outstandingPlayers: string[];
}

export interface ExtensionGrantedEvent extends HostEventBase {
  type: 'EXTENSION_GRANTED';
  player: string;
  deltaMs: number;
  balanceMs: number;
  extensionsUsedThisTurn: number;
  remainingMs: number;
}

export interface TurnAdvancedEvent extends HostEventBase {
  type: 'TURN_ADVANCED';
  turnNumber: number;
  engineTurn: number | null;
  trigger: TriggerKind;
  deadline: Date | null;
  remainingMs: number;
  outstandingPlayers: string[];
  /** Players that didn't play the turn just processed */
  missedPlayers: string[];
}

/**
 * Event when an advance stops short. The turn record stays unresolved.
 */
export interface AdvanceFailedEvent extends HostEventBase {
  type: 'ADVANCE_FAILED';
  turnNumber: number;
  phase: OrchestratorPhase;
  trigger: TriggerKind;
  code: HostErrorCode;
  reason: string;
  backupPhase: BackupPhase | null;
}

/**
 * Event when the engine did not confirm the advance after every retry.
 */
export interface TurnStalledEvent extends HostEventBase {
  type: 'TURN_STALLED';
  turnNumber: number;
  attempts: number;
  reason: string;
}

export interface TurnDiscardedEvent extends HostEventBase {
  type: 'TURN_DISCARDED';
  turnNumber: number;
}

export interface RolledBackEvent extends HostEventBase {
  type: 'ROLLED_BACK';
  toTurnNumber: number;
  snapshotId: string;
  snapshotPhase: BackupPhase;
  /** Turn numbers removed from history */
  discardedTurns: number[];
}

/**
 * Union of all host events.
 */
export type HostEvent =
  | SessionCreatedEvent
  | SessionTransitionedEvent
  | ProcessStartedEvent
  | ProcessDiedEvent
  | TimerUpdatedEvent
  | TimerWarningEvent
  | ExtensionGrantedEvent
  | TurnAdvancedEvent
  | AdvanceFailedEvent
  | TurnStalledEvent
  | TurnDiscardedEvent
  | RolledBackEvent;

/**
 * Callback type for host event listeners.
 */
export type HostEventCallback = (event: HostEvent) => void;

/**
 * Distributes an event type over the union so each variant keeps its own fields.
 */
type WithoutTimestamp<E> = E extends HostEvent ? Omit<E, 'timestamp'> : never;

/**
 * Event as emitted by components; the emitter stamps the time.
 */
export type HostEventInput = WithoutTimestamp<HostEvent>;
