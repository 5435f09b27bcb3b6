/**
 * Types for hosted session lifecycle.
 */

/**
 * Unique identifier for a hosted session.
 */
export type SessionId = string;

/**
 * Session lifecycle tag.
 *
 * The legacy model kept three independent flags (active, started, ended);
 * the tag is the single source of truth and the flags are derived from it.
 */
export type LifecycleTag =
  | 'CREATED'   // Lobby exists, no game process yet
  | 'LAUNCHED'  // Game process launched, waiting for first turn
  | 'STARTED'   // First turn accepted
  | 'ENDED'     // Game ended by explicit action
  | 'DELETED';  // Lobby deleted (inactive)

/**
 * Events accepted by the lifecycle state machine.
 */
export type LifecycleEvent =
  | 'launch'
  | 'startPlay'
  | 'endGame'
  | 'deleteLobby'
  | 'resetStarted';

/**
 * Legacy boolean view of the lifecycle.
 */
export interface SessionFlags {
  active: boolean;
  started: boolean;
  ended: boolean;
}

/**
 * A hosted game session.
 */
export interface Session {
  id: SessionId;
  name: string;
  /** Map/mod configuration, stored and returned untouched */
  config: unknown;
  /** Live game state folder that snapshots copy from and restore into */
  workingDir: string;
  lifecycle: LifecycleTag;
  defaultTurnDurationMs: number;
  /** Extensions a player may spend per turn (null = unlimited) */
  maxExtensionsPerTurn: number | null;
  /** Starting balance of each player time bank */
  initialBankMs: number;
  /** Added to every time bank when a turn completes (0 = none) */
  perTurnBankBonusMs: number;
  processPid: number | null;
  createdAt: number;
}

/**
 * Input for creating a session.
 */
export interface CreateSessionInput {
  name: string;
  workingDir: string;
  config?: unknown;
  defaultTurnDurationMs?: number;
  maxExtensionsPerTurn?: number | null;
  initialBankMs?: number;
  perTurnBankBonusMs?: number;
}
