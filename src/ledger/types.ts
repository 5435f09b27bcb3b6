/**
 * Types for player time banks.
 */

import type { SessionId } from '../lifecycle/types';
import type { TimerState } from '../timer/timer-state';

/**
 * A player's time bank within one session.
 */
export interface PlayerTimeBank {
  sessionId: SessionId;
  player: string;
  balanceMs: number;
  extensionsUsedThisTurn: number;
  /** Extensions allowed per turn (null = unlimited) */
  maxExtensionsPerTurn: number | null;
}

export interface RegisterPlayerOptions {
  /** Starting balance; defaults to the session's initial bank */
  balanceMs?: number;
  /** Per-player limit; defaults to the session's limit */
  maxExtensionsPerTurn?: number | null;
}

/**
 * Result of a granted extension.
 */
export interface ExtensionGrant {
  bank: PlayerTimeBank;
  timer: TimerState;
}
