/**
 * Types for controlling a game engine process.
 */

import type { Session } from '../lifecycle/types';

/**
 * Submission state of one nation for the current turn.
 */
export type TurnStatus = 'undone' | 'unfinished' | 'done';

/**
 * One nation line from the engine's status dump.
 */
export interface NationStatus {
  nationId: number;
  pretenderId: number;
  /** -1 eliminated, 0 empty, 1 human, 2 AI */
  playerStatus: number;
  aiLevel: number;
  turnStatus: TurnStatus;
  name: string;
}

/**
 * What a status probe reveals about the running game.
 */
export interface StatusProbe {
  /** The engine's own turn counter */
  engineTurn: number;
  nations: NationStatus[];
  /** Nations that have not submitted for the current turn */
  outstandingPlayers: string[];
  /** Nations that missed the previous turn */
  missedPlayers: string[];
}

/**
 * Control surface over one running game engine instance.
 *
 * Only the turn orchestrator holds handles; every other component goes
 * through it.
 */
export interface ProcessHandle {
  readonly pid: number | null;
  start(): Promise<void>;
  stop(): Promise<void>;
  isAlive(): Promise<boolean>;
  /** Ask the engine to process the current turn now */
  signalAdvance(): Promise<void>;
  /** Read the engine's status artifact, or null when none is available */
  probeStatus(): Promise<StatusProbe | null>;
  /** Short human-readable explanation of why the process is down */
  describeFailure(): Promise<string>;
}

/**
 * Builds the handle for a session when it is launched.
 */
export type ProcessHandleFactory = (session: Session) => ProcessHandle;
