/**
 * Host error types.
 *
 * Every public operation of the host either succeeds or fails with a
 * `HostError` carrying a stable code. The HTTP layer maps codes to status
 * codes, and `toErrorResult` turns anything thrown into a structured value
 * the chat layer can render.
 */

/**
 * Stable error codes surfaced to callers.
 */
export enum HostErrorCode {
  // Lifecycle
  INVALID_STATE_TRANSITION = 'INVALID_STATE_TRANSITION',
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
  SESSION_NOT_RUNNING = 'SESSION_NOT_RUNNING',

  // Extension ledger
  LIMIT_EXCEEDED = 'LIMIT_EXCEEDED',
  INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
  PLAYER_NOT_FOUND = 'PLAYER_NOT_FOUND',

  // Turn orchestration
  BACKUP_FAILURE = 'BACKUP_FAILURE',
  PROCESS_UNRESPONSIVE = 'PROCESS_UNRESPONSIVE',
  PROCESS_START_FAILED = 'PROCESS_START_FAILED',
  CONCURRENT_ADVANCE_IN_PROGRESS = 'CONCURRENT_ADVANCE_IN_PROGRESS',
  SESSION_FAILED = 'SESSION_FAILED',
  NO_UNRESOLVED_TURN = 'NO_UNRESOLVED_TURN',
  TURN_NOT_FOUND = 'TURN_NOT_FOUND',

  // Generic
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * HTTP status codes for error codes.
 */
export const ERROR_HTTP_STATUS: Record<HostErrorCode, number> = {
  [HostErrorCode.INVALID_STATE_TRANSITION]: 409,
  [HostErrorCode.SESSION_NOT_FOUND]: 404,
  [HostErrorCode.SESSION_NOT_RUNNING]: 409,

  [HostErrorCode.LIMIT_EXCEEDED]: 429,
  [HostErrorCode.INSUFFICIENT_BALANCE]: 402,
  [HostErrorCode.PLAYER_NOT_FOUND]: 404,

  [HostErrorCode.BACKUP_FAILURE]: 500,
  [HostErrorCode.PROCESS_UNRESPONSIVE]: 504,
  [HostErrorCode.PROCESS_START_FAILED]: 502,
  [HostErrorCode.CONCURRENT_ADVANCE_IN_PROGRESS]: 409,
  [HostErrorCode.SESSION_FAILED]: 409,
  [HostErrorCode.NO_UNRESOLVED_TURN]: 409,
  [HostErrorCode.TURN_NOT_FOUND]: 404,

  [HostErrorCode.INVALID_ARGUMENT]: 400,
  [HostErrorCode.INTERNAL_ERROR]: 500,
};

export type ErrorContext = Record<string, string | number | boolean | null>;

/**
 * Serialized error shape.
 */
export interface HostErrorInfo {
  code: HostErrorCode;
  message: string;
  context: ErrorContext;
}

/**
 * Base class for all host errors.
 */
export class HostError extends Error {
  readonly code: HostErrorCode;
  readonly context: ErrorContext;

  constructor(code: HostErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'HostError';
    this.code = code;
    this.context = context;
  }

  get httpStatus(): number {
    return ERROR_HTTP_STATUS[this.code];
  }

  toJSON(): HostErrorInfo {
    return { code: this.code, message: this.message, context: this.context };
  }
}

export class InvalidStateTransitionError extends HostError {
  constructor(sessionId: string, from: string, event: string) {
    super(
      HostErrorCode.INVALID_STATE_TRANSITION,
      `Cannot apply '${event}' to session ${sessionId} in state ${from}`,
      { sessionId, from, event }
    );
    this.name = 'InvalidStateTransitionError';
  }
}

export class SessionNotFoundError extends HostError {
  constructor(sessionId: string) {
    super(HostErrorCode.SESSION_NOT_FOUND, `Session ${sessionId} not found`, { sessionId });
    this.name = 'SessionNotFoundError';
  }
}

export class SessionNotRunningError extends HostError {
  constructor(sessionId: string, state: string) {
    super(
      HostErrorCode.SESSION_NOT_RUNNING,
      `Session ${sessionId} has no running game process (state ${state})`,
      { sessionId, state }
    );
    this.name = 'SessionNotRunningError';
  }
}

export class LimitExceededError extends HostError {
  constructor(sessionId: string, player: string, limit: number) {
    super(
      HostErrorCode.LIMIT_EXCEEDED,
      `${player} already used ${limit} extension(s) this turn`,
      { sessionId, player, limit }
    );
    this.name = 'LimitExceededError';
  }
}

export class InsufficientBalanceError extends HostError {
  constructor(sessionId: string, player: string, balanceMs: number, requestedMs: number) {
    super(
      HostErrorCode.INSUFFICIENT_BALANCE,
      `${player} has ${balanceMs}ms banked, ${requestedMs}ms requested`,
      { sessionId, player, balanceMs, requestedMs }
    );
    this.name = 'InsufficientBalanceError';
  }
}

export class PlayerNotFoundError extends HostError {
  constructor(sessionId: string, player: string) {
    super(HostErrorCode.PLAYER_NOT_FOUND, `Player ${player} is not registered in session ${sessionId}`, {
      sessionId,
      player,
    });
    this.name = 'PlayerNotFoundError';
  }
}

export class BackupFailureError extends HostError {
  constructor(sessionId: string, turnNumber: number, phase: string, reason: string) {
    super(
      HostErrorCode.BACKUP_FAILURE,
      `${phase} backup for session ${sessionId} turn ${turnNumber} failed: ${reason}`,
      { sessionId, turnNumber, phase, reason }
    );
    this.name = 'BackupFailureError';
  }
}

export class ProcessUnresponsiveError extends HostError {
  constructor(sessionId: string, attempts: number, reason: string) {
    super(
      HostErrorCode.PROCESS_UNRESPONSIVE,
      `Game process for session ${sessionId} did not advance after ${attempts} attempt(s): ${reason}`,
      { sessionId, attempts, reason }
    );
    this.name = 'ProcessUnresponsiveError';
  }
}

export class ProcessStartError extends HostError {
  constructor(sessionId: string, reason: string) {
    super(HostErrorCode.PROCESS_START_FAILED, `Failed to start game process for session ${sessionId}: ${reason}`, {
      sessionId,
      reason,
    });
    this.name = 'ProcessStartError';
  }
}

export class ConcurrentAdvanceInProgressError extends HostError {
  constructor(sessionId: string) {
    super(
      HostErrorCode.CONCURRENT_ADVANCE_IN_PROGRESS,
      `Session ${sessionId} is busy with another operation, try again later`,
      { sessionId }
    );
    this.name = 'ConcurrentAdvanceInProgressError';
  }
}

export class SessionFailedError extends HostError {
  constructor(sessionId: string, turnNumber: number, failure: string) {
    super(
      HostErrorCode.SESSION_FAILED,
      `Turn ${turnNumber} of session ${sessionId} failed and needs operator recovery: ${failure}`,
      { sessionId, turnNumber, failure }
    );
    this.name = 'SessionFailedError';
  }
}

export class NoUnresolvedTurnError extends HostError {
  constructor(sessionId: string) {
    super(HostErrorCode.NO_UNRESOLVED_TURN, `Session ${sessionId} has no unresolved turn`, { sessionId });
    this.name = 'NoUnresolvedTurnError';
  }
}

export class TurnNotFoundError extends HostError {
  constructor(sessionId: string, turnNumber: number) {
    super(HostErrorCode.TURN_NOT_FOUND, `Session ${sessionId} has no restorable turn ${turnNumber}`, {
      sessionId,
      turnNumber,
    });
    this.name = 'TurnNotFoundError';
  }
}

export class InvalidArgumentError extends HostError {
  constructor(message: string, context: ErrorContext = {}) {
    super(HostErrorCode.INVALID_ARGUMENT, message, context);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Type guard for host errors.
 */
export function isHostError(error: unknown): error is HostError {
  return error instanceof HostError;
}

/**
 * Structured result of a public operation.
 */
export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: HostErrorInfo };

/**
 * Converts a thrown value into a structured error.
 */
export function toErrorInfo(error: unknown): HostErrorInfo {
  if (isHostError(error)) {
    return error.toJSON();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: HostErrorCode.INTERNAL_ERROR, message, context: {} };
}

export function toErrorResult<T>(error: unknown): OperationResult<T> {
  return { ok: false, error: toErrorInfo(error) };
}

export function okResult<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}
