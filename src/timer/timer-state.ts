/**
 * Turn timer state and the pure operations on it.
 *
 * All functions return a new state; persistence and locking are the
 * caller's concern. Elapsed time is only ever taken from `lastTick` while
 * the timer is running, so paused time is never credited.
 */

import type { SessionId } from '../lifecycle/types';

export interface TimerState {
  sessionId: SessionId;
  remainingMs: number;
  running: boolean;
  pausedAt: number | null;
  lastTick: number;
  /** Set once the deadline event for the current crossing was raised */
  deadlineRaised: boolean;
  /** Set once the low-time warning for the current turn was raised */
  warningRaised: boolean;
}

/**
 * Result of applying one tick.
 */
export interface TickResult {
  state: TimerState;
  deadlineCrossed: boolean;
  warningCrossed: boolean;
}

export function createTimer(
  sessionId: SessionId,
  durationMs: number,
  now: number,
  running: boolean = false
): TimerState {
  return {
    sessionId,
    remainingMs: Math.max(0, durationMs),
    running,
    pausedAt: running ? null : now,
    lastTick: now,
    deadlineRaised: false,
    warningRaised: false,
  };
}

/**
 * Advances a running timer to `now`.
 *
 * The deadline edge fires once per crossing: after it is raised the timer
 * stays at zero without firing again until it is re-armed by an extension
 * or a reset. `warningThresholdMs` of 0 disables the warning edge.
 */
export function tickTimer(state: TimerState, now: number, warningThresholdMs: number = 0): TickResult {
  if (!state.running) {
    return { state, deadlineCrossed: false, warningCrossed: false };
  }

  const elapsed = Math.max(0, now - state.lastTick);
  const before = state.remainingMs;
  const remainingMs = Math.max(0, before - elapsed);

  const warningCrossed =
    warningThresholdMs > 0 &&
    !state.warningRaised &&
    before > warningThresholdMs &&
    remainingMs <= warningThresholdMs &&
    remainingMs > 0;

  const deadlineCrossed = remainingMs <= 0 && !state.deadlineRaised;

  return {
    state: {
      ...state,
      remainingMs,
      lastTick: now,
      deadlineRaised: state.deadlineRaised || deadlineCrossed,
      warningRaised: state.warningRaised || warningCrossed,
    },
    deadlineCrossed,
    warningCrossed,
  };
}

/**
 * Freezes the timer. Time elapsed since the last tick is applied first.
 */
export function pauseTimer(state: TimerState, now: number): TimerState {
  if (!state.running) return state;
  const elapsed = Math.max(0, now - state.lastTick);
  return {
    ...state,
    remainingMs: Math.max(0, state.remainingMs - elapsed),
    running: false,
    pausedAt: now,
    lastTick: now,
  };
}

export function resumeTimer(state: TimerState, now: number): TimerState {
  if (state.running) return state;
  return { ...state, running: true, pausedAt: null, lastTick: now };
}

/**
 * Applies a signed delta, clamping at zero. Bringing the timer back above
 * zero re-arms the deadline edge.
 */
export function extendTimer(state: TimerState, deltaMs: number): TimerState {
  const remainingMs = Math.max(0, state.remainingMs + deltaMs);
  return {
    ...state,
    remainingMs,
    deadlineRaised: remainingMs > 0 ? false : state.deadlineRaised,
  };
}

export function setRemaining(state: TimerState, remainingMs: number): TimerState {
  const clamped = Math.max(0, remainingMs);
  return {
    ...state,
    remainingMs: clamped,
    deadlineRaised: clamped > 0 ? false : state.deadlineRaised,
    warningRaised: false,
  };
}

/**
 * Starts a fresh turn: full duration, running, both edges re-armed.
 */
export function resetTimer(state: TimerState, durationMs: number, now: number): TimerState {
  return {
    ...state,
    remainingMs: Math.max(0, durationMs),
    running: true,
    pausedAt: null,
    lastTick: now,
    deadlineRaised: false,
    warningRaised: false,
  };
}

/**
 * Charges a running timer for the time since `lastTick` without touching the
 * edge latches, so a zero crossing it causes is still raised by the next tick.
 */
export function chargeElapsed(state: TimerState, now: number): TimerState {
  if (!state.running) return state;
  const elapsed = Math.max(0, now - state.lastTick);
  return {
    ...state,
    remainingMs: Math.max(0, state.remainingMs - elapsed),
    lastTick: now,
  };
}

/**
 * Rebuilds a persisted timer after an engine restart. Only a timer that was
 * running at its last persist is charged for the downtime, and never more
 * than the wall-clock time since `lastTick`.
 */
export function reconstructTimer(state: TimerState, now: number): TimerState {
  return chargeElapsed(state, now);
}

/**
 * Absolute deadline for a running timer, or null when paused. Ticks move
 * `lastTick` and `remainingMs` together, so the sum stays put between them.
 */
export function deadlineOf(state: TimerState): number | null {
  return state.running ? state.lastTick + state.remainingMs : null;
}
