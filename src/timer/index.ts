/**
 * Turn timer module.
 */

export {
  createTimer,
  tickTimer,
  pauseTimer,
  resumeTimer,
  extendTimer,
  setRemaining,
  resetTimer,
  chargeElapsed,
  reconstructTimer,
  deadlineOf,
} from './timer-state';
export type { TimerState, TickResult } from './timer-state';

export { TimerScheduler, DEFAULT_SCHEDULER_CONFIG } from './scheduler';
export type { TimerSchedulerConfig, TimerHandlers, TickSummary } from './scheduler';
