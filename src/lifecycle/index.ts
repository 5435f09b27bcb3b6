/**
 * Session lifecycle module.
 */

export type {
  SessionId,
  LifecycleTag,
  LifecycleEvent,
  SessionFlags,
  Session,
  CreateSessionInput,
} from './types';

export {
  SessionStateMachine,
  TRANSITIONS,
  DEFAULT_TURN_DURATION_MS,
  nextLifecycle,
  toFlags,
  fromFlags,
  isRunningLifecycle,
} from './state-machine';
export type { TransitionListener } from './state-machine';
