/**
 * Session lifecycle state machine.
 *
 * Owns the Session rows: sessions are only created and moved between
 * lifecycle tags through this class. Transitions follow a fixed table and
 * anything outside it is rejected without mutation.
 */

import { InvalidStateTransitionError, SessionNotFoundError } from '../errors';
import type { HostRepository } from '../db/repository';
import type {
  CreateSessionInput,
  LifecycleEvent,
  LifecycleTag,
  Session,
  SessionFlags,
  SessionId,
} from './types';

export const DEFAULT_TURN_DURATION_MS = 24 * 60 * 60 * 1000;

/**
 * Allowed transitions. A missing entry means the event is rejected.
 */
export const TRANSITIONS: Record<LifecycleEvent, Partial<Record<LifecycleTag, LifecycleTag>>> = {
  // Relaunching after a crash keeps the tag
  launch: { CREATED: 'LAUNCHED', LAUNCHED: 'LAUNCHED', STARTED: 'STARTED' },
  startPlay: { LAUNCHED: 'STARTED' },
  endGame: { STARTED: 'ENDED' },
  deleteLobby: { ENDED: 'DELETED' },
  // Privileged operator escape hatch
  resetStarted: { STARTED: 'LAUNCHED' },
};

/**
 * Returns the next tag, or null when the event is not allowed.
 */
export function nextLifecycle(from: LifecycleTag, event: LifecycleEvent): LifecycleTag | null {
  return TRANSITIONS[event][from] ?? null;
}

/**
 * Legacy flag view of a lifecycle tag.
 */
export function toFlags(tag: LifecycleTag): SessionFlags {
  switch (tag) {
    case 'CREATED':
    case 'LAUNCHED':
      return { active: true, started: false, ended: false };
    case 'STARTED':
      return { active: true, started: true, ended: false };
    case 'ENDED':
      return { active: true, started: true, ended: true };
    case 'DELETED':
      return { active: false, started: true, ended: true };
  }
}

/**
 * Maps legacy flags back to a tag. A lobby that was never launched and one
 * waiting for its first turn look the same, so `launched` disambiguates.
 */
export function fromFlags(flags: SessionFlags, launched: boolean = false): LifecycleTag {
  if (!flags.active) {
    if (!flags.ended || !flags.started) {
      throw new Error('Inconsistent flags: inactive sessions must be started and ended');
    }
    return 'DELETED';
  }
  if (flags.ended) {
    if (!flags.started) {
      throw new Error('Inconsistent flags: ended requires started');
    }
    return 'ENDED';
  }
  if (flags.started) return 'STARTED';
  return launched ? 'LAUNCHED' : 'CREATED';
}

/**
 * Whether a game process is expected to be running for this tag.
 */
export function isRunningLifecycle(tag: LifecycleTag): boolean {
  return tag === 'LAUNCHED' || tag === 'STARTED';
}

/**
 * Listener notified after every committed transition.
 */
export type TransitionListener = (
  session: Session,
  from: LifecycleTag,
  event: LifecycleEvent
) => void;

/**
 * Generates a unique session ID.
 */
function generateSessionId(): SessionId {
  return `ses_${Date.now().toString(36)}${Math.random().toString(36).substring(2, 8)}`;
}

export class SessionStateMachine {
  private repo: HostRepository;
  private now: () => number;
  private listeners: TransitionListener[] = [];

  constructor(repo: HostRepository, now: () => number = Date.now) {
    this.repo = repo;
    this.now = now;
  }

  /**
   * Registers a transition listener.
   */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx !== -1) {
        this.listeners.splice(idx, 1);
      }
    };
  }

  create(input: CreateSessionInput): Session {
    const session: Session = {
      id: generateSessionId(),
      name: input.name,
      config: input.config ?? {},
      workingDir: input.workingDir,
      lifecycle: 'CREATED',
      defaultTurnDurationMs: input.defaultTurnDurationMs ?? DEFAULT_TURN_DURATION_MS,
      maxExtensionsPerTurn: input.maxExtensionsPerTurn ?? null,
      initialBankMs: input.initialBankMs ?? 0,
      perTurnBankBonusMs: input.perTurnBankBonusMs ?? 0,
      processPid: null,
      createdAt: this.now(),
    };
    this.repo.insertSession(session);
    return session;
  }

  get(sessionId: SessionId): Session {
    const session = this.repo.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /**
   * Checks a transition without applying it.
   */
  assertCanTransition(sessionId: SessionId, event: LifecycleEvent): Session {
    const session = this.get(sessionId);
    if (nextLifecycle(session.lifecycle, event) === null) {
      throw new InvalidStateTransitionError(sessionId, session.lifecycle, event);
    }
    return session;
  }

  transition(sessionId: SessionId, event: LifecycleEvent): Session {
    const session = this.assertCanTransition(sessionId, event);
    const from = session.lifecycle;
    const to = nextLifecycle(from, event) ?? from;

    const updated: Session = { ...session, lifecycle: to };
    this.repo.updateSession(updated);

    for (const listener of this.listeners) {
      try {
        listener(updated, from, event);
      } catch (err) {
        console.error('Transition listener error:', err);
      }
    }
    return updated;
  }
}
