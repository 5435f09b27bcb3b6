/**
 * Turn orchestration module.
 *
 * Locks, the turn orchestrator, the turn monitor and the TurnHost facade
 * that ties them to timers, banks, backups and game processes.
 */

export { TurnHost } from './host';
export type { TurnHostOptions, SessionView, RecoveryReport } from './host';
export { TurnOrchestrator } from './orchestrator';
export type { OrchestratorDeps, RollbackResult } from './orchestrator';
export { TurnMonitor, DEFAULT_MONITOR_CONFIG } from './turn-monitor';
export type { TurnMonitorConfig, TurnMonitorDeps, MonitorOutcome } from './turn-monitor';
export { SessionLock } from './lock';
export { HostEventEmitter } from './events';
export { TimeoutError, sleep, backoffDelay, withTimeout, withAbortTimeout } from './retry';
export { DEFAULT_ORCHESTRATOR_CONFIG } from './types';
export type * from './types';
