/**
 * Game process control module.
 */

export { ProcessRegistry } from './registry';
export { LocalProcessHandle } from './local-process';
export type { LocalProcessOptions } from './local-process';
export { parseStatusDump, parseStats, outstandingPlayers, summarizeErrorLog } from './status-file';
export type { ParsedStatusDump, ParsedStats } from './status-file';
export type {
  ProcessHandle,
  ProcessHandleFactory,
  StatusProbe,
  NationStatus,
  TurnStatus,
} from './types';
