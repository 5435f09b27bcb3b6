/**
 * Turn orchestration engine for hosted turn-based game sessions.
 */

export * from './errors';
export * from './lifecycle';
export * from './timer';
export * from './ledger';
export * from './store';
export * from './process';
export * from './orchestration';
export * from './db';
export { loadConfig, readConfigFile, expandGameArgs, splitArgs, DEFAULT_HOST_CONFIG, EnvSchema, FileConfigSchema } from './config';
export type { HostConfig, FileConfig, RawEnv } from './config';
export { HookServer, PROTOCOL_VERSION } from './server/hook-server';
export type { HookServerOptions, ServerMessage, ClientMessage } from './server/hook-server';
export { createLocalProcessFactory } from './server/process-factory';
export {
  SessionLogger,
  getSessionLogger,
  removeSessionLogger,
  attachSessionLogging,
  readSessionLogs,
  listSessionLogs,
  filterLogsByType,
  toLogEvent,
} from './server/session-logger';
export type { SessionLogEvent, SessionLogEntry } from './server/session-logger';
export {
  TurnAnnouncer,
  DEFAULT_ANNOUNCER_CONFIG,
  SIGNATURE_HEADER,
  signBody,
  describeDuration,
  toAnnouncement,
} from './server/announcer';
export type { Announcement, AnnouncementKind, AnnouncerConfig, FailedAnnouncement } from './server/announcer';
