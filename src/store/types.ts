/**
 * Types for the backup store.
 */

import type { SessionId } from '../lifecycle/types';

/**
 * Which side of a turn advance a snapshot was taken on.
 */
export type BackupPhase = 'pre' | 'post';

/**
 * Immutable record of one snapshot of a session's working directory.
 */
export interface BackupSnapshot {
  id: string;
  sessionId: SessionId;
  turnNumber: number;
  phase: BackupPhase;
  /** Directory holding the copied files */
  locationRef: string;
  /** `sha256:<hex>` over relative file names and contents */
  checksum: string;
  fileCount: number;
  writtenAt: number;
}

/**
 * Configuration for the backup store.
 */
export interface BackupStoreConfig {
  /** Root directory; each session gets its own subdirectory */
  backupDir: string;
  /** File extensions (lowercase, with dot) that are never copied */
  excludedExtensions: string[];
}
