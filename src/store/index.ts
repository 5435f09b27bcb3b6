/**
 * Backup store module.
 */

export { BackupStore, DEFAULT_EXCLUDED_EXTENSIONS, computeChecksum } from './backup-store';
export type { BackupSnapshot, BackupPhase, BackupStoreConfig } from './types';
