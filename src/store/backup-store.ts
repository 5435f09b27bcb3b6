/**
 * BackupStore - File-based turn snapshots.
 *
 * Copies a session's live game folder into an immutable snapshot directory
 * before and after each turn advance, and copies it back on rollback.
 * Snapshots are written to a hidden staging directory and renamed into
 * place, so a snapshot directory either holds a complete copy or does not
 * exist.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils.js';
import { BackupFailureError } from '../errors';
import type { HostRepository } from '../db/repository';
import type { SessionId } from '../lifecycle/types';
import type { BackupPhase, BackupSnapshot, BackupStoreConfig } from './types';

/**
 * Large static map data that never changes between turns.
 */
export const DEFAULT_EXCLUDED_EXTENSIONS = ['.map', '.d6m', '.tga', '.rgb'];

const SEPARATOR = new Uint8Array([0]);

/**
 * Lists the regular files of a folder that a snapshot includes, sorted.
 */
async function listSnapshotFiles(dir: string, excluded: string[]): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .filter((name) => !excluded.includes(path.extname(name).toLowerCase()))
    .sort();
}

/**
 * Checksum over file names and contents, in name order.
 */
export async function computeChecksum(dir: string, files: string[]): Promise<string> {
  const hash = sha256.create();
  for (const name of files) {
    const content = await fs.readFile(path.join(dir, name));
    hash.update(utf8ToBytes(name));
    hash.update(SEPARATOR);
    hash.update(utf8ToBytes(String(content.length)));
    hash.update(SEPARATOR);
    hash.update(content);
  }
  return `sha256:${bytesToHex(hash.digest())}`;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Generates a unique snapshot ID.
 */
function generateSnapshotId(): string {
  return `bak_${Date.now().toString(36)}${Math.random().toString(36).substring(2, 8)}`;
}

export class BackupStore {
  private repo: HostRepository;
  private config: BackupStoreConfig;
  private now: () => number;

  constructor(
    repo: HostRepository,
    config: Pick<BackupStoreConfig, 'backupDir'> & Partial<BackupStoreConfig>,
    now: () => number = Date.now
  ) {
    this.repo = repo;
    this.config = {
      backupDir: config.backupDir,
      excludedExtensions: (config.excludedExtensions ?? DEFAULT_EXCLUDED_EXTENSIONS).map((ext) => ext.toLowerCase()),
    };
    this.now = now;
  }

  /**
   * Get the directory holding a session's snapshots.
   */
  private getSessionDir(sessionId: SessionId): string {
    return path.join(this.config.backupDir, sessionId);
  }

  /**
   * Copies the working directory into a new snapshot and indexes it. An
   * aborted write stops between files and leaves no snapshot behind.
   */
  async writeSnapshot(
    sessionId: SessionId,
    turnNumber: number,
    phase: BackupPhase,
    workingDir: string,
    signal?: AbortSignal
  ): Promise<BackupSnapshot> {
    const sessionDir = this.getSessionDir(sessionId);
    const id = generateSnapshotId();
    const stagingDir = path.join(sessionDir, `.staging_${id}`);

    try {
      const files = await listSnapshotFiles(workingDir, this.config.excludedExtensions);
      await fs.mkdir(stagingDir, { recursive: true });
      for (const name of files) {
        signal?.throwIfAborted();
        await fs.copyFile(path.join(workingDir, name), path.join(stagingDir, name));
      }
      // Hash the copies, not the live folder, so the checksum matches what was stored
      const checksum = await computeChecksum(stagingDir, files);
      signal?.throwIfAborted();

      let writtenAt = this.now();
      let locationRef = path.join(sessionDir, `turn_${turnNumber}_${phase}_${writtenAt}`);
      while (await pathExists(locationRef)) {
        writtenAt += 1;
        locationRef = path.join(sessionDir, `turn_${turnNumber}_${phase}_${writtenAt}`);
      }
      await fs.rename(stagingDir, locationRef);

      const snapshot: BackupSnapshot = {
        id,
        sessionId,
        turnNumber,
        phase,
        locationRef,
        checksum,
        fileCount: files.length,
        writtenAt,
      };
      this.repo.insertSnapshot(snapshot);
      return snapshot;
    } catch (err) {
      await fs.rm(stagingDir, { recursive: true, force: true });
      if (err instanceof BackupFailureError) throw err;
      throw new BackupFailureError(sessionId, turnNumber, phase, describe(err));
    }
  }

  /**
   * Recomputes a snapshot's checksum and compares it with the stored one.
   */
  async verify(snapshot: BackupSnapshot): Promise<boolean> {
    try {
      const files = await listSnapshotFiles(snapshot.locationRef, []);
      if (files.length !== snapshot.fileCount) return false;
      return (await computeChecksum(snapshot.locationRef, files)) === snapshot.checksum;
    } catch (err) {
      console.warn(`[BackupStore] Cannot verify snapshot ${snapshot.id}:`, describe(err));
      return false;
    }
  }

  /**
   * Copies a verified snapshot back over the working directory. Files the
   * snapshot does not contain are left in place. An aborted restore stops
   * between files.
   */
  async restoreSnapshot(snapshot: BackupSnapshot, workingDir: string, signal?: AbortSignal): Promise<void> {
    const fail = (reason: string) =>
      new BackupFailureError(snapshot.sessionId, snapshot.turnNumber, snapshot.phase, reason);

    if (!(await this.verify(snapshot))) {
      throw fail(`checksum mismatch for snapshot ${snapshot.id}`);
    }

    try {
      await fs.mkdir(workingDir, { recursive: true });
      const files = await listSnapshotFiles(snapshot.locationRef, []);
      for (const name of files) {
        signal?.throwIfAborted();
        await fs.copyFile(path.join(snapshot.locationRef, name), path.join(workingDir, name));
      }
    } catch (err) {
      throw fail(`restore failed: ${describe(err)}`);
    }
  }

  get(snapshotId: string): BackupSnapshot | null {
    return this.repo.getSnapshot(snapshotId);
  }

  list(sessionId: SessionId, turnNumber?: number): BackupSnapshot[] {
    return this.repo.listSnapshots(sessionId, turnNumber);
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
