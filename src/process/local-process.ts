/**
 * Process handle for a game engine running on this machine.
 *
 * The engine runs detached with its output appended to a log file in its
 * working folder. An advance is requested by dropping a command file the
 * engine polls for; status comes from the files it writes after each turn.
 */

import { spawn } from 'child_process';
import { once } from 'events';
import * as fs from 'fs/promises';
import * as path from 'path';
import { sleep } from '../orchestration/retry';
import type { ProcessHandle, StatusProbe } from './types';
import { outstandingPlayers, parseStats, parseStatusDump, summarizeErrorLog } from './status-file';

export interface LocalProcessOptions {
  /** Engine executable */
  binary: string;
  args: string[];
  /** Folder the engine writes its game state into */
  workingDir: string;
  /** Adopt an already running process (engine restart) */
  pid?: number | null;
  errorLogName?: string;
  statusFileName?: string;
  statsFileName?: string;
  commandFileName?: string;
  /** Written to the command file to make the engine process the turn */
  advanceCommand?: string;
  /** How long stop waits after SIGTERM, and again after SIGKILL */
  stopTimeoutMs?: number;
  stopPollIntervalMs?: number;
}

type ResolvedOptions = Required<Omit<LocalProcessOptions, 'pid'>>;

const DEFAULT_OPTIONS: Omit<ResolvedOptions, 'binary' | 'args' | 'workingDir'> = {
  errorLogName: 'error.log',
  statusFileName: 'statusdump.txt',
  statsFileName: 'stats.txt',
  commandFileName: 'domcmd',
  advanceCommand: 'settimeleft 5',
  stopTimeoutMs: 10 * 1000,
  stopPollIntervalMs: 100,
};

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Reads a text file, returning null when it does not exist.
 */
async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw err;
  }
}

export class LocalProcessHandle implements ProcessHandle {
  private options: ResolvedOptions;
  private _pid: number | null;

  constructor(options: LocalProcessOptions) {
    const { pid, ...rest } = options;
    this.options = { ...DEFAULT_OPTIONS, ...rest };
    this._pid = pid ?? null;
  }

  get pid(): number | null {
    return this._pid;
  }

  private file(name: string): string {
    return path.join(this.options.workingDir, name);
  }

  async start(): Promise<void> {
    if (await this.isAlive()) return;

    await fs.mkdir(this.options.workingDir, { recursive: true });
    const log = await fs.open(this.file(this.options.errorLogName), 'a');
    try {
      const child = spawn(this.options.binary, this.options.args, {
        cwd: this.options.workingDir,
        detached: true,
        stdio: ['ignore', log.fd, log.fd],
      });
      // Rejects with the spawn error (missing binary, permissions)
      await once(child, 'spawn');
      child.unref();
      this._pid = child.pid ?? null;
    } finally {
      await log.close();
    }
  }

  /**
   * Sends SIGTERM and resolves once the process has exited, escalating to
   * SIGKILL when it outlives `stopTimeoutMs`.
   */
  async stop(): Promise<void> {
    const pid = this._pid;
    if (pid === null) return;

    if (!this.sendSignal(pid, 'SIGTERM')) {
      console.log(`[LocalProcess] Process ${pid} already terminated`);
      this._pid = null;
      return;
    }
    if (!(await this.waitForExit())) {
      console.warn(`[LocalProcess] Process ${pid} still running ${this.options.stopTimeoutMs}ms after SIGTERM, sending SIGKILL`);
      if (this.sendSignal(pid, 'SIGKILL') && !(await this.waitForExit())) {
        throw new Error(`Process ${pid} did not exit after SIGKILL`);
      }
    }
    this._pid = null;
  }

  /**
   * Returns false when the process is already gone.
   */
  private sendSignal(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ESRCH') return false;
      throw err;
    }
  }

  private async waitForExit(): Promise<boolean> {
    const deadline = Date.now() + this.options.stopTimeoutMs;
    while (await this.isAlive()) {
      if (Date.now() >= deadline) return false;
      await sleep(this.options.stopPollIntervalMs);
    }
    return true;
  }

  async isAlive(): Promise<boolean> {
    const pid = this._pid;
    if (pid === null) return false;
    try {
      process.kill(pid, 0);
      return true;
    } catch (err) {
      // EPERM: the process exists but belongs to someone else
      return isErrnoException(err) && err.code === 'EPERM';
    }
  }

  async signalAdvance(): Promise<void> {
    // Stale status images would otherwise be mistaken for the new turn's
    const entries = await fs.readdir(this.options.workingDir);
    for (const name of entries.filter((e) => e.toLowerCase().endsWith('.png'))) {
      await fs.rm(this.file(name), { force: true });
    }
    await fs.writeFile(this.file(this.options.commandFileName), this.options.advanceCommand, 'utf-8');
  }

  async probeStatus(): Promise<StatusProbe | null> {
    const dump = await readOptional(this.file(this.options.statusFileName));
    if (dump === null) return null;
    const parsed = parseStatusDump(dump);
    if (!parsed) return null;

    const statsText = await readOptional(this.file(this.options.statsFileName));
    const stats = statsText === null ? null : parseStats(statsText);

    return {
      engineTurn: parsed.engineTurn,
      nations: parsed.nations,
      outstandingPlayers: outstandingPlayers(parsed.nations),
      missedPlayers: stats?.missedPlayers ?? [],
    };
  }

  async describeFailure(): Promise<string> {
    const text = await readOptional(this.file(this.options.errorLogName));
    if (text === null) return 'No log file found';
    return summarizeErrorLog(text);
  }
}
