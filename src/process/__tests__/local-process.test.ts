/**
 * Tests for the process registry and the file side of the local process
 * handle. No engine is spawned.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import path from 'path';
import { InvalidArgumentError } from '../../errors';
import { LocalProcessHandle } from '../local-process';
import { ProcessRegistry } from '../registry';
import { FakeProcessHandle, makeTempDir, removeDir, writeFolder } from '../../test/helpers';

describe('ProcessRegistry', () => {
  it('should hold at most one handle per session', () => {
    const registry = new ProcessRegistry();
    const handle = new FakeProcessHandle();
    registry.register('s1', handle);

    expect(registry.get('s1')).toBe(handle);
    expect(() => registry.register('s1', new FakeProcessHandle())).toThrow(InvalidArgumentError);
  });

  it('should hand the handle back on release', () => {
    const registry = new ProcessRegistry();
    const handle = new FakeProcessHandle();
    registry.register('s1', handle);

    expect(registry.release('s1')).toBe(handle);
    expect(registry.has('s1')).toBe(false);
    expect(registry.release('s1')).toBeNull();
  });

  it('should list owning sessions', () => {
    const registry = new ProcessRegistry();
    registry.register('s1', new FakeProcessHandle());
    registry.register('s2', new FakeProcessHandle());
    expect(registry.sessions()).toEqual(['s1', 's2']);
  });
});

describe('LocalProcessHandle', () => {
  let dir: string;
  let handle: LocalProcessHandle;

  beforeEach(() => {
    dir = makeTempDir();
    handle = new LocalProcessHandle({ binary: 'engine', args: [], workingDir: dir });
  });

  afterEach(() => {
    removeDir(dir);
    vi.restoreAllMocks();
  });

  it('should report no process before start', async () => {
    expect(handle.pid).toBeNull();
    await expect(handle.isAlive()).resolves.toBe(false);
  });

  it('should report our own pid as alive when adopted', async () => {
    const adopted = new LocalProcessHandle({ binary: 'engine', args: [], workingDir: dir, pid: process.pid });
    await expect(adopted.isAlive()).resolves.toBe(true);
  });

  it('should drop the advance command and clear stale status images', async () => {
    writeFolder(dir, { 'turn_status.png': 'old', 'game.trn': 'state' });

    await handle.signalAdvance();

    expect(readFileSync(path.join(dir, 'domcmd'), 'utf-8')).toBe('settimeleft 5');
    expect(existsSync(path.join(dir, 'turn_status.png'))).toBe(false);
    expect(existsSync(path.join(dir, 'game.trn'))).toBe(true);
  });

  it('should use a custom command file', async () => {
    const custom = new LocalProcessHandle({
      binary: 'engine',
      args: [],
      workingDir: dir,
      commandFileName: 'cmd.txt',
      advanceCommand: 'advance now',
    });
    await custom.signalAdvance();
    expect(readFileSync(path.join(dir, 'cmd.txt'), 'utf-8')).toBe('advance now');
  });

  it('should read turn and players from the status dump and stats', async () => {
    writeFileSync(
      path.join(dir, 'statusdump.txt'),
      'turn 4, era 1\nNation\t5\t12\t1\t0\t0\tAtlantis\nNation\t6\t13\t1\t0\t2\tBabel\n'
    );
    writeFileSync(path.join(dir, 'stats.txt'), 'Statistics for game islands turn 3\nAtlantis didn\'t play this turn\n');

    const probe = await handle.probeStatus();

    expect(probe?.engineTurn).toBe(4);
    expect(probe?.outstandingPlayers).toEqual(['Atlantis']);
    expect(probe?.missedPlayers).toEqual(['Atlantis']);
  });

  it('should return null when there is no status dump', async () => {
    await expect(handle.probeStatus()).resolves.toBeNull();
  });

  it('should describe failures from the error log', async () => {
    await expect(handle.describeFailure()).resolves.toBe('No log file found');

    writeFileSync(path.join(dir, 'error.log'), 'Setup port 2045\nCould not open savegame\n');
    await expect(handle.describeFailure()).resolves.toBe('Could not open savegame');
  });

  describe('stop', () => {
    const gone = () => Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });

    function adopt(options: { stopTimeoutMs?: number } = {}): LocalProcessHandle {
      return new LocalProcessHandle({
        binary: 'engine',
        args: [],
        workingDir: dir,
        pid: 4242,
        stopPollIntervalMs: 1,
        ...options,
      });
    }

    it('should resolve only after the process has exited', async () => {
      const running = adopt();
      const sent: Array<string | number | undefined> = [];
      let livenessChecks = 0;
      vi.spyOn(process, 'kill').mockImplementation((_pid, signal) => {
        sent.push(signal);
        livenessChecks += signal === 0 ? 1 : 0;
        if (signal === 0 && livenessChecks > 2) throw gone();
        return true;
      });

      await running.stop();

      expect(sent).toEqual(['SIGTERM', 0, 0, 0]);
      expect(running.pid).toBeNull();
    });

    it('should escalate to SIGKILL when the process ignores SIGTERM', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const stubborn = adopt({ stopTimeoutMs: 5 });
      const sent: Array<string | number | undefined> = [];
      let killed = false;
      vi.spyOn(process, 'kill').mockImplementation((_pid, signal) => {
        sent.push(signal);
        if (signal === 'SIGKILL') killed = true;
        if (signal === 0 && killed) throw gone();
        return true;
      });

      await stubborn.stop();

      expect(sent.filter((signal) => signal !== 0)).toEqual(['SIGTERM', 'SIGKILL']);
      expect(sent[sent.length - 1]).toBe(0);
      expect(stubborn.pid).toBeNull();
    });

    it('should not wait for a process that is already gone', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const exited = adopt();
      const kill = vi.spyOn(process, 'kill').mockImplementation(() => {
        throw gone();
      });

      await exited.stop();

      expect(kill).toHaveBeenCalledTimes(1);
      expect(exited.pid).toBeNull();
    });
  });
});
