/**
 * Tests for the engine status artifact parsers.
 */

import { describe, it, expect } from 'vitest';
import { outstandingPlayers, parseStats, parseStatusDump, summarizeErrorLog } from '../status-file';

const STATUS_DUMP = [
  'Status for \'islands\'',
  'turn 7, era 1, mods 0, turnlimit 0',
  'Nation\t5\t12\t1\t0\t2\tAtlantis',
  'Nation\t6\t13\t1\t0\t1\tBabel',
  'Nation\t7\t14\t1\t0\t0\tCeltica',
  'Nation\t8\t15\t2\t3\t0\tDelos',
  'Nation\t9\t16\t-1\t0\t0\tErebos',
  '',
].join('\n');

describe('parseStatusDump', () => {
  it('should read the engine turn and nation lines', () => {
    const parsed = parseStatusDump(STATUS_DUMP);

    expect(parsed?.engineTurn).toBe(7);
    expect(parsed?.nations).toHaveLength(5);
    expect(parsed?.nations[1]).toEqual({
      nationId: 6,
      pretenderId: 13,
      playerStatus: 1,
      aiLevel: 0,
      turnStatus: 'unfinished',
      name: 'Babel',
    });
  });

  it('should accept CRLF line endings', () => {
    expect(parseStatusDump(STATUS_DUMP.replace(/\n/g, '\r\n'))?.engineTurn).toBe(7);
  });

  it('should return null without a turn line', () => {
    expect(parseStatusDump('Nation\t5\t12\t1\t0\t2\tAtlantis\n')).toBeNull();
    expect(parseStatusDump('')).toBeNull();
  });

  it('should skip malformed nation lines', () => {
    const parsed = parseStatusDump('turn 2\nNation\tx\t1\t1\t0\t0\tBroken\nNation\t3\t4\t1\t0\t2\tFine\n');
    expect(parsed?.nations.map((n) => n.name)).toEqual(['Fine']);
  });
});

describe('outstandingPlayers', () => {
  it('should list human nations that have not finished their turn', () => {
    const parsed = parseStatusDump(STATUS_DUMP);
    expect(outstandingPlayers(parsed?.nations ?? [])).toEqual(['Babel', 'Celtica']);
  });
});

describe('parseStats', () => {
  it('should read the turn and players who missed it', () => {
    const text = [
      'Statistics for game islands turn 6',
      'Babel didn\'t play this turn',
      'Total provinces: 120',
      'Celtica didn\'t play this turn',
    ].join('\n');

    expect(parseStats(text)).toEqual({ turn: 6, missedPlayers: ['Babel', 'Celtica'] });
  });

  it('should return null for a missing or malformed header', () => {
    expect(parseStats('Babel didn\'t play this turn')).toBeNull();
    expect(parseStats('Statistics for game islands turn seven')).toBeNull();
  });
});

describe('summarizeErrorLog', () => {
  it('should report an empty log', () => {
    expect(summarizeErrorLog('')).toBe('Log file is empty');
    expect(summarizeErrorLog('\n  \n')).toBe('Log file is empty');
  });

  it('should report a log holding only launcher noise', () => {
    expect(summarizeErrorLog('Setup port 2045\nsh: 1: kdialog: not found\n')).toBe('No meaningful errors found in log');
  });

  it('should prefer lines with error indicators', () => {
    const log = [
      'Loading map islands.map',
      'Error: Can\'t find mod: balance.dm',
      'Starting server',
      'Failed to bind port 2045',
    ].join('\n');

    expect(summarizeErrorLog(log)).toBe('Error: Can\'t find mod: balance.dm | Failed to bind port 2045');
  });

  it('should keep the last three meaningful lines when nothing looks like an error', () => {
    const log = ['line one', 'line two', 'Setup port 2045', 'line three', 'line four'].join('\n');
    expect(summarizeErrorLog(log)).toBe('line two | line three | line four');
  });
});
