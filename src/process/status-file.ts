/**
 * Parsers for the artifacts a game engine leaves in its working folder.
 *
 * statusdump.txt: a `turn <n>, ...` line, then one tab-separated line per
 * nation: `Nation <nationId> <pretenderId> <playerStatus> <aiLevel> <turnStatus> <name>`.
 *
 * stats.txt: a `Statistics for game <name> turn <n>` header, then lines such
 * as `<player> didn't play this turn`.
 */

import type { NationStatus, TurnStatus } from './types';

export interface ParsedStatusDump {
  engineTurn: number;
  nations: NationStatus[];
}

export interface ParsedStats {
  /** Turn the statistics describe (the one just processed) */
  turn: number;
  missedPlayers: string[];
}

const TURN_STATUS: Record<number, TurnStatus> = {
  0: 'undone',
  1: 'unfinished',
  2: 'done',
};

const HUMAN_PLAYER = 1;

function parseNationLine(line: string): NationStatus | null {
  const parts = line.split('\t');
  if (parts[0] !== 'Nation' || parts.length < 7) return null;

  const [nationId, pretenderId, playerStatus, aiLevel, turnStatus] = parts.slice(1, 6).map((p) => Number.parseInt(p, 10));
  if ([nationId, pretenderId, playerStatus, aiLevel, turnStatus].some((n) => Number.isNaN(n))) {
    return null;
  }

  return {
    nationId,
    pretenderId,
    playerStatus,
    aiLevel,
    turnStatus: TURN_STATUS[turnStatus] ?? 'undone',
    name: parts.slice(6).join('\t').trim(),
  };
}

/**
 * Parses a status dump. Returns null when there is no turn line.
 */
export function parseStatusDump(text: string): ParsedStatusDump | null {
  let engineTurn: number | null = null;
  const nations: NationStatus[] = [];

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (engineTurn === null && line.startsWith('turn ')) {
      const value = Number.parseInt(line.split(',')[0].slice('turn '.length).trim(), 10);
      if (!Number.isNaN(value)) {
        engineTurn = value;
      }
      continue;
    }
    const nation = parseNationLine(raw);
    if (nation) nations.push(nation);
  }

  return engineTurn === null ? null : { engineTurn, nations };
}

/**
 * Human players that have not submitted a finished turn. Eliminated and AI
 * nations never count.
 */
export function outstandingPlayers(nations: NationStatus[]): string[] {
  return nations
    .filter((n) => n.playerStatus === HUMAN_PLAYER && n.turnStatus !== 'done')
    .map((n) => n.name);
}

/**
 * Parses stats.txt. Returns null when the header is missing or malformed.
 */
export function parseStats(text: string): ParsedStats | null {
  const lines = text.split(/\r?\n/);
  const header = lines[0]?.trim() ?? '';
  if (!header.startsWith('Statistics for game')) return null;

  const turn = Number.parseInt(header.split(' ').pop() ?? '', 10);
  if (Number.isNaN(turn)) return null;

  const suffix = " didn't play this turn";
  const missedPlayers = lines
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line.endsWith(suffix))
    .map((line) => line.slice(0, -suffix.length));

  return { turn, missedPlayers };
}

/**
 * Launcher chatter that never explains a failure.
 */
const NOISE_PATTERNS = [
  'Setup port',
  'seconds, open:',
  'kdialog: not found',
  'zenity: not found',
  "Error: Can't open display:",
  'sh: 1:',
];

const ERROR_INDICATORS = [
  'was not found',
  "Can't find mod:",
  'Error:',
  'Failed to',
  'Could not',
  'No such file or directory',
  'Permission denied',
];

/**
 * Condenses an engine error log to its last three meaningful lines.
 * Lines carrying an error indicator are preferred over other output.
 */
export function summarizeErrorLog(text: string): string {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length === 0) return 'Log file is empty';

  const meaningful = lines.filter((line) => !NOISE_PATTERNS.some((p) => line.includes(p)));
  const errors = meaningful.filter((line) => ERROR_INDICATORS.some((i) => line.includes(i)));

  const chosen = errors.length > 0 ? errors : meaningful;
  if (chosen.length === 0) return 'No meaningful errors found in log';
  return chosen.slice(-3).join(' | ');
}
