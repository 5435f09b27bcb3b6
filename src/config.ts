/**
 * Host configuration.
 *
 * Values come from three layers, later ones winning: built-in defaults,
 * an optional JSON file named by CONFIG_FILE (camelCase keys), and
 * environment variables.
 */

import { readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { InvalidArgumentError } from './errors';

export interface HostConfig {
  port: number;
  host: string;
  dataDir: string;
  dbPath: string;
  backupDir: string;
  logsDir: string;
  /** Game server executable launched for each session */
  gameBinary: string;
  /** Launch arguments; {session} and {name} are substituted */
  gameArgs: string[];
  /** Base URL the game's pre/post turn hooks call back into */
  hookBaseUrl: string;
  tickIntervalMs: number;
  monitorIntervalMs: number;
  defaultTurnDurationMs: number;
  warningThresholdMs: number;
  maxAdvanceAttempts: number;
  confirmTimeoutMs: number;
  backupTimeoutMs: number;
  /** Chat relays that receive turn announcements */
  announceUrls: string[];
  /** Signs announcement bodies */
  announceSecret: string;
  debug: boolean;
}

export const DEFAULT_HOST_CONFIG: HostConfig = {
  port: 3001,
  host: '127.0.0.1',
  dataDir: 'data',
  dbPath: path.join('data', 'turnkeeper.db'),
  backupDir: path.join('data', 'backups'),
  logsDir: path.join('logs', 'sessions'),
  gameBinary: 'dom6_amd64',
  gameArgs: ['--tcpserver', '--textonly', '--statusdump', '--noclientstart', '--newgame', '{name}'],
  hookBaseUrl: 'http://127.0.0.1:3001',
  tickIntervalMs: 1000,
  monitorIntervalMs: 5000,
  defaultTurnDurationMs: 24 * 60 * 60 * 1000,  // 24 hours
  warningThresholdMs: 60 * 60 * 1000,          // 1 hour
  maxAdvanceAttempts: 3,
  confirmTimeoutMs: 2 * 60 * 1000,
  backupTimeoutMs: 60 * 1000,
  announceUrls: [],
  announceSecret: '',
  debug: false,
};

const durationMs = z.coerce.number().int().min(0);
const positiveMs = z.coerce.number().int().positive();
const flag = z
  .string()
  .transform((val) => val === 'true' || val === '1');

/**
 * Environment variable schema. Everything is optional; defaults live in
 * DEFAULT_HOST_CONFIG so the JSON file can sit between the two.
 */
export const EnvSchema = z.object({
  /** HTTP hook server port */
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
  /** Hook server bind address */
  HOST: z.string().min(1).optional(),
  /** Base directory for derived paths */
  DATA_DIR: z.string().min(1).optional(),
  DB_PATH: z.string().min(1).optional(),
  BACKUP_DIR: z.string().min(1).optional(),
  LOGS_DIR: z.string().min(1).optional(),
  GAME_BINARY: z.string().min(1).optional(),
  /** Whitespace-separated launch arguments */
  GAME_ARGS: z.string().optional(),
  HOOK_BASE_URL: z.string().url().optional(),
  TICK_INTERVAL_MS: positiveMs.optional(),
  MONITOR_INTERVAL_MS: positiveMs.optional(),
  DEFAULT_TURN_DURATION_MS: positiveMs.optional(),
  WARNING_THRESHOLD_MS: durationMs.optional(),
  MAX_ADVANCE_ATTEMPTS: z.coerce.number().int().min(1).max(10).optional(),
  CONFIRM_TIMEOUT_MS: positiveMs.optional(),
  BACKUP_TIMEOUT_MS: positiveMs.optional(),
  /** Whitespace-separated relay URLs */
  ANNOUNCE_URLS: z
    .string()
    .transform((val) => splitArgs(val))
    .pipe(z.array(z.string().url()))
    .optional(),
  ANNOUNCE_SECRET: z.string().min(1).optional(),
  /** Path of an optional JSON config file */
  CONFIG_FILE: z.string().min(1).optional(),
  DEBUG: flag.optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * JSON config file schema (camelCase keys, all optional).
 */
export const FileConfigSchema = z
  .object({
    port: z.number().int().min(0).max(65535),
    host: z.string().min(1),
    dataDir: z.string().min(1),
    dbPath: z.string().min(1),
    backupDir: z.string().min(1),
    logsDir: z.string().min(1),
    gameBinary: z.string().min(1),
    gameArgs: z.array(z.string()),
    hookBaseUrl: z.string().url(),
    tickIntervalMs: z.number().int().positive(),
    monitorIntervalMs: z.number().int().positive(),
    defaultTurnDurationMs: z.number().int().positive(),
    warningThresholdMs: z.number().int().min(0),
    maxAdvanceAttempts: z.number().int().min(1).max(10),
    confirmTimeoutMs: z.number().int().positive(),
    backupTimeoutMs: z.number().int().positive(),
    announceUrls: z.array(z.string().url()),
    announceSecret: z.string().min(1),
    debug: z.boolean(),
  })
  .partial()
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Reads and validates the JSON config file.
 */
export function readConfigFile(filePath: string): FileConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidArgumentError(`Cannot read config file ${filePath}: ${reason}`, { filePath });
  }
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid config file ${filePath}: ${formatIssues(parsed.error)}`, { filePath });
  }
  return parsed.data;
}

function fromEnv(env: RawEnv): FileConfig {
  return {
    port: env.PORT,
    host: env.HOST,
    dataDir: env.DATA_DIR,
    dbPath: env.DB_PATH,
    backupDir: env.BACKUP_DIR,
    logsDir: env.LOGS_DIR,
    gameBinary: env.GAME_BINARY,
    gameArgs: env.GAME_ARGS === undefined ? undefined : splitArgs(env.GAME_ARGS),
    hookBaseUrl: env.HOOK_BASE_URL,
    tickIntervalMs: env.TICK_INTERVAL_MS,
    monitorIntervalMs: env.MONITOR_INTERVAL_MS,
    defaultTurnDurationMs: env.DEFAULT_TURN_DURATION_MS,
    warningThresholdMs: env.WARNING_THRESHOLD_MS,
    maxAdvanceAttempts: env.MAX_ADVANCE_ATTEMPTS,
    confirmTimeoutMs: env.CONFIRM_TIMEOUT_MS,
    backupTimeoutMs: env.BACKUP_TIMEOUT_MS,
    announceUrls: env.ANNOUNCE_URLS,
    announceSecret: env.ANNOUNCE_SECRET,
    debug: env.DEBUG,
  };
}

export function splitArgs(value: string): string[] {
  return value.split(/\s+/).filter((arg) => arg.length > 0);
}

/**
 * Builds the host configuration from the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }

  const file: FileConfig = parsed.data.CONFIG_FILE ? readConfigFile(parsed.data.CONFIG_FILE) : {};
  const fromVars = fromEnv(parsed.data);
  const d = DEFAULT_HOST_CONFIG;

  // Paths not set explicitly follow the data directory
  const dataDir = fromVars.dataDir ?? file.dataDir ?? d.dataDir;
  return {
    port: fromVars.port ?? file.port ?? d.port,
    host: fromVars.host ?? file.host ?? d.host,
    dataDir,
    dbPath: fromVars.dbPath ?? file.dbPath ?? path.join(dataDir, 'turnkeeper.db'),
    backupDir: fromVars.backupDir ?? file.backupDir ?? path.join(dataDir, 'backups'),
    logsDir: fromVars.logsDir ?? file.logsDir ?? d.logsDir,
    gameBinary: fromVars.gameBinary ?? file.gameBinary ?? d.gameBinary,
    gameArgs: fromVars.gameArgs ?? file.gameArgs ?? d.gameArgs,
    hookBaseUrl: fromVars.hookBaseUrl ?? file.hookBaseUrl ?? d.hookBaseUrl,
    tickIntervalMs: fromVars.tickIntervalMs ?? file.tickIntervalMs ?? d.tickIntervalMs,
    monitorIntervalMs: fromVars.monitorIntervalMs ?? file.monitorIntervalMs ?? d.monitorIntervalMs,
    defaultTurnDurationMs: fromVars.defaultTurnDurationMs ?? file.defaultTurnDurationMs ?? d.defaultTurnDurationMs,
    warningThresholdMs: fromVars.warningThresholdMs ?? file.warningThresholdMs ?? d.warningThresholdMs,
    maxAdvanceAttempts: fromVars.maxAdvanceAttempts ?? file.maxAdvanceAttempts ?? d.maxAdvanceAttempts,
    confirmTimeoutMs: fromVars.confirmTimeoutMs ?? file.confirmTimeoutMs ?? d.confirmTimeoutMs,
    backupTimeoutMs: fromVars.backupTimeoutMs ?? file.backupTimeoutMs ?? d.backupTimeoutMs,
    announceUrls: fromVars.announceUrls ?? file.announceUrls ?? d.announceUrls,
    announceSecret: fromVars.announceSecret ?? file.announceSecret ?? d.announceSecret,
    debug: fromVars.debug ?? file.debug ?? d.debug,
  };
}

/**
 * Expands {session} and {name} in the launch arguments.
 */
export function expandGameArgs(args: string[], session: { id: string; name: string }): string[] {
  return args.map((arg) => arg.replaceAll('{session}', session.id).replaceAll('{name}', session.name));
}
