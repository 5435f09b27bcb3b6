/**
 * Host Server Entry Point.
 *
 * Opens the database, recovers sessions left over from the previous run,
 * serves game hooks plus the event stream, and announces turns to the
 * configured chat relays.
 *
 * Usage:
 *   npx tsx src/server/index.ts
 *
 * Configuration is read from the environment (and .env), see src/config.ts.
 */

import 'dotenv/config';
import { loadConfig } from '../config';
import { openDb } from '../db/connection';
import { TurnHost } from '../orchestration/host';
import { TurnAnnouncer } from './announcer';
import { HookServer } from './hook-server';
import { createLocalProcessFactory } from './process-factory';
import { attachSessionLogging } from './session-logger';

/**
 * Main entry point.
 */
async function main() {
  const config = loadConfig();

  console.log('Starting turn host...');
  console.log(`Database: ${config.dbPath}`);
  console.log(`Backups: ${config.backupDir}`);
  console.log(`Game binary: ${config.gameBinary}`);

  const db = openDb(config.dbPath);
  const host = new TurnHost({
    db,
    backupDir: config.backupDir,
    processFactory: createLocalProcessFactory(config),
    defaultTurnDurationMs: config.defaultTurnDurationMs,
    scheduler: {
      tickIntervalMs: config.tickIntervalMs,
      warningThresholdMs: config.warningThresholdMs,
    },
    monitor: { monitorIntervalMs: config.monitorIntervalMs },
    orchestrator: {
      maxAdvanceAttempts: config.maxAdvanceAttempts,
      confirmTimeoutMs: config.confirmTimeoutMs,
      backupTimeoutMs: config.backupTimeoutMs,
    },
  });

  attachSessionLogging(host, config.logsDir);
  if (config.debug) {
    host.onEvent((event) => console.log(`[debug] ${event.type} ${event.sessionId}`));
  }

  const report = await host.start();
  if (report.failedTurns.length > 0) {
    console.warn(`Sessions needing operator attention: ${report.failedTurns.join(', ')}`);
  }

  const announcer = new TurnAnnouncer({ urls: config.announceUrls, secret: config.announceSecret });
  if (config.announceUrls.length > 0) {
    console.log(`Announcing turns to ${config.announceUrls.length} relay(s)`);
  }
  const server = new HookServer({ host, announcer });
  const port = await server.start(config.port, config.host);

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\nShutting down host...');
    await server.stop();
    await host.stop();
    db.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown().catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }

  console.log(`\nHost ready at http://${config.host}:${port} (events on ws://${config.host}:${port}/events)`);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
