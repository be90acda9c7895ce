#!/usr/bin/env node
import { CommanderError } from 'commander';
import pino from 'pino';
import { ConfigError, type TypeSchedule } from './domain/index.js';
import { CycleDriver, systemClock } from './application/index.js';
import { loadSettings, loadSchedules, type UpdaterSettings } from './infrastructure/config/index.js';
import { createDbClient, createEntityStore, prepareDatastore, ENTITIES_DDL } from './infrastructure/db/index.js';
import { createRedisClient, createTaskProducer } from './infrastructure/redis/index.js';
import { FileSupplementalEventSource } from './infrastructure/supplemental/index.js';

/**
 * Periodic lifecycle updater process.
 *
 * Each cycle walks every configured entity type, enqueues regular-update
 * tasks for entities that became due, and delete tasks for entities whose
 * leases all expired. Workers consuming the task stream apply them.
 *
 * Exit codes: 1 crash, 2 invalid configuration, 3 Redis unreachable,
 * 4 Postgres unreachable.
 */
const EXIT_CRASH = 1;
const EXIT_CONFIG = 2;
const EXIT_QUEUE = 3;
const EXIT_DATASTORE = 4;

const bootLog = pino({ level: 'info' });

// Abort controller for graceful shutdown
const ac = new AbortController();

async function main(): Promise<number> {
  let settings: UpdaterSettings;
  try {
    settings = loadSettings();
  } catch (err: unknown) {
    // --help / --version already printed their output
    if (err instanceof CommanderError && err.exitCode === 0) return 0;
    bootLog.fatal({ err }, 'Invalid process settings');
    return EXIT_CONFIG;
  }

  const log = pino({ level: settings.logLevel });

  let schedules: Map<string, TypeSchedule>;
  try {
    schedules = loadSchedules(settings.configDir);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      log.fatal({ path: err.path, err }, 'Invalid schedule configuration');
      return EXIT_CONFIG;
    }
    throw err;
  }
  log.info(
    { configDir: settings.configDir, types: [...schedules.keys()] },
    'Schedule configuration loaded',
  );

  const redis = createRedisClient(settings.redisUrl);
  try {
    await redis.connect();
  } catch (err: unknown) {
    log.fatal({ err }, 'Cannot connect to Redis');
    redis.disconnect();
    return EXIT_QUEUE;
  }
  log.info({ stream: settings.stream }, 'Redis connected');

  const { sql, db } = createDbClient(settings.databaseUrl);
  try {
    await prepareDatastore(sql, ENTITIES_DDL);
  } catch (err: unknown) {
    log.fatal({ err }, 'Cannot connect to Postgres');
    await redis.quit();
    await sql.end({ timeout: 1 });
    return EXIT_DATASTORE;
  }
  log.info('Database ready (entities table)');

  const driver = new CycleDriver({
    schedules,
    store: createEntityStore(db, log),
    producer: createTaskProducer(redis, settings.stream),
    supplemental: FileSupplementalEventSource.inConfigDir(settings.configDir, log),
    clock: systemClock,
    log,
    rate: settings.rate,
    periodMs: settings.periodSeconds * 1000,
  });

  try {
    await driver.run(ac.signal);
  } finally {
    await redis.quit();
    await sql.end({ timeout: 5 });
    log.info('Connections closed');
  }

  return 0;
}

// Graceful shutdown on SIGINT / SIGTERM: the current cycle finishes first
function shutdown(): void {
  if (ac.signal.aborted) return;
  bootLog.info('Shutdown requested, finishing current cycle...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    bootLog.fatal({ err }, 'Updater crashed');
    process.exit(EXIT_CRASH);
  });
