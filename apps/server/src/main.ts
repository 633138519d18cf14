import fs from 'node:fs';
import path from 'node:path';
import {
  createSessionLogQueries,
  createSessionRepository,
  loadSeedFixtureFromFile,
  openSessionLogDatabase,
  seedDatabaseFromFixture,
  type DatabaseConnection,
} from '@rowlog/core';
import { AppError, createLogger, err, ok, type Logger, type Result } from '@rowlog/shared';
import { createServerApp } from './app.ts';
import { createServerBackend } from './backend.ts';
import { loadServerConfig, type ServerConfig } from './config.ts';
import { listenWithDatabase } from './lifecycle.ts';

function ensureDataDir(dbPath: string): Result<void, AppError> {
  if (dbPath === ':memory:') {
    return ok(undefined);
  }
  try {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    return ok(undefined);
  } catch (cause) {
    return err(
      AppError.fromUnknown('DB_DATA_DIR_FAILED', 'Nie udało się utworzyć katalogu danych.', cause, { dbPath }),
    );
  }
}

function seedIfEmpty(connection: DatabaseConnection, config: ServerConfig, logger: Logger): Result<void, AppError> {
  if (!config.seedFixturePath) {
    return ok(undefined);
  }

  const count = createSessionRepository(connection.db).countSessions();
  if (!count.ok) {
    return count;
  }
  if (count.value > 0) {
    logger.info('Dziennik zawiera już treningi, pomijam fixture.', { sessions: count.value });
    return ok(undefined);
  }

  const fixture = loadSeedFixtureFromFile(config.seedFixturePath);
  if (!fixture.ok) {
    return fixture;
  }

  const seeded = seedDatabaseFromFixture(connection.db, fixture.value);
  if (!seeded.ok) {
    return seeded;
  }

  logger.info('Załadowano przykładowe treningi.', {
    fixturePath: config.seedFixturePath,
    sessionsInserted: seeded.value.sessionsInserted,
  });
  return ok(undefined);
}

function start(): Result<void, AppError> {
  const configResult = loadServerConfig();
  if (!configResult.ok) {
    return configResult;
  }
  const config = configResult.value;
  const logger = createLogger({ baseContext: { module: 'server-main' }, minLevel: config.logLevel });

  const dataDir = ensureDataDir(config.dbPath);
  if (!dataDir.ok) {
    return dataDir;
  }

  const opened = openSessionLogDatabase({ filename: config.dbPath });
  if (!opened.ok) {
    return opened;
  }
  const { connection, migrations } = opened.value;

  const seeded = seedIfEmpty(connection, config, logger);
  if (!seeded.ok) {
    const closeResult = connection.close();
    if (!closeResult.ok) {
      logger.warning('Nie udało się zamknąć połączenia DB po błędzie fixture.', {
        error: closeResult.error.toDTO(),
      });
    }
    return seeded;
  }

  const queries = createSessionLogQueries(connection.db);
  const app = createServerApp({
    backend: createServerBackend(queries),
    logger: logger.withContext({ module: 'server' }),
    now: () => new Date(),
  });

  const running = listenWithDatabase(app, {
    port: config.port,
    host: config.host,
    connection,
    logger,
    onReady: () => {
      logger.info('Serwer gotowy.', {
        host: config.host,
        port: config.port,
        dbPath: config.dbPath,
        migrationsApplied: migrations.applied.length,
        migrationsAlreadyApplied: migrations.alreadyApplied.length,
      });
    },
    onFailure: () => {
      process.exitCode = 1;
    },
  });

  process.once('SIGINT', () => {
    running.shutdown('SIGINT');
  });
  process.once('SIGTERM', () => {
    running.shutdown('SIGTERM');
  });

  return ok(undefined);
}

const started = start();
if (!started.ok) {
  createLogger({ baseContext: { module: 'server-main' } }).fatal('Nie udało się uruchomić serwera.', {
    error: started.error.toDTO(),
  });
  process.exitCode = 1;
}
