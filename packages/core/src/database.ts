import Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@rowlog/shared';
import { runMigrations, type RunMigrationsResult } from './migrations/index.ts';

export interface CreateDatabaseInput {
  /** Defaults to an in-memory database. */
  filename?: string;
  readonly?: boolean;
  fileMustExist?: boolean;
  timeoutMs?: number;
}

export interface DatabaseConnection {
  readonly db: Database.Database;
  close: () => Result<void, AppError>;
}

export interface OpenSessionLogResult {
  connection: DatabaseConnection;
  migrations: RunMigrationsResult;
}

export function createDatabaseConnection(input: CreateDatabaseInput = {}): Result<DatabaseConnection, AppError> {
  const filename = input.filename ?? ':memory:';
  const timeoutMs = input.timeoutMs ?? 5_000;

  try {
    const db = new Database(filename, {
      readonly: input.readonly ?? false,
      fileMustExist: input.fileMustExist ?? false,
      timeout: timeoutMs,
    });

    db.pragma(`busy_timeout = ${String(timeoutMs)}`);

    if (!db.memory && !db.readonly) {
      db.pragma('journal_mode = WAL');
    }

    return ok({
      db,
      close: () => closeDatabaseConnection(db),
    });
  } catch (cause) {
    return err(
      AppError.fromUnknown('DB_OPEN_FAILED', 'Nie udało się otworzyć dziennika treningów.', cause, {
        filename,
        timeoutMs,
      }),
    );
  }
}

export function closeDatabaseConnection(db: Database.Database): Result<void, AppError> {
  try {
    if (db.open) {
      db.close();
    }
    return ok(undefined);
  } catch (cause) {
    return err(
      AppError.fromUnknown('DB_CLOSE_FAILED', 'Nie udało się zamknąć dziennika treningów.', cause, {
        databaseName: db.name,
      }),
    );
  }
}

/**
 * Opens the log and brings its schema up to date. The connection is closed
 * again when a migration fails.
 */
export function openSessionLogDatabase(input: CreateDatabaseInput = {}): Result<OpenSessionLogResult, AppError> {
  const connection = createDatabaseConnection(input);
  if (!connection.ok) {
    return connection;
  }

  const migrations = runMigrations(connection.value.db);
  if (!migrations.ok) {
    connection.value.close();
    return migrations;
  }

  return ok({ connection: connection.value, migrations: migrations.value });
}
