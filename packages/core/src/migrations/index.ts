import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@rowlog/shared';
import { sessionLogSchemaMigration } from './001-session-log-schema.ts';
import type { MigrationDefinition } from './types.ts';

export type { MigrationDefinition } from './types.ts';

export interface RunMigrationsResult {
  applied: string[];
  alreadyApplied: string[];
}

export const MIGRATIONS: ReadonlyArray<MigrationDefinition> = [sessionLogSchemaMigration];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL
    );
  `);
}

export function runMigrations(db: Database.Database): Result<RunMigrationsResult, AppError> {
  try {
    ensureMigrationsTable(db);

    const appliedNames = new Set(
      db
        .prepare<[], { name: string }>(
          `
            SELECT name
            FROM schema_migrations
            ORDER BY id ASC
          `,
        )
        .all()
        .map((row) => row.name),
    );

    const insertMigration = db.prepare<{ id: number; name: string; appliedAt: string }>(
      `
        INSERT INTO schema_migrations (id, name, applied_at)
        VALUES (@id, @name, @appliedAt)
      `,
    );

    const applied: string[] = [];
    const alreadyApplied: string[] = [];

    for (const migration of MIGRATIONS) {
      if (appliedNames.has(migration.name)) {
        alreadyApplied.push(migration.name);
        continue;
      }

      const applyMigrationTx = db.transaction(() => {
        migration.up(db);
        insertMigration.run({
          id: migration.id,
          name: migration.name,
          appliedAt: new Date().toISOString(),
        });
      });

      applyMigrationTx();
      applied.push(migration.name);
    }

    return ok({ applied, alreadyApplied });
  } catch (cause) {
    return err(
      AppError.fromUnknown('DB_MIGRATION_FAILED', 'Nie udało się przygotować schematu dziennika.', cause),
    );
  }
}
