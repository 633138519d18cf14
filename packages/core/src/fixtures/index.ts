import fs from 'node:fs';
import type Database from 'better-sqlite3';
import { AppError, SessionRecordDTOSchema, err, ok, type Result } from '@rowlog/shared';
import { fromSessionRecordDTO } from '@rowlog/training';
import { createSessionRepository } from '../repositories/session-repository.ts';
import type { SeedDatabaseResult, SeedFixture } from './types.ts';

export type { SeedFixture, SeedDatabaseResult } from './types.ts';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

const SeedSessionsSchema = SessionRecordDTOSchema.array().min(1);

export function loadSeedFixtureFromFile(filePath: string): Result<SeedFixture, AppError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (cause) {
    return err(
      AppError.fromUnknown('DB_FIXTURE_READ_FAILED', 'Nie udało się odczytać pliku fixture.', cause, { filePath }),
    );
  }

  const generatedAt = isRecord(parsed) ? parsed.generatedAt : undefined;
  if (!isRecord(parsed) || typeof generatedAt !== 'string') {
    return err(
      AppError.create('DB_FIXTURE_INVALID', 'Plik fixture ma niepoprawny format.', 'error', { filePath }),
    );
  }

  const sessions = SeedSessionsSchema.safeParse(parsed.sessions);
  if (!sessions.success) {
    return err(
      AppError.create('DB_FIXTURE_INVALID', 'Plik fixture ma niepoprawny format.', 'error', {
        filePath,
        issues: sessions.error.issues.slice(0, 5).map((issue) => issue.message),
      }),
    );
  }

  return ok({
    generatedAt,
    sessions: sessions.data.map(fromSessionRecordDTO),
  });
}

export function seedDatabaseFromFixture(
  db: Database.Database,
  fixture: SeedFixture,
): Result<SeedDatabaseResult, AppError> {
  const repository = createSessionRepository(db);

  const appendResult = repository.appendSessions(fixture.sessions);
  if (!appendResult.ok) {
    return appendResult;
  }

  return ok({ sessionsInserted: appendResult.value.inserted });
}
