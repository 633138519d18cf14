import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@rowlog/shared';
import type { SessionRecord } from '@rowlog/training';
import type { AppendSessionsResult, ListSessionsInput, SessionRow } from './types.ts';

export interface SessionRepository {
  appendSession: (record: SessionRecord) => Result<number, AppError>;
  appendSessions: (records: readonly SessionRecord[]) => Result<AppendSessionsResult, AppError>;
  /** Insertion order, which is the source order the aggregator relies on for ties. */
  listSessions: (input?: ListSessionsInput) => Result<SessionRecord[], AppError>;
  countSessions: () => Result<number, AppError>;
}

interface SessionInsertParams {
  date: string;
  distanceKm: number;
  durationMin: number;
  speedKmh: number | null;
  sessionType: string;
  notes: string;
  createdAt: string;
}

function toNumberId(value: number | bigint): number {
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return value;
}

function toInsertParams(record: SessionRecord): SessionInsertParams {
  return {
    date: record.date,
    distanceKm: record.distanceKm,
    durationMin: record.durationMin,
    speedKmh: record.speedKmh,
    sessionType: record.sessionType,
    notes: record.notes,
    createdAt: record.createdAt,
  };
}

function toSessionRecord(row: SessionRow): SessionRecord {
  return {
    date: row.date,
    distanceKm: row.distance_km,
    durationMin: row.duration_min,
    speedKmh: row.speed_kmh,
    sessionType: row.session_type,
    notes: row.notes,
    createdAt: row.created_at,
  };
}

export function createSessionRepository(db: Database.Database): SessionRepository {
  const insertSessionStmt = db.prepare<SessionInsertParams>(
    `
      INSERT INTO sessions (date, distance_km, duration_min, speed_kmh, session_type, notes, created_at)
      VALUES (@date, @distanceKm, @durationMin, @speedKmh, @sessionType, @notes, @createdAt)
    `,
  );

  const listSessionsStmt = db.prepare<{ dateFrom: string | null; dateTo: string | null }, SessionRow>(
    `
      SELECT id, date, distance_km, duration_min, speed_kmh, session_type, notes, created_at
      FROM sessions
      WHERE (@dateFrom IS NULL OR date >= @dateFrom)
        AND (@dateTo IS NULL OR date <= @dateTo)
      ORDER BY id ASC
    `,
  );

  const countSessionsStmt = db.prepare<[], { total: number }>(
    `
      SELECT COUNT(*) AS total
      FROM sessions
    `,
  );

  const appendSessionsTx = db.transaction((records: readonly SessionRecord[]): AppendSessionsResult => {
    let firstId: number | null = null;
    let lastId: number | null = null;
    for (const record of records) {
      const id = toNumberId(insertSessionStmt.run(toInsertParams(record)).lastInsertRowid);
      if (firstId === null) {
        firstId = id;
      }
      lastId = id;
    }
    return { inserted: records.length, firstId, lastId };
  });

  return {
    appendSession: (record) => {
      try {
        return ok(toNumberId(insertSessionStmt.run(toInsertParams(record)).lastInsertRowid));
      } catch (cause) {
        return err(
          AppError.fromUnknown('DB_SESSION_APPEND_FAILED', 'Nie udało się zapisać treningu.', cause, {
            date: record.date,
          }),
        );
      }
    },

    appendSessions: (records) => {
      try {
        return ok(appendSessionsTx(records));
      } catch (cause) {
        return err(
          AppError.fromUnknown('DB_SESSIONS_APPEND_FAILED', 'Nie udało się zapisać treningów.', cause, {
            count: records.length,
          }),
        );
      }
    },

    listSessions: (input = {}) => {
      try {
        const rows = listSessionsStmt.all({
          dateFrom: input.dateFrom ?? null,
          dateTo: input.dateTo ?? null,
        });
        return ok(rows.map(toSessionRecord));
      } catch (cause) {
        return err(
          AppError.fromUnknown('DB_SESSIONS_READ_FAILED', 'Nie udało się odczytać dziennika treningów.', cause, {
            dateFrom: input.dateFrom ?? null,
            dateTo: input.dateTo ?? null,
          }),
        );
      }
    },

    countSessions: () => {
      try {
        return ok(countSessionsStmt.get()?.total ?? 0);
      } catch (cause) {
        return err(
          AppError.fromUnknown('DB_SESSIONS_COUNT_FAILED', 'Nie udało się policzyć treningów.', cause),
        );
      }
    },
  };
}
