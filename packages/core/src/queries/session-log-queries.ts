import type Database from 'better-sqlite3';
import {
  ok,
  type AllRecordsDTO,
  type AppError,
  type CsvImportInputDTO,
  type CsvImportResultDTO,
  type LogSessionInputDTO,
  type MonthlyTotalsDTO,
  type Result,
  type SessionRecordDTO,
  type YearlyTableDTO,
} from '@rowlog/shared';
import {
  buildSessionRecord,
  getAllRecords,
  getMonthlyTotals,
  getYearlyTable,
  parseYear,
  toSessionRecordDTO,
  type IntakeClock,
  type SessionRecord,
} from '@rowlog/training';
import { parseSessionsCsv, serializeSessionsCsv } from '../csv/session-csv.ts';
import { createSessionRepository } from '../repositories/session-repository.ts';

export interface SessionLogQueries {
  getAllRecords: () => Result<AllRecordsDTO, AppError>;
  getYearlyTable: (year: unknown) => Result<YearlyTableDTO, AppError>;
  getMonthlyTotals: (year: unknown) => Result<MonthlyTotalsDTO, AppError>;
  logSession: (input: LogSessionInputDTO) => Result<SessionRecordDTO, AppError>;
  exportCsv: () => Result<string, AppError>;
  importCsv: (input: CsvImportInputDTO) => Result<CsvImportResultDTO, AppError>;
  countSessions: () => Result<number, AppError>;
}

export interface SessionLogQueriesOptions {
  now?: IntakeClock;
}

export function createSessionLogQueries(
  db: Database.Database,
  options: SessionLogQueriesOptions = {},
): SessionLogQueries {
  const repository = createSessionRepository(db);
  const now = options.now ?? (() => new Date());

  const readYear = (year: unknown): Result<{ year: number; records: SessionRecord[] }, AppError> => {
    const parsedYear = parseYear(year);
    if (!parsedYear.ok) {
      return parsedYear;
    }

    const records = repository.listSessions({
      dateFrom: `${String(parsedYear.value)}-01-01`,
      dateTo: `${String(parsedYear.value)}-12-31`,
    });
    if (!records.ok) {
      return records;
    }
    return ok({ year: parsedYear.value, records: records.value });
  };

  return {
    getAllRecords: () => {
      const records = repository.listSessions();
      if (!records.ok) {
        return records;
      }
      return getAllRecords(records.value);
    },

    getYearlyTable: (year) => {
      const snapshot = readYear(year);
      if (!snapshot.ok) {
        return snapshot;
      }
      return getYearlyTable(snapshot.value.records, snapshot.value.year);
    },

    getMonthlyTotals: (year) => {
      const snapshot = readYear(year);
      if (!snapshot.ok) {
        return snapshot;
      }
      return getMonthlyTotals(snapshot.value.records, snapshot.value.year);
    },

    logSession: (input) => {
      const record = buildSessionRecord(
        {
          date: input.date,
          distanceKm: input.distance_km,
          durationMin: input.duration_min,
          speedKmh: input.speed_kmh,
          split: input.split,
          sessionType: input.session_type,
          notes: input.notes,
        },
        now,
      );
      if (!record.ok) {
        return record;
      }

      const appended = repository.appendSession(record.value);
      if (!appended.ok) {
        return appended;
      }
      return ok(toSessionRecordDTO(record.value));
    },

    exportCsv: () => {
      const records = repository.listSessions();
      if (!records.ok) {
        return records;
      }
      return ok(serializeSessionsCsv(records.value));
    },

    importCsv: (input) => {
      const parsed = parseSessionsCsv(input.csv_text, now);
      if (!parsed.ok) {
        return parsed;
      }

      if (parsed.value.records.length > 0) {
        const appended = repository.appendSessions(parsed.value.records);
        if (!appended.ok) {
          return appended;
        }
      }

      return ok({
        imported: parsed.value.records.length,
        rows_total: parsed.value.rowsTotal,
        issues: parsed.value.issues,
      });
    },

    countSessions: () => repository.countSessions(),
  };
}
