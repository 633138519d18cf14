import { fileURLToPath } from 'node:url';
import {
  createSessionLogQueries,
  loadSeedFixtureFromFile,
  openSessionLogDatabase,
  seedDatabaseFromFixture,
} from '@rowlog/core';
import { AppError, createLogger, err, ok, type LogEntry } from '@rowlog/shared';
import { getMonthlyTotals, type SessionRecord } from '@rowlog/training';
import { describe, expect, it } from 'vitest';
import { createServerBackend } from './backend.ts';
import {
  exportFilename,
  handleExportCsv,
  handleGetAllRecords,
  handleGetMonthlyTotals,
  handleGetYearlyTable,
  handleHealth,
  handleImportCsv,
  handleLogSession,
  handleResolvePace,
  statusForError,
  type HandlerContext,
  type ServerBackend,
} from './http-handlers.ts';

const fixturePath = fileURLToPath(new URL('../../../fixtures/seed-sessions.json', import.meta.url));

interface TestContext {
  context: HandlerContext;
  entries: LogEntry[];
  close: () => void;
}

function createTestContext(): TestContext {
  const opened = openSessionLogDatabase();
  expect(opened.ok).toBe(true);
  if (!opened.ok) {
    throw new Error(opened.error.message);
  }

  const fixtureResult = loadSeedFixtureFromFile(fixturePath);
  expect(fixtureResult.ok).toBe(true);
  if (!fixtureResult.ok) {
    throw new Error(fixtureResult.error.message);
  }

  const seedResult = seedDatabaseFromFixture(opened.value.connection.db, fixtureResult.value);
  expect(seedResult.ok).toBe(true);
  if (!seedResult.ok) {
    throw new Error(seedResult.error.message);
  }

  const entries: LogEntry[] = [];
  const queries = createSessionLogQueries(opened.value.connection.db, {
    now: () => new Date('2024-06-01T10:15:30.000Z'),
  });

  return {
    context: {
      backend: createServerBackend(queries),
      logger: createLogger({
        writer: (entry) => {
          entries.push(entry);
        },
        now: () => '2024-06-01T10:15:30.000Z',
      }),
      now: () => new Date(2024, 5, 1, 12, 0, 0),
    },
    entries,
    close: () => {
      opened.value.connection.close();
    },
  };
}

function createFakeBackend(overrides: Partial<ServerBackend>): ServerBackend {
  const unused = () => err(AppError.create('TEST_UNUSED', 'Not used in this test.'));
  return {
    getAllRecords: unused,
    getYearlyTable: unused,
    getMonthlyTotals: unused,
    logSession: unused,
    resolvePace: unused,
    exportCsv: unused,
    importCsv: unused,
    countSessions: unused,
    ...overrides,
  };
}

describe('HTTP handlers', () => {
  it('reports health with the session count', () => {
    const { context, close } = createTestContext();
    expect(handleHealth(context, {})).toEqual({ status: 200, body: { ok: true, value: { status: 'ok', sessions: 24 } } });
    close();
  });

  it('returns all records sorted by date', () => {
    const { context, close } = createTestContext();
    const response = handleGetAllRecords(context, {});
    expect(response.status).toBe(200);
    if (response.body.ok) {
      expect(response.body.value.rows).toHaveLength(24);
      expect(response.body.value.rows[0]?.date).toBe('2023-11-04');
    }
    close();
  });

  it('defaults to the current year and validates explicit years', () => {
    const { context, close } = createTestContext();

    const current = handleGetYearlyTable(context, {});
    expect(current.status).toBe(200);
    expect(current.body.ok && current.body.value.year).toBe(2024);
    expect(current.body.ok && current.body.value.cumulative.at(-1)).toEqual({ date: '2024-12-31', km: 153.6 });

    const blank = handleGetMonthlyTotals(context, { year: ' ' });
    expect(blank.status).toBe(200);
    expect(blank.body.ok && blank.body.value.year).toBe(2024);

    const earlier = handleGetMonthlyTotals(context, { year: '2023' });
    expect(earlier.status).toBe(200);
    expect(earlier.body.ok && earlier.body.value.totals['12']).toEqual({
      Water: 0,
      Erg: 18.5,
      'Cross-Training': 0,
      Strength: 0,
      Other: 0,
    });

    const invalid = handleGetYearlyTable(context, { year: 'abc' });
    expect(invalid.status).toBe(400);
    expect(invalid.body.ok ? null : invalid.body.error.code).toBe('INVALID_YEAR');

    const repeated = handleGetMonthlyTotals(context, { year: ['2024', '2023'] });
    expect(repeated.status).toBe(400);
    expect(repeated.body.ok ? null : repeated.body.error.code).toBe('API_INVALID_PAYLOAD');
    close();
  });

  it('logs a session with 201 and rejects invalid forms with 400', () => {
    const { context, entries, close } = createTestContext();

    const created = handleLogSession(context, {
      date: '2024-06-01',
      distance_km: '8',
      duration_min: '40',
      session_type: 'Water',
    });
    expect(created).toEqual({
      status: 201,
      body: {
        ok: true,
        value: {
          date: '2024-06-01',
          distance_km: 8,
          duration_min: 40,
          speed_kmh: 12,
          session_type: 'Water',
          notes: '',
          created_at: '2024-06-01T10:15:30Z',
        },
      },
    });
    expect(entries.map((entry) => entry.message)).toEqual(['Zapisano trening.']);

    const rejected = handleLogSession(context, { date: 'tomorrow', distance_km: '8', duration_min: '40' });
    expect(rejected.status).toBe(400);
    expect(rejected.body.ok ? null : rejected.body.error.code).toBe('SESSION_INVALID');

    const badSplit = handleLogSession(context, { date: '2024-06-01', distance_km: '8', split: 'quick' });
    expect(badSplit.status).toBe(400);
    expect(badSplit.body.ok ? null : badSplit.body.error.code).toBe('INVALID_SPLIT_FORMAT');
    close();
  });

  it('derives pace and maps pace errors to 400 and 422', () => {
    const { context, close } = createTestContext();

    expect(handleResolvePace(context, { distance_km: '10', duration_min: '50' })).toEqual({
      status: 200,
      body: {
        ok: true,
        value: {
          presence: 'solvable',
          derived_field: 'split',
          distance_km: '10',
          duration_min: '50',
          split: '2:30.0',
          speed_kmh: '12.00',
          consistent: null,
        },
      },
    });

    const malformed = handleResolvePace(context, { distance_km: '10', split: '2.30' });
    expect(malformed.status).toBe(400);

    const undefinedRate = handleResolvePace(context, { distance_km: 10, duration_min: 1e-320 });
    expect(undefinedRate.status).toBe(422);
    expect(undefinedRate.body.ok ? null : undefinedRate.body.error.code).toBe('UNDEFINED_RATE');
    close();
  });

  it('imports CSV rows and reports row issues', () => {
    const { context, entries, close } = createTestContext();

    const response = handleImportCsv(context, {
      csv_text: ['date,distance_km,duration_min', '2024-06-02,5,25', '2024-06-03,5,0'].join('\n'),
    });
    expect(response.status).toBe(200);
    expect(response.body.ok && response.body.value.imported).toBe(1);
    expect(response.body.ok && response.body.value.issues.map((issue) => issue.row_number)).toEqual([3]);
    expect(entries.at(-1)?.context).toEqual({ imported: 1, rowsTotal: 2, issues: 1 });
    expect(handleHealth(context, {}).body).toEqual({ ok: true, value: { status: 'ok', sessions: 25 } });

    const empty = handleImportCsv(context, { csv_text: '' });
    expect(empty.body.ok ? null : empty.body.error.code).toBe('API_INVALID_PAYLOAD');

    const badHeader = handleImportCsv(context, { csv_text: 'when,how_far\n2024-06-02,5\n' });
    expect(badHeader.status).toBe(400);
    expect(badHeader.body.ok ? null : badHeader.body.error.code).toBe('CSV_IMPORT_HEADER_INVALID');
    close();
  });

  it('exports the log as a dated CSV attachment', () => {
    const { context, close } = createTestContext();
    const response = handleExportCsv(context);
    expect(response.kind).toBe('file');
    if (response.kind === 'file') {
      expect(response.filename).toBe('rowing_log_2024-06-01.csv');
      expect(response.csv.split('\n')[0]).toBe('date,distance_km,duration_min,speed_kmh,session_type,notes,created_at');
      expect(response.csv.split('\n')[1]).toBe('2023-11-04,8.20,42.00,11.71,Water,Long steady piece,2023-11-04T18:00:00Z');
    }
    close();
  });
});

describe('HTTP handler failures', () => {
  it('turns thrown exceptions into logged 500 responses', () => {
    const entries: LogEntry[] = [];
    const context: HandlerContext = {
      backend: createFakeBackend({
        getAllRecords: () => {
          throw new Error('disk vanished');
        },
      }),
      logger: createLogger({
        writer: (entry) => {
          entries.push(entry);
        },
      }),
      now: () => new Date(2024, 0, 1),
    };

    const response = handleGetAllRecords(context, {});
    expect(response.status).toBe(500);
    expect(response.body.ok ? null : response.body.error.code).toBe('API_HANDLER_EXECUTION_FAILED');
    expect(response.body.ok ? null : response.body.error.cause).toBe('disk vanished');
    expect(entries.map((entry) => entry.level)).toEqual(['error']);
  });

  it('rejects backend output that breaks the contract', () => {
    const context: HandlerContext = {
      backend: createFakeBackend({
        getAllRecords: () =>
          ok({
            rows: [
              {
                date: '2024-01-01',
                distance_km: 1,
                duration_min: 0,
                speed_kmh: null,
                session_type: 'Erg',
                notes: '',
                created_at: '2024-01-01T00:00:00Z',
              },
            ],
          }),
      }),
      logger: createLogger({ writer: () => undefined }),
      now: () => new Date(2024, 0, 1),
    };

    const response = handleGetAllRecords(context, {});
    expect(response.status).toBe(500);
    expect(response.body.ok ? null : response.body.error.code).toBe('API_INVALID_OUTPUT');
  });

  it('keeps session types named after object internals in monthly totals', () => {
    const records: SessionRecord[] = [
      {
        date: '2024-05-01',
        distanceKm: 3,
        durationMin: 20,
        speedKmh: null,
        sessionType: '__proto__',
        notes: '',
        createdAt: '2024-05-01T08:00:00Z',
      },
      {
        date: '2024-05-02',
        distanceKm: 2,
        durationMin: 15,
        speedKmh: null,
        sessionType: 'constructor',
        notes: '',
        createdAt: '2024-05-02T08:00:00Z',
      },
    ];
    const context: HandlerContext = {
      backend: createFakeBackend({ getMonthlyTotals: (year) => getMonthlyTotals(records, year) }),
      logger: createLogger({ writer: () => undefined }),
      now: () => new Date(2024, 0, 1),
    };

    const response = handleGetMonthlyTotals(context, { year: '2024' });
    expect(response.status).toBe(200);
    if (!response.body.ok) {
      throw new Error(response.body.error.message);
    }

    const types = ['Water', 'Erg', 'Cross-Training', 'Strength', 'Other', '__proto__', 'constructor'];
    expect(response.body.value.session_types).toEqual(types);
    expect(Object.entries(response.body.value.totals['05'] ?? {})).toEqual([
      ['Water', 0],
      ['Erg', 0],
      ['Cross-Training', 0],
      ['Strength', 0],
      ['Other', 0],
      ['__proto__', 3],
      ['constructor', 2],
    ]);
    expect(Object.keys(response.body.value.totals['01'] ?? {})).toEqual(types);
    expect(JSON.stringify(response.body.value.totals['05'])).toBe(
      '{"Water":0,"Erg":0,"Cross-Training":0,"Strength":0,"Other":0,"__proto__":3,"constructor":2}',
    );
  });

  it('passes export failures through with their status', () => {
    const context: HandlerContext = {
      backend: createFakeBackend({
        exportCsv: () => err(AppError.create('DB_SESSIONS_READ_FAILED', 'Nie udało się odczytać dziennika treningów.')),
      }),
      logger: createLogger({ writer: () => undefined }),
      now: () => new Date(2024, 0, 1),
    };

    const response = handleExportCsv(context);
    expect(response.kind).toBe('error');
    expect(response.status).toBe(500);
  });
});

describe('statusForError', () => {
  it.each([
    ['INVALID_YEAR', 400],
    ['INVALID_SPLIT_FORMAT', 400],
    ['SESSION_INVALID', 400],
    ['CSV_IMPORT_EMPTY', 400],
    ['API_INVALID_PAYLOAD', 400],
    ['UNDEFINED_RATE', 422],
    ['DB_OPEN_FAILED', 500],
  ])('maps %s to %i', (code, status) => {
    expect(statusForError(AppError.create(code, 'test'))).toBe(status);
  });
});

describe('exportFilename', () => {
  it('names the file after the local calendar day', () => {
    expect(exportFilename(new Date(2024, 0, 5, 23, 30))).toBe('rowing_log_2024-01-05.csv');
  });
});
