import { AppError, err, ok, type CsvImportIssueDTO, type Result } from '@rowlog/shared';
import { buildSessionRecord, roundTo, type IntakeClock, type SessionRecord } from '@rowlog/training';
import { isBlankCsvRow, splitCsvRows } from './csv-rows.ts';

export const SESSION_CSV_COLUMNS = [
  'date',
  'distance_km',
  'duration_min',
  'speed_kmh',
  'session_type',
  'notes',
  'created_at',
] as const;

export type SessionCsvColumn = (typeof SESSION_CSV_COLUMNS)[number];

const REQUIRED_COLUMNS: readonly SessionCsvColumn[] = ['date', 'distance_km', 'duration_min'];

export interface ParsedSessionsCsv {
  records: SessionRecord[];
  issues: CsvImportIssueDTO[];
  rowsTotal: number;
}

function createCsvError(code: string, message: string, context: Record<string, unknown>): AppError {
  return AppError.create(code, message, 'error', context);
}

// ─── Export ───────────────────────────────────────────────────────

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
}

function formatCsvNumber(value: number): string {
  return roundTo(value, 2).toFixed(2);
}

function toCsvLine(values: readonly string[]): string {
  return values.map(escapeCsvField).join(',');
}

export function serializeSessionsCsv(records: readonly SessionRecord[]): string {
  const lines = [toCsvLine(SESSION_CSV_COLUMNS)];
  for (const record of records) {
    lines.push(
      toCsvLine([
        record.date,
        formatCsvNumber(record.distanceKm),
        formatCsvNumber(record.durationMin),
        record.speedKmh === null ? '' : formatCsvNumber(record.speedKmh),
        record.sessionType,
        record.notes,
        record.createdAt,
      ]),
    );
  }
  return `${lines.join('\n')}\n`;
}

// ─── Import ───────────────────────────────────────────────────────

function isSessionCsvColumn(value: string): value is SessionCsvColumn {
  return SESSION_CSV_COLUMNS.some((column) => column === value);
}

function indexHeader(headerRow: readonly string[]): Map<SessionCsvColumn, number> {
  const indexes = new Map<SessionCsvColumn, number>();
  headerRow.forEach((rawHeader, index) => {
    const header = rawHeader.trim().toLowerCase();
    if (isSessionCsvColumn(header) && !indexes.has(header)) {
      indexes.set(header, index);
    }
  });
  return indexes;
}

function describeValue(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return null;
}

function toIssue(rowNumber: number, error: AppError): CsvImportIssueDTO {
  const field = error.context.field;
  return {
    row_number: rowNumber,
    column: typeof field === 'string' ? field : '',
    code: error.code,
    message: error.message,
    value: describeValue(error.context.value ?? error.context.input),
  };
}

/**
 * Reads a session log export. Every data row goes through intake; rows that
 * fail are reported as issues and left out, the rest are returned in file order.
 */
export function parseSessionsCsv(
  csvText: string,
  now: IntakeClock = () => new Date(),
): Result<ParsedSessionsCsv, AppError> {
  const parsedRows = splitCsvRows(csvText);
  if (!parsedRows.ok) {
    return parsedRows;
  }

  const [headerRow, ...dataRows] = parsedRows.value;
  if (!headerRow) {
    return err(createCsvError('CSV_IMPORT_EMPTY', 'Przekazany CSV jest pusty.', {}));
  }

  const columns = indexHeader(headerRow.cells);
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.has(column));
  if (missing.length > 0) {
    return err(
      createCsvError('CSV_IMPORT_HEADER_INVALID', 'Brakuje wymaganych kolumn w nagłówku CSV.', {
        missing,
        headers: headerRow.cells,
      }),
    );
  }

  const records: SessionRecord[] = [];
  const issues: CsvImportIssueDTO[] = [];
  let rowsTotal = 0;

  for (const row of dataRows) {
    if (isBlankCsvRow(row.cells)) {
      continue;
    }
    rowsTotal += 1;

    const cell = (column: SessionCsvColumn): string => {
      const columnIndex = columns.get(column);
      return columnIndex === undefined ? '' : (row.cells[columnIndex] ?? '');
    };

    const record = buildSessionRecord(
      {
        date: cell('date'),
        distanceKm: cell('distance_km'),
        durationMin: cell('duration_min'),
        speedKmh: cell('speed_kmh'),
        sessionType: cell('session_type'),
        notes: cell('notes'),
        createdAt: cell('created_at'),
      },
      now,
    );

    if (!record.ok) {
      issues.push(toIssue(row.line, record.error));
      continue;
    }
    records.push(record.value);
  }

  return ok({ records, issues, rowsTotal });
}
