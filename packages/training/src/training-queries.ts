import {
  AppError,
  err,
  ok,
  type AllRecordsDTO,
  type MonthlyTotalsDTO,
  type PaceInputDTO,
  type PaceResultDTO,
  type Result,
  type SessionRecordDTO,
  type YearlyTableDTO,
} from '@rowlog/shared';
import { buildMonthlyTotals, buildYearlyTable, sortRecords } from './aggregator.ts';
import { derivePace, parseSplit } from './pace-converter.ts';
import { TRAINING_ERROR_CODES, type SessionRecord } from './record-model.ts';

export const MIN_YEAR = 1000;
export const MAX_YEAR = 9999;

const YEAR_TEXT_PATTERN = /^\d{4}$/;

function createInvalidYearError(input: unknown): AppError {
  return AppError.create(
    TRAINING_ERROR_CODES.INVALID_YEAR,
    'Nieprawidłowy rok. Podaj czterocyfrowy rok, np. 2024.',
    'error',
    { input: typeof input === 'string' || typeof input === 'number' ? input : typeof input },
  );
}

/**
 * Accepts an integer or the text of one (e.g. a query-string value).
 */
export function parseYear(input: unknown): Result<number, AppError> {
  let year: number;
  if (typeof input === 'number') {
    year = input;
  } else if (typeof input === 'string' && YEAR_TEXT_PATTERN.test(input.trim())) {
    year = Number(input.trim());
  } else {
    return err(createInvalidYearError(input));
  }

  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    return err(createInvalidYearError(input));
  }
  return ok(year);
}

export function toSessionRecordDTO(record: SessionRecord): SessionRecordDTO {
  return {
    date: record.date,
    distance_km: record.distanceKm,
    duration_min: record.durationMin,
    speed_kmh: record.speedKmh,
    session_type: record.sessionType,
    notes: record.notes,
    created_at: record.createdAt,
  };
}

export function fromSessionRecordDTO(dto: SessionRecordDTO): SessionRecord {
  return {
    date: dto.date,
    distanceKm: dto.distance_km,
    durationMin: dto.duration_min,
    speedKmh: dto.speed_kmh,
    sessionType: dto.session_type,
    notes: dto.notes,
    createdAt: dto.created_at,
  };
}

export function getYearlyTable(records: readonly SessionRecord[], year: unknown): Result<YearlyTableDTO, AppError> {
  const parsedYear = parseYear(year);
  if (!parsedYear.ok) {
    return parsedYear;
  }

  const table = buildYearlyTable(records, parsedYear.value);
  return ok({
    year: table.year,
    daily_mileage: Object.fromEntries(table.dailyMileage),
    cumulative: table.cumulative.map((entry) => ({ date: entry.date, km: entry.km })),
  });
}

export function getMonthlyTotals(
  records: readonly SessionRecord[],
  year: unknown,
): Result<MonthlyTotalsDTO, AppError> {
  const parsedYear = parseYear(year);
  if (!parsedYear.ok) {
    return parsedYear;
  }

  const monthly = buildMonthlyTotals(records, parsedYear.value);
  const totals: Record<string, Record<string, number>> = {};
  for (const [month, byType] of monthly.totals) {
    totals[month] = Object.fromEntries(byType);
  }

  return ok({
    year: monthly.year,
    session_types: monthly.sessionTypes,
    totals,
  });
}

export function getAllRecords(records: readonly SessionRecord[]): Result<AllRecordsDTO, AppError> {
  return ok({ rows: sortRecords(records).map(toSessionRecordDTO) });
}

/**
 * Unlike `derivePace`, a non-blank split that does not parse is reported instead
 * of being treated as missing.
 */
export function resolvePace(input: PaceInputDTO): Result<PaceResultDTO, AppError> {
  const splitText = input.split?.trim() ?? '';
  if (splitText.length > 0) {
    const split = parseSplit(splitText);
    if (!split.ok) {
      return split;
    }
  }

  const resolution = derivePace({
    distanceKm: input.distance_km,
    durationMin: input.duration_min,
    split: input.split,
  });
  if (!resolution.ok) {
    return resolution;
  }

  return ok({
    presence: resolution.value.presence,
    derived_field: resolution.value.derivedField,
    distance_km: resolution.value.values.distanceKm,
    duration_min: resolution.value.values.durationMin,
    split: resolution.value.values.split,
    speed_kmh: resolution.value.speedKmh,
    consistent: resolution.value.consistent,
  });
}
