import { eachDayOfInterval, parseISO } from 'date-fns';
import { roundTo } from './pace-converter.ts';
import {
  SESSION_TYPES,
  classifySessionType,
  dayKey,
  isAggregatable,
  makeLocalDate,
  monthKey,
  parseDayKey,
  toCalendarDate,
  type SessionRecord,
} from './record-model.ts';

export interface CumulativeEntry {
  date: string;
  km: number;
}

export interface YearlyTable {
  year: number;
  /** Every day of the year in calendar order. */
  dailyMileage: Map<string, number>;
  cumulative: CumulativeEntry[];
}

export interface MonthlyTotals {
  year: number;
  sessionTypes: string[];
  /** Month key "01".."12" to session type to kilometres. */
  totals: Map<string, Map<string, number>>;
}

export const MONTH_KEYS: readonly string[] = Array.from({ length: 12 }, (_, index) =>
  monthKey({ year: 2000, month: index + 1, day: 1 }),
);

export function listYearDays(year: number): string[] {
  return eachDayOfInterval({
    start: makeLocalDate(year, 1, 1),
    end: makeLocalDate(year, 12, 31),
  }).map((day) => dayKey(toCalendarDate(day)));
}

function recordsInYear(records: readonly SessionRecord[], year: number): SessionRecord[] {
  return records.filter((record) => {
    if (!isAggregatable(record)) {
      return false;
    }
    return parseDayKey(record.date)?.year === year;
  });
}

function compareText(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

// Unparseable timestamps sort after every valid one.
function createdAtInstant(record: SessionRecord): number {
  const time = parseISO(record.createdAt).getTime();
  return Number.isNaN(time) ? Number.POSITIVE_INFINITY : time;
}

function compareInstants(left: number, right: number): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/**
 * Date ascending, then creation instant (offsets taken into account); remaining
 * ties keep source order.
 */
export function sortRecords(records: readonly SessionRecord[]): SessionRecord[] {
  return [...records].sort(
    (left, right) =>
      compareText(left.date, right.date) || compareInstants(createdAtInstant(left), createdAtInstant(right)),
  );
}

export function buildYearlyTable(records: readonly SessionRecord[], year: number): YearlyTable {
  const sums = new Map<string, number>();
  for (const day of listYearDays(year)) {
    sums.set(day, 0);
  }

  for (const record of recordsInYear(records, year)) {
    const date = parseDayKey(record.date);
    if (!date) {
      continue;
    }
    const key = dayKey(date);
    sums.set(key, (sums.get(key) ?? 0) + record.distanceKm);
  }

  const dailyMileage = new Map<string, number>();
  const cumulative: CumulativeEntry[] = [];
  let runningKm = 0;
  for (const [day, km] of sums) {
    const dailyKm = roundTo(km, 2);
    dailyMileage.set(day, dailyKm);
    runningKm += dailyKm;
    cumulative.push({ date: day, km: roundTo(runningKm, 2) });
  }

  return { year, dailyMileage, cumulative };
}

/**
 * Declared types first, then unrecognized ones in the order they first occur.
 */
export function collectSessionTypes(records: readonly SessionRecord[]): string[] {
  const types: string[] = [...SESSION_TYPES];
  for (const record of records) {
    const tag = classifySessionType(record.sessionType);
    if (tag.kind === 'custom' && !types.includes(tag.type)) {
      types.push(tag.type);
    }
  }
  return types;
}

export function buildMonthlyTotals(records: readonly SessionRecord[], year: number): MonthlyTotals {
  const yearRecords = recordsInYear(records, year);
  const sessionTypes = collectSessionTypes(sortRecords(yearRecords));

  const totals = new Map<string, Map<string, number>>();
  for (const month of MONTH_KEYS) {
    totals.set(month, new Map(sessionTypes.map((type) => [type, 0])));
  }

  for (const record of yearRecords) {
    const date = parseDayKey(record.date);
    const monthTotals = date ? totals.get(monthKey(date)) : undefined;
    if (!monthTotals) {
      continue;
    }
    const type = classifySessionType(record.sessionType).type;
    monthTotals.set(type, (monthTotals.get(type) ?? 0) + record.distanceKm);
  }

  for (const monthTotals of totals.values()) {
    for (const [type, km] of monthTotals) {
      monthTotals.set(type, roundTo(km, 2));
    }
  }

  return { year, sessionTypes, totals };
}
