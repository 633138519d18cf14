import { getDaysInMonth, isValid, parseISO } from 'date-fns';

export const TRAINING_ERROR_CODES = {
  INVALID_YEAR: 'INVALID_YEAR',
  INVALID_SPLIT_FORMAT: 'INVALID_SPLIT_FORMAT',
  UNDEFINED_RATE: 'UNDEFINED_RATE',
  SESSION_INVALID: 'SESSION_INVALID',
} as const;

export type TrainingErrorCode = (typeof TRAINING_ERROR_CODES)[keyof typeof TRAINING_ERROR_CODES];

// ─── Session types ────────────────────────────────────────────────

/** Declared order is the column order of monthly totals. */
export const SESSION_TYPES = ['Water', 'Erg', 'Cross-Training', 'Strength', 'Other'] as const;
export type KnownSessionType = (typeof SESSION_TYPES)[number];

export const FALLBACK_SESSION_TYPE: KnownSessionType = 'Other';

export type SessionTypeTag =
  | { kind: 'known'; type: KnownSessionType }
  | { kind: 'custom'; type: string };

export function isKnownSessionType(value: string): value is KnownSessionType {
  return SESSION_TYPES.some((type) => type === value);
}

export function normalizeSessionType(raw: string | null | undefined): string {
  const trimmed = raw?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : FALLBACK_SESSION_TYPE;
}

/**
 * Unrecognized types are kept verbatim so they can form their own bucket.
 */
export function classifySessionType(raw: string | null | undefined): SessionTypeTag {
  const normalized = normalizeSessionType(raw);
  if (isKnownSessionType(normalized)) {
    return { kind: 'known', type: normalized };
  }
  return { kind: 'custom', type: normalized };
}

// ─── Records ──────────────────────────────────────────────────────

export interface SessionRecord {
  /** YYYY-MM-DD */
  date: string;
  distanceKm: number;
  durationMin: number;
  speedKmh: number | null;
  sessionType: string;
  notes: string;
  createdAt: string;
}

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

const DAY_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function monthKey(date: CalendarDate): string {
  return String(date.month).padStart(2, '0');
}

export function dayKey(date: CalendarDate): string {
  return `${String(date.year).padStart(4, '0')}-${monthKey(date)}-${String(date.day).padStart(2, '0')}`;
}

/**
 * Local midnight of the given day. `new Date(y, m, d)` maps years 0–99 onto
 * 1900–1999, so the year is set separately.
 */
export function makeLocalDate(year: number, month: number, day: number): Date {
  const date = new Date(2000, month - 1, day);
  date.setFullYear(year, month - 1, day);
  return date;
}

export function toCalendarDate(date: Date): CalendarDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  };
}

export function parseDayKey(text: string): CalendarDate | null {
  const match = DAY_KEY_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  if (day > getDaysInMonth(makeLocalDate(year, month, 1))) {
    return null;
  }

  return { year, month, day };
}

export function isIsoTimestamp(value: string): boolean {
  return value.trim().length > 0 && isValid(parseISO(value));
}

/**
 * Whether a record may contribute to sums. Invalid records are skipped, not fatal.
 */
export function isAggregatable(record: SessionRecord): boolean {
  if (parseDayKey(record.date) === null) {
    return false;
  }
  return Number.isFinite(record.distanceKm) && record.distanceKm >= 0;
}
