import { describe, expect, it } from 'vitest';
import {
  FALLBACK_SESSION_TYPE,
  SESSION_TYPES,
  classifySessionType,
  dayKey,
  isAggregatable,
  isIsoTimestamp,
  makeLocalDate,
  monthKey,
  normalizeSessionType,
  parseDayKey,
  type SessionRecord,
} from './record-model.ts';

function record(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    date: '2024-03-01',
    distanceKm: 5,
    durationMin: 25,
    speedKmh: 12,
    sessionType: 'Erg',
    notes: '',
    createdAt: '2024-03-01T18:00:00Z',
    ...overrides,
  };
}

describe('session types', () => {
  it('declares the vocabulary in column order with Other as fallback', () => {
    expect(SESSION_TYPES).toEqual(['Water', 'Erg', 'Cross-Training', 'Strength', 'Other']);
    expect(FALLBACK_SESSION_TYPE).toBe('Other');
  });

  it('classifies declared types as known', () => {
    expect(classifySessionType(' Erg ')).toEqual({ kind: 'known', type: 'Erg' });
  });

  it('keeps unrecognized types verbatim as custom', () => {
    expect(classifySessionType('Sculling camp')).toEqual({ kind: 'custom', type: 'Sculling camp' });
  });

  it('is case sensitive', () => {
    expect(classifySessionType('erg')).toEqual({ kind: 'custom', type: 'erg' });
  });

  it('maps blank types to the fallback bucket', () => {
    expect(normalizeSessionType('   ')).toBe('Other');
    expect(normalizeSessionType(undefined)).toBe('Other');
    expect(classifySessionType(null)).toEqual({ kind: 'known', type: 'Other' });
  });
});

describe('date keys', () => {
  it('formats month and day keys with zero padding', () => {
    const date = { year: 2024, month: 3, day: 1 };
    expect(monthKey(date)).toBe('03');
    expect(dayKey(date)).toBe('2024-03-01');
  });

  it('pads years to four digits', () => {
    expect(dayKey({ year: 999, month: 12, day: 31 })).toBe('0999-12-31');
  });

  it('parses real calendar days', () => {
    expect(parseDayKey('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
    expect(parseDayKey(' 2023-12-31 ')).toEqual({ year: 2023, month: 12, day: 31 });
  });

  it('rejects impossible or malformed days', () => {
    expect(parseDayKey('2023-02-29')).toBeNull();
    expect(parseDayKey('2024-04-31')).toBeNull();
    expect(parseDayKey('2024-13-01')).toBeNull();
    expect(parseDayKey('2024-00-10')).toBeNull();
    expect(parseDayKey('2024-3-1')).toBeNull();
    expect(parseDayKey('01/03/2024')).toBeNull();
    expect(parseDayKey('')).toBeNull();
  });

  it('builds local dates for two-digit years', () => {
    const date = makeLocalDate(45, 6, 1);
    expect(date.getFullYear()).toBe(45);
    expect(date.getMonth()).toBe(5);
    expect(date.getDate()).toBe(1);
  });
});

describe('isIsoTimestamp', () => {
  it('accepts log timestamps', () => {
    expect(isIsoTimestamp('2024-03-01T18:00:00Z')).toBe(true);
  });

  it('rejects blank and garbage values', () => {
    expect(isIsoTimestamp('')).toBe(false);
    expect(isIsoTimestamp('yesterday')).toBe(false);
  });
});

describe('isAggregatable', () => {
  it('accepts a valid record, including a zero distance', () => {
    expect(isAggregatable(record())).toBe(true);
    expect(isAggregatable(record({ distanceKm: 0 }))).toBe(true);
  });

  it('rejects unparseable dates and bad distances', () => {
    expect(isAggregatable(record({ date: 'not-a-date' }))).toBe(false);
    expect(isAggregatable(record({ distanceKm: -1 }))).toBe(false);
    expect(isAggregatable(record({ distanceKm: Number.NaN }))).toBe(false);
  });
});
