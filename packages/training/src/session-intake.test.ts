import { describe, expect, it } from 'vitest';
import { buildSessionRecord, formatCreatedAt } from './session-intake.ts';

const clock = () => new Date('2024-03-01T18:30:15.123Z');

describe('formatCreatedAt', () => {
  it('drops milliseconds', () => {
    expect(formatCreatedAt(clock())).toBe('2024-03-01T18:30:15Z');
  });
});

describe('buildSessionRecord', () => {
  it('builds a record and computes the speed', () => {
    const result = buildSessionRecord(
      { date: '2024-03-01', distanceKm: '10', durationMin: '50', sessionType: 'Erg', notes: ' morning ' },
      clock,
    );

    expect(result).toEqual({
      ok: true,
      value: {
        date: '2024-03-01',
        distanceKm: 10,
        durationMin: 50,
        speedKmh: 12,
        sessionType: 'Erg',
        notes: 'morning',
        createdAt: '2024-03-01T18:30:15Z',
      },
    });
  });

  it('fills a missing duration from the split', () => {
    const result = buildSessionRecord({ date: '2024-03-01', distanceKm: '10', split: '2:30.0' }, clock);
    expect(result.ok && result.value.durationMin).toBe(50);
    expect(result.ok && result.value.speedKmh).toBe(12);
  });

  it('fills a missing distance from the split', () => {
    const result = buildSessionRecord({ date: '2024-03-01', durationMin: 50, split: '2:30.0' }, clock);
    expect(result.ok && result.value.distanceKm).toBe(10);
  });

  it('rejects a malformed split', () => {
    const result = buildSessionRecord({ date: '2024-03-01', distanceKm: '10', split: 'fast' }, clock);
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe('INVALID_SPLIT_FORMAT');
  });

  it('backfills the duration from distance and speed', () => {
    const result = buildSessionRecord({ date: '2024-03-01', distanceKm: '6', speedKmh: '12' }, clock);
    expect(result.ok && result.value.durationMin).toBe(30);
    expect(result.ok && result.value.speedKmh).toBe(12);
  });

  it('rounds quantities to two decimals', () => {
    const result = buildSessionRecord({ date: '2024-03-01', distanceKm: '5.456', durationMin: '25.123' }, clock);
    expect(result.ok && result.value.distanceKm).toBe(5.46);
    expect(result.ok && result.value.durationMin).toBe(25.12);
    expect(result.ok && result.value.speedKmh).toBe(13.03);
  });

  it('accepts a zero distance', () => {
    const result = buildSessionRecord({ date: '2024-03-01', distanceKm: 0, durationMin: 20 }, clock);
    expect(result.ok && result.value.distanceKm).toBe(0);
    expect(result.ok && result.value.speedKmh).toBe(0);
  });

  it('puts a blank session type into the fallback bucket', () => {
    const result = buildSessionRecord(
      { date: '2024-03-01', distanceKm: '5', durationMin: '25', sessionType: '  ' },
      clock,
    );
    expect(result.ok && result.value.sessionType).toBe('Other');
  });

  it('stores a valid creation timestamp in UTC and replaces a broken one', () => {
    const kept = buildSessionRecord(
      { date: '2023-05-01', distanceKm: '5', durationMin: '25', createdAt: '2023-05-01T07:00:00Z' },
      clock,
    );
    expect(kept.ok && kept.value.createdAt).toBe('2023-05-01T07:00:00Z');

    const shifted = buildSessionRecord(
      { date: '2023-05-01', distanceKm: '5', durationMin: '25', createdAt: '2023-05-01T09:00:00.250+02:00' },
      clock,
    );
    expect(shifted.ok && shifted.value.createdAt).toBe('2023-05-01T07:00:00Z');

    const replaced = buildSessionRecord(
      { date: '2023-05-01', distanceKm: '5', durationMin: '25', createdAt: 'later' },
      clock,
    );
    expect(replaced.ok && replaced.value.createdAt).toBe('2024-03-01T18:30:15Z');
  });

  it.each([
    [{ date: '2024-02-30', distanceKm: '5', durationMin: '25' }, { field: 'date', value: '2024-02-30' }],
    [{ date: '', distanceKm: '5', durationMin: '25' }, { field: 'date', value: '' }],
    [{ date: '2024-03-01', durationMin: '25' }, { field: 'distance_km', value: null }],
    [{ date: '2024-03-01', distanceKm: '-1', durationMin: '25' }, { field: 'distance_km', value: '-1' }],
    [{ date: '2024-03-01', distanceKm: '5', durationMin: '0' }, { field: 'duration_min', value: '0' }],
    [{ date: '2024-03-01', distanceKm: '5' }, { field: 'duration_min', value: null }],
  ])('rejects %j as SESSION_INVALID', (form, context) => {
    const result = buildSessionRecord(form, clock);
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe('SESSION_INVALID');
    expect(result.error.context).toEqual(context);
  });
});
