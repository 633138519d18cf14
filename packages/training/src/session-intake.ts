import { AppError, err, ok, type Result } from '@rowlog/shared';
import { parseISO } from 'date-fns';
import {
  derivePace,
  parseFormNumber,
  parseSplit,
  roundTo,
  speedKmh,
  type FormNumber,
} from './pace-converter.ts';
import {
  TRAINING_ERROR_CODES,
  dayKey,
  isIsoTimestamp,
  normalizeSessionType,
  parseDayKey,
  type SessionRecord,
} from './record-model.ts';

export interface SessionFormInput {
  date?: string | null;
  distanceKm?: FormNumber;
  durationMin?: FormNumber;
  speedKmh?: FormNumber;
  /** Optional M:SS.s split used to fill a missing distance or duration. */
  split?: string | null;
  sessionType?: string | null;
  notes?: string | null;
  /** Kept when importing an existing log; otherwise the clock decides. */
  createdAt?: string | null;
}

export type IntakeClock = () => Date;

function createInvalidSessionError(field: string, message: string, value: unknown): AppError {
  return AppError.create(TRAINING_ERROR_CODES.SESSION_INVALID, message, 'error', { field, value });
}

/** Second precision, as written to the log. */
export function formatCreatedAt(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

interface Quantities {
  distanceKm: number | null;
  durationMin: number | null;
}

function fillFromSplit(form: SessionFormInput, quantities: Quantities): Result<Quantities, AppError> {
  const splitText = form.split?.trim() ?? '';
  if (splitText.length === 0) {
    return ok(quantities);
  }

  const split = parseSplit(splitText);
  if (!split.ok) {
    return split;
  }

  const derived = derivePace({
    distanceKm: quantities.distanceKm,
    durationMin: quantities.durationMin,
    split: splitText,
  });
  // An undefined rate leaves the dependent field blank; validation decides below.
  if (!derived.ok) {
    return ok(quantities);
  }

  if (derived.value.derivedField === 'distance') {
    return ok({ ...quantities, distanceKm: parseFormNumber(derived.value.values.distanceKm) });
  }
  if (derived.value.derivedField === 'duration') {
    return ok({ ...quantities, durationMin: parseFormNumber(derived.value.values.durationMin) });
  }
  return ok(quantities);
}

/**
 * Turns a logging form into a validated record: fills a missing distance or
 * duration from the split, backfills speed and duration from each other,
 * rounds to two decimals.
 */
export function buildSessionRecord(
  form: SessionFormInput,
  now: IntakeClock = () => new Date(),
): Result<SessionRecord, AppError> {
  const rawDate = form.date?.trim() ?? '';
  const date = parseDayKey(rawDate);
  if (!date) {
    return err(createInvalidSessionError('date', 'Podaj poprawną datę w formacie RRRR-MM-DD.', rawDate));
  }

  const filled = fillFromSplit(form, {
    distanceKm: parseFormNumber(form.distanceKm),
    durationMin: parseFormNumber(form.durationMin),
  });
  if (!filled.ok) {
    return filled;
  }

  const distanceKm = filled.value.distanceKm;
  let durationMin = filled.value.durationMin;
  let speed = parseFormNumber(form.speedKmh);

  if (speed === null && distanceKm !== null && durationMin !== null) {
    const computed = speedKmh(distanceKm, durationMin);
    speed = computed.ok ? computed.value : null;
  }
  if (durationMin === null && distanceKm !== null && speed !== null && speed > 0) {
    durationMin = (distanceKm / speed) * 60;
  }

  if (distanceKm === null || distanceKm < 0) {
    return err(
      createInvalidSessionError('distance_km', 'Dystans musi być liczbą nieujemną.', form.distanceKm ?? null),
    );
  }

  const roundedDuration = durationMin === null ? null : roundTo(durationMin, 2);
  if (roundedDuration === null || roundedDuration <= 0) {
    return err(
      createInvalidSessionError('duration_min', 'Czas trwania musi być dodatni.', form.durationMin ?? null),
    );
  }

  const createdAt = form.createdAt?.trim() ?? '';

  return ok({
    date: dayKey(date),
    distanceKm: roundTo(distanceKm, 2),
    durationMin: roundedDuration,
    speedKmh: speed === null ? null : roundTo(speed, 2),
    sessionType: normalizeSessionType(form.sessionType),
    notes: form.notes?.trim() ?? '',
    createdAt: formatCreatedAt(isIsoTimestamp(createdAt) ? parseISO(createdAt) : now()),
  });
}
