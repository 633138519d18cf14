import { AppError, err, ok, type Result } from '@rowlog/shared';
import { TRAINING_ERROR_CODES } from './record-model.ts';

/** Seconds per hour divided by the two 500 m lengths in a kilometre. */
export const SPLIT_SECONDS_FACTOR = 1800;

export type PaceField = 'distance' | 'duration' | 'split';

export type FormNumber = string | number | null | undefined;

export interface PaceFormInput {
  distanceKm?: FormNumber;
  durationMin?: FormNumber;
  split?: string | null;
}

export interface PaceFormValues {
  distanceKm: string;
  durationMin: string;
  split: string;
}

export type PacePresence =
  | { kind: 'complete'; distanceKm: number; durationMin: number; splitSeconds: number }
  | { kind: 'solvable'; missing: 'split'; distanceKm: number; durationMin: number }
  | { kind: 'solvable'; missing: 'duration'; distanceKm: number; splitSeconds: number }
  | { kind: 'solvable'; missing: 'distance'; durationMin: number; splitSeconds: number }
  | { kind: 'underdetermined'; splitSeconds: number | null };

export interface PaceResolution {
  presence: PacePresence['kind'];
  derivedField: PaceField | null;
  values: PaceFormValues;
  /** Display speed, blank when it cannot be determined. */
  speedKmh: string;
  /** Only set when all three quantities were supplied. */
  consistent: boolean | null;
}

function createUndefinedRateError(operation: string, context: Record<string, unknown>): AppError {
  return AppError.create(
    TRAINING_ERROR_CODES.UNDEFINED_RATE,
    'Nie można wyliczyć tempa: dzielenie przez zerową prędkość lub czas.',
    'error',
    { operation, ...context },
  );
}

function createSplitFormatError(input: string, reason: string): AppError {
  return AppError.create(
    TRAINING_ERROR_CODES.INVALID_SPLIT_FORMAT,
    'Niepoprawny format tempa na 500 m. Oczekiwano M:SS.s, np. 2:05.3.',
    'error',
    { input, reason },
  );
}

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function finiteResult(value: number, operation: string, context: Record<string, unknown>): Result<number, AppError> {
  if (!Number.isFinite(value)) {
    return err(createUndefinedRateError(operation, context));
  }
  return ok(value);
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Parses a form field. Blank or non-numeric text yields null.
 */
export function parseFormNumber(value: FormNumber): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

// ─── Rate arithmetic ──────────────────────────────────────────────

export function speedKmh(distanceKm: number, durationMin: number): Result<number, AppError> {
  if (!isPositiveFinite(durationMin)) {
    return err(createUndefinedRateError('speedKmh', { distanceKm, durationMin }));
  }
  return finiteResult(distanceKm / (durationMin / 60), 'speedKmh', { distanceKm, durationMin });
}

export function splitFromSpeed(speed: number): Result<number, AppError> {
  if (!isPositiveFinite(speed)) {
    return err(createUndefinedRateError('splitFromSpeed', { speedKmh: speed }));
  }
  return finiteResult(SPLIT_SECONDS_FACTOR / speed, 'splitFromSpeed', { speedKmh: speed });
}

export function speedFromSplit(splitSeconds: number): Result<number, AppError> {
  if (!isPositiveFinite(splitSeconds)) {
    return err(createUndefinedRateError('speedFromSplit', { splitSeconds }));
  }
  return finiteResult(SPLIT_SECONDS_FACTOR / splitSeconds, 'speedFromSplit', { splitSeconds });
}

export function durationFromSplit(distanceKm: number, splitSeconds: number): Result<number, AppError> {
  if (!isPositiveFinite(splitSeconds)) {
    return err(createUndefinedRateError('durationFromSplit', { distanceKm, splitSeconds }));
  }
  return finiteResult((splitSeconds * distanceKm * 2) / 60, 'durationFromSplit', { distanceKm, splitSeconds });
}

export function distanceFromSplit(durationMin: number, splitSeconds: number): Result<number, AppError> {
  if (!isPositiveFinite(splitSeconds)) {
    return err(createUndefinedRateError('distanceFromSplit', { durationMin, splitSeconds }));
  }
  return finiteResult(((durationMin * 60) / splitSeconds) * 0.5, 'distanceFromSplit', {
    durationMin,
    splitSeconds,
  });
}

// ─── Split text ───────────────────────────────────────────────────

const MINUTES_PATTERN = /^\d+$/;
const SECONDS_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

export function parseSplit(text: string): Result<number, AppError> {
  const trimmed = text.trim();
  const parts = trimmed.split(':');
  if (parts.length !== 2) {
    return err(createSplitFormatError(text, parts.length < 2 ? 'missing-colon' : 'too-many-colons'));
  }

  const minutesText = (parts[0] ?? '').trim();
  const secondsText = (parts[1] ?? '').trim();
  if (!MINUTES_PATTERN.test(minutesText) || !SECONDS_PATTERN.test(secondsText)) {
    return err(createSplitFormatError(text, 'not-numeric'));
  }

  const total = Number(minutesText) * 60 + Number(secondsText);
  if (!isPositiveFinite(total)) {
    return err(createSplitFormatError(text, 'non-positive'));
  }
  return ok(total);
}

export function formatSplit(splitSeconds: number): Result<string, AppError> {
  if (!isPositiveFinite(splitSeconds)) {
    return err(createUndefinedRateError('formatSplit', { splitSeconds }));
  }

  // Round first so 59.96 s renders as 1:00.0 instead of 0:60.0.
  const tenths = Math.round(splitSeconds * 10);
  const minutes = Math.floor(tenths / 600);
  const seconds = (tenths - minutes * 600) / 10;
  return ok(`${String(minutes)}:${seconds.toFixed(1).padStart(4, '0')}`);
}

export function formatDistance(distanceKm: number): string {
  return roundTo(distanceKm, 2).toFixed(2);
}

export function formatDuration(durationMin: number): string {
  return String(Math.round(durationMin));
}

export function formatSpeed(speed: number): string {
  return roundTo(speed, 2).toFixed(2);
}

// ─── Two-of-three derivation ──────────────────────────────────────

function presentNumber(value: FormNumber): number | null {
  const parsed = parseFormNumber(value);
  return parsed !== null && parsed > 0 ? parsed : null;
}

function presentSplit(value: string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const parsed = parseSplit(value);
  return parsed.ok ? parsed.value : null;
}

function echo(value: FormNumber): string {
  if (value === null || value === undefined) {
    return '';
  }
  return typeof value === 'number' ? String(value) : value;
}

/**
 * A quantity counts as present only when it is a positive, parseable number or split.
 */
export function classifyPaceInput(input: PaceFormInput): PacePresence {
  const distanceKm = presentNumber(input.distanceKm);
  const durationMin = presentNumber(input.durationMin);
  const splitSeconds = presentSplit(input.split);

  if (distanceKm !== null && durationMin !== null && splitSeconds !== null) {
    return { kind: 'complete', distanceKm, durationMin, splitSeconds };
  }
  if (distanceKm !== null && durationMin !== null) {
    return { kind: 'solvable', missing: 'split', distanceKm, durationMin };
  }
  if (distanceKm !== null && splitSeconds !== null) {
    return { kind: 'solvable', missing: 'duration', distanceKm, splitSeconds };
  }
  if (durationMin !== null && splitSeconds !== null) {
    return { kind: 'solvable', missing: 'distance', durationMin, splitSeconds };
  }
  return { kind: 'underdetermined', splitSeconds };
}

function displaySpeed(speed: Result<number, AppError>): string {
  return speed.ok ? formatSpeed(speed.value) : '';
}

/**
 * Fills the single missing quantity out of distance, duration and split. With all
 * three or fewer than two supplied the inputs come back unchanged.
 */
export function derivePace(input: PaceFormInput): Result<PaceResolution, AppError> {
  const presence = classifyPaceInput(input);
  const values: PaceFormValues = {
    distanceKm: echo(input.distanceKm),
    durationMin: echo(input.durationMin),
    split: echo(input.split),
  };

  if (presence.kind === 'complete') {
    const impliedDuration = durationFromSplit(presence.distanceKm, presence.splitSeconds);
    return ok({
      presence: presence.kind,
      derivedField: null,
      values,
      speedKmh: displaySpeed(speedKmh(presence.distanceKm, presence.durationMin)),
      consistent: impliedDuration.ok ? Math.abs(impliedDuration.value - presence.durationMin) <= 1 : false,
    });
  }

  if (presence.kind === 'underdetermined') {
    return ok({
      presence: presence.kind,
      derivedField: null,
      values,
      speedKmh: presence.splitSeconds === null ? '' : displaySpeed(speedFromSplit(presence.splitSeconds)),
      consistent: null,
    });
  }

  if (presence.missing === 'split') {
    const speed = speedKmh(presence.distanceKm, presence.durationMin);
    if (!speed.ok) {
      return speed;
    }
    const split = splitFromSpeed(speed.value);
    if (!split.ok) {
      return split;
    }
    const splitText = formatSplit(split.value);
    if (!splitText.ok) {
      return splitText;
    }
    return ok({
      presence: presence.kind,
      derivedField: 'split',
      values: { ...values, split: splitText.value },
      speedKmh: formatSpeed(speed.value),
      consistent: null,
    });
  }

  const speed = speedFromSplit(presence.splitSeconds);
  if (!speed.ok) {
    return speed;
  }

  if (presence.missing === 'duration') {
    const duration = durationFromSplit(presence.distanceKm, presence.splitSeconds);
    if (!duration.ok) {
      return duration;
    }
    return ok({
      presence: presence.kind,
      derivedField: 'duration',
      values: { ...values, durationMin: formatDuration(duration.value) },
      speedKmh: formatSpeed(speed.value),
      consistent: null,
    });
  }

  const distance = distanceFromSplit(presence.durationMin, presence.splitSeconds);
  if (!distance.ok) {
    return distance;
  }
  return ok({
    presence: presence.kind,
    derivedField: 'distance',
    values: { ...values, distanceKm: formatDistance(distance.value) },
    speedKmh: formatSpeed(speed.value),
    consistent: null,
  });
}
