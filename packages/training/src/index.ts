// Record model
export {
  SESSION_TYPES,
  FALLBACK_SESSION_TYPE,
  TRAINING_ERROR_CODES,
  classifySessionType,
  dayKey,
  isAggregatable,
  isIsoTimestamp,
  isKnownSessionType,
  makeLocalDate,
  monthKey,
  normalizeSessionType,
  parseDayKey,
  toCalendarDate,
  type CalendarDate,
  type KnownSessionType,
  type SessionRecord,
  type SessionTypeTag,
  type TrainingErrorCode,
} from './record-model.ts';

// Session intake
export {
  buildSessionRecord,
  formatCreatedAt,
  type IntakeClock,
  type SessionFormInput,
} from './session-intake.ts';

// Pace converter
export {
  SPLIT_SECONDS_FACTOR,
  classifyPaceInput,
  derivePace,
  distanceFromSplit,
  durationFromSplit,
  formatDistance,
  formatDuration,
  formatSpeed,
  formatSplit,
  parseFormNumber,
  parseSplit,
  roundTo,
  speedFromSplit,
  speedKmh,
  splitFromSpeed,
  type FormNumber,
  type PaceField,
  type PaceFormInput,
  type PaceFormValues,
  type PacePresence,
  type PaceResolution,
} from './pace-converter.ts';

// Aggregator
export {
  MONTH_KEYS,
  buildMonthlyTotals,
  buildYearlyTable,
  collectSessionTypes,
  listYearDays,
  sortRecords,
  type CumulativeEntry,
  type MonthlyTotals,
  type YearlyTable,
} from './aggregator.ts';

// Query façade
export {
  MAX_YEAR,
  MIN_YEAR,
  fromSessionRecordDTO,
  getAllRecords,
  getMonthlyTotals,
  getYearlyTable,
  parseYear,
  resolvePace,
  toSessionRecordDTO,
} from './training-queries.ts';
