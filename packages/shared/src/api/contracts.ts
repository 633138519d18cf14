import { z } from 'zod/v4';
import { AppErrorSchema, type AppErrorDTO } from '../errors/app-error.ts';

export interface ApiOk<T> {
  ok: true;
  value: T;
}

export interface ApiErr {
  ok: false;
  error: AppErrorDTO;
}

export type ApiResult<T> = ApiOk<T> | ApiErr;

export const ApiResultSchema = <T extends z.ZodType>(dataSchema: T) =>
  z.union([
    z.object({ ok: z.literal(true), value: dataSchema }),
    z.object({ ok: z.literal(false), error: AppErrorSchema }),
  ]);

// ─── Session records ──────────────────────────────────────────────

/** Wire form of a logged session; field names follow the CSV log columns. */
export const SessionRecordDTOSchema = z.object({
  date: z.string(),
  distance_km: z.number().nonnegative(),
  duration_min: z.number().positive(),
  speed_kmh: z.number().nullable(),
  session_type: z.string(),
  notes: z.string(),
  created_at: z.string(),
});

export type SessionRecordDTO = z.infer<typeof SessionRecordDTOSchema>;

const FormNumberSchema = z.union([z.string(), z.number()]).nullable().optional();

export const LogSessionInputDTOSchema = z.object({
  date: z.string().optional(),
  distance_km: FormNumberSchema,
  duration_min: FormNumberSchema,
  speed_kmh: FormNumberSchema,
  split: z.string().nullable().optional(),
  session_type: z.string().optional(),
  notes: z.string().optional(),
});

export type LogSessionInputDTO = z.infer<typeof LogSessionInputDTOSchema>;

export const AllRecordsDTOSchema = z.object({
  rows: z.array(SessionRecordDTOSchema),
});

export type AllRecordsDTO = z.infer<typeof AllRecordsDTOSchema>;
export const AllRecordsResultSchema = ApiResultSchema(AllRecordsDTOSchema);
export type AllRecordsResult = z.infer<typeof AllRecordsResultSchema>;

export const SessionCreatedResultSchema = ApiResultSchema(SessionRecordDTOSchema);
export type SessionCreatedResult = z.infer<typeof SessionCreatedResultSchema>;

// ─── Yearly queries ───────────────────────────────────────────────

export const YearQueryDTOSchema = z.object({
  year: z.string().optional(),
});

export type YearQueryDTO = z.infer<typeof YearQueryDTOSchema>;

export const CumulativePointSchema = z.object({
  date: z.iso.date(),
  km: z.number().nonnegative(),
});

export type CumulativePoint = z.infer<typeof CumulativePointSchema>;

export const YearlyTableDTOSchema = z.object({
  year: z.number().int(),
  daily_mileage: z.record(z.string(), z.number()),
  cumulative: z.array(CumulativePointSchema),
});

export type YearlyTableDTO = z.infer<typeof YearlyTableDTOSchema>;
export const YearlyTableResultSchema = ApiResultSchema(YearlyTableDTOSchema);
export type YearlyTableResult = z.infer<typeof YearlyTableResultSchema>;

export const MonthlyTotalsDTOSchema = z.object({
  year: z.number().int(),
  session_types: z.array(z.string()),
  totals: z.record(z.string(), z.record(z.string(), z.number())),
});

export type MonthlyTotalsDTO = z.infer<typeof MonthlyTotalsDTOSchema>;
export const MonthlyTotalsResultSchema = ApiResultSchema(MonthlyTotalsDTOSchema);
export type MonthlyTotalsResult = z.infer<typeof MonthlyTotalsResultSchema>;

// ─── Pace conversion ──────────────────────────────────────────────

export const PaceFieldSchema = z.enum(['distance', 'duration', 'split']);
export type PaceFieldDTO = z.infer<typeof PaceFieldSchema>;

export const PaceInputDTOSchema = z.object({
  distance_km: FormNumberSchema,
  duration_min: FormNumberSchema,
  split: z.string().nullable().optional(),
});

export type PaceInputDTO = z.infer<typeof PaceInputDTOSchema>;

export const PaceResultDTOSchema = z.object({
  presence: z.enum(['complete', 'solvable', 'underdetermined']),
  derived_field: PaceFieldSchema.nullable(),
  distance_km: z.string(),
  duration_min: z.string(),
  split: z.string(),
  speed_kmh: z.string(),
  consistent: z.boolean().nullable(),
});

export type PaceResultDTO = z.infer<typeof PaceResultDTOSchema>;
export const PaceResultSchema = ApiResultSchema(PaceResultDTOSchema);
export type PaceResult = z.infer<typeof PaceResultSchema>;

// ─── CSV import ───────────────────────────────────────────────────

export const CsvImportIssueDTOSchema = z.object({
  row_number: z.number().int().positive(),
  column: z.string(),
  code: z.string(),
  message: z.string(),
  value: z.string().nullable(),
});

export type CsvImportIssueDTO = z.infer<typeof CsvImportIssueDTOSchema>;

export const CsvImportInputDTOSchema = z.object({
  csv_text: z.string().min(1),
});

export type CsvImportInputDTO = z.infer<typeof CsvImportInputDTOSchema>;

export const CsvImportResultDTOSchema = z.object({
  imported: z.number().int().nonnegative(),
  rows_total: z.number().int().nonnegative(),
  issues: z.array(CsvImportIssueDTOSchema),
});

export type CsvImportResultDTO = z.infer<typeof CsvImportResultDTOSchema>;
export const CsvImportResultSchema = ApiResultSchema(CsvImportResultDTOSchema);
export type CsvImportResult = z.infer<typeof CsvImportResultSchema>;

// ─── Health ───────────────────────────────────────────────────────

export const EmptyPayloadSchema = z.object({}).passthrough();

export const HealthDTOSchema = z.object({
  status: z.literal('ok'),
  sessions: z.number().int().nonnegative(),
});

export type HealthDTO = z.infer<typeof HealthDTOSchema>;
export const HealthResultSchema = ApiResultSchema(HealthDTOSchema);
export type HealthResult = z.infer<typeof HealthResultSchema>;

export const API_ROUTES = {
  HEALTH: '/health',
  ALL_RECORDS: '/api/data',
  YEARLY_TABLE: '/api/yearly_table',
  MONTHLY_TOTALS: '/api/monthly_totals',
  LOG_SESSION: '/api/sessions',
  PACE: '/api/pace',
  EXPORT_CSV: '/export',
  IMPORT_CSV: '/import',
} as const;

export type ApiRoute = (typeof API_ROUTES)[keyof typeof API_ROUTES];
