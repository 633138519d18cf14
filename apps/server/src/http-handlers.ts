import {
  AllRecordsDTOSchema,
  AllRecordsResultSchema,
  AppError,
  CsvImportInputDTOSchema,
  CsvImportResultDTOSchema,
  CsvImportResultSchema,
  EmptyPayloadSchema,
  HealthDTOSchema,
  HealthResultSchema,
  LogSessionInputDTOSchema,
  MonthlyTotalsDTOSchema,
  MonthlyTotalsResultSchema,
  PaceInputDTOSchema,
  PaceResultDTOSchema,
  PaceResultSchema,
  SessionCreatedResultSchema,
  SessionRecordDTOSchema,
  YearQueryDTOSchema,
  YearlyTableDTOSchema,
  YearlyTableResultSchema,
  ok,
  err,
  type AllRecordsDTO,
  type ApiErr,
  type ApiResult,
  type CsvImportInputDTO,
  type CsvImportResultDTO,
  type HealthDTO,
  type LogSessionInputDTO,
  type Logger,
  type MonthlyTotalsDTO,
  type PaceInputDTO,
  type PaceResultDTO,
  type Result,
  type SessionRecordDTO,
  type YearlyTableDTO,
} from '@rowlog/shared';
import { format } from 'date-fns';
import type { z } from 'zod/v4';

export interface ServerBackend {
  getAllRecords: () => Result<AllRecordsDTO, AppError>;
  getYearlyTable: (year: unknown) => Result<YearlyTableDTO, AppError>;
  getMonthlyTotals: (year: unknown) => Result<MonthlyTotalsDTO, AppError>;
  logSession: (input: LogSessionInputDTO) => Result<SessionRecordDTO, AppError>;
  resolvePace: (input: PaceInputDTO) => Result<PaceResultDTO, AppError>;
  exportCsv: () => Result<string, AppError>;
  importCsv: (input: CsvImportInputDTO) => Result<CsvImportResultDTO, AppError>;
  countSessions: () => Result<number, AppError>;
}

export interface HandlerContext {
  backend: ServerBackend;
  logger: Logger;
  /** Decides the default year and the export file name. */
  now: () => Date;
}

export interface HttpResponse<T> {
  status: number;
  body: ApiResult<T>;
}

export type CsvExportResponse =
  | { kind: 'file'; status: 200; filename: string; csv: string }
  | { kind: 'error'; status: number; body: ApiErr };

const CLIENT_ERROR_CODES = new Set([
  'INVALID_YEAR',
  'INVALID_SPLIT_FORMAT',
  'SESSION_INVALID',
  'API_INVALID_PAYLOAD',
]);

export function statusForError(error: AppError): number {
  if (CLIENT_ERROR_CODES.has(error.code) || error.code.startsWith('CSV_')) {
    return 400;
  }
  if (error.code === 'UNDEFINED_RATE') {
    return 422;
  }
  return 500;
}

function createValidationError(input: unknown, issues: unknown): AppError {
  return AppError.create(
    'API_INVALID_PAYLOAD',
    'Przekazano niepoprawne dane wejściowe.',
    'error',
    { input, issues },
  );
}

function createOutputError(payload: unknown, issues: unknown): AppError {
  return AppError.create(
    'API_INVALID_OUTPUT',
    'Wewnętrzna odpowiedź serwera ma niepoprawny format.',
    'error',
    { payload, issues },
  );
}

function createUnhandledHandlerError(cause: unknown): AppError {
  return AppError.fromUnknown(
    'API_HANDLER_EXECUTION_FAILED',
    'Wewnętrzna obsługa żądania zakończona niepowodzeniem.',
    cause,
  );
}

function serializeError<T>(
  context: HandlerContext,
  resultSchema: z.ZodType<ApiResult<T>>,
  error: AppError,
): HttpResponse<T> {
  const status = statusForError(error);
  if (status >= 500) {
    context.logger.error('Żądanie zakończone błędem serwera.', { error: error.toDTO() });
  }

  const parsed = resultSchema.safeParse({
    ok: false,
    error: error.toDTO(),
  });

  if (parsed.success) {
    return { status, body: parsed.data };
  }

  return {
    status: 500,
    body: {
      ok: false,
      error: AppError.create(
        'API_SERIALIZATION_FAILED',
        'Nie udało się zserializować błędu.',
        'error',
        { issues: parsed.error.issues },
      ).toDTO(),
    },
  };
}

function serializeSuccess<T>(
  context: HandlerContext,
  outputSchema: z.ZodType<T>,
  resultSchema: z.ZodType<ApiResult<T>>,
  payload: T,
  successStatus: number,
): HttpResponse<T> {
  const validatedOutput = outputSchema.safeParse(payload);
  if (!validatedOutput.success) {
    return serializeError(context, resultSchema, createOutputError(payload, validatedOutput.error.issues));
  }

  const body: ApiResult<T> = { ok: true, value: payload };
  const validatedResult = resultSchema.safeParse(body);
  if (!validatedResult.success) {
    return serializeError(context, resultSchema, createOutputError(payload, validatedResult.error.issues));
  }

  // The parsed copy rebuilds records key by key and loses keys such as "__proto__".
  return { status: successStatus, body };
}

function runHandler<TInput, TOutput>(
  context: HandlerContext,
  payload: unknown,
  inputSchema: z.ZodType<TInput>,
  outputSchema: z.ZodType<TOutput>,
  resultSchema: z.ZodType<ApiResult<TOutput>>,
  execute: (input: TInput) => Result<TOutput, AppError>,
  successStatus = 200,
): HttpResponse<TOutput> {
  const inputValidation = inputSchema.safeParse(payload);
  if (!inputValidation.success) {
    return serializeError(context, resultSchema, createValidationError(payload, inputValidation.error.issues));
  }

  try {
    const result = execute(inputValidation.data);
    if (!result.ok) {
      return serializeError(context, resultSchema, result.error);
    }

    return serializeSuccess(context, outputSchema, resultSchema, result.value, successStatus);
  } catch (cause) {
    return serializeError(context, resultSchema, createUnhandledHandlerError(cause));
  }
}

export function handleHealth(context: HandlerContext, payload: unknown): HttpResponse<HealthDTO> {
  return runHandler(context, payload, EmptyPayloadSchema, HealthDTOSchema, HealthResultSchema, () => {
    const sessions = context.backend.countSessions();
    if (!sessions.ok) {
      return sessions;
    }
    return ok<HealthDTO>({ status: 'ok', sessions: sessions.value });
  });
}

export function handleGetAllRecords(context: HandlerContext, payload: unknown): HttpResponse<AllRecordsDTO> {
  return runHandler(context, payload, EmptyPayloadSchema, AllRecordsDTOSchema, AllRecordsResultSchema, () =>
    context.backend.getAllRecords(),
  );
}

function resolveYear(context: HandlerContext, year: string | undefined): string {
  if (year === undefined || year.trim().length === 0) {
    return String(context.now().getFullYear());
  }
  return year;
}

/**
 * Without `year`, or with a blank one, the current calendar year is used.
 */
export function handleGetYearlyTable(context: HandlerContext, query: unknown): HttpResponse<YearlyTableDTO> {
  return runHandler(context, query, YearQueryDTOSchema, YearlyTableDTOSchema, YearlyTableResultSchema, (input) =>
    context.backend.getYearlyTable(resolveYear(context, input.year)),
  );
}

export function handleGetMonthlyTotals(context: HandlerContext, query: unknown): HttpResponse<MonthlyTotalsDTO> {
  return runHandler(
    context,
    query,
    YearQueryDTOSchema,
    MonthlyTotalsDTOSchema,
    MonthlyTotalsResultSchema,
    (input) => context.backend.getMonthlyTotals(resolveYear(context, input.year)),
  );
}

export function handleLogSession(context: HandlerContext, payload: unknown): HttpResponse<SessionRecordDTO> {
  const response = runHandler(
    context,
    payload,
    LogSessionInputDTOSchema,
    SessionRecordDTOSchema,
    SessionCreatedResultSchema,
    (input) => context.backend.logSession(input),
    201,
  );
  if (response.body.ok) {
    context.logger.info('Zapisano trening.', {
      date: response.body.value.date,
      sessionType: response.body.value.session_type,
    });
  }
  return response;
}

export function handleResolvePace(context: HandlerContext, payload: unknown): HttpResponse<PaceResultDTO> {
  return runHandler(context, payload, PaceInputDTOSchema, PaceResultDTOSchema, PaceResultSchema, (input) =>
    context.backend.resolvePace(input),
  );
}

export function handleImportCsv(context: HandlerContext, payload: unknown): HttpResponse<CsvImportResultDTO> {
  const response = runHandler(
    context,
    payload,
    CsvImportInputDTOSchema,
    CsvImportResultDTOSchema,
    CsvImportResultSchema,
    (input) => context.backend.importCsv(input),
  );
  if (response.body.ok) {
    context.logger.info('Zaimportowano treningi z CSV.', {
      imported: response.body.value.imported,
      rowsTotal: response.body.value.rows_total,
      issues: response.body.value.issues.length,
    });
  }
  return response;
}

export function exportFilename(date: Date): string {
  return `rowing_log_${format(date, 'yyyy-MM-dd')}.csv`;
}

export function handleExportCsv(context: HandlerContext): CsvExportResponse {
  let result: Result<string, AppError>;
  try {
    result = context.backend.exportCsv();
  } catch (cause) {
    result = err(createUnhandledHandlerError(cause));
  }

  if (!result.ok) {
    const status = statusForError(result.error);
    if (status >= 500) {
      context.logger.error('Eksport CSV zakończony błędem.', { error: result.error.toDTO() });
    }
    return { kind: 'error', status, body: { ok: false, error: result.error.toDTO() } };
  }

  return { kind: 'file', status: 200, filename: exportFilename(context.now()), csv: result.value };
}
