// Types
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
} from './types/result.ts';

// Errors
export {
  AppError,
  AppErrorSchema,
  SEVERITY,
  toError,
  type Severity,
  type AppErrorDTO,
} from './errors/app-error.ts';

// API contracts
export {
  type ApiResult,
  type ApiOk,
  type ApiErr,
  ApiResultSchema,
  SessionRecordDTOSchema,
  type SessionRecordDTO,
  LogSessionInputDTOSchema,
  type LogSessionInputDTO,
  AllRecordsDTOSchema,
  type AllRecordsDTO,
  AllRecordsResultSchema,
  type AllRecordsResult,
  SessionCreatedResultSchema,
  type SessionCreatedResult,
  YearQueryDTOSchema,
  type YearQueryDTO,
  CumulativePointSchema,
  type CumulativePoint,
  YearlyTableDTOSchema,
  type YearlyTableDTO,
  YearlyTableResultSchema,
  type YearlyTableResult,
  MonthlyTotalsDTOSchema,
  type MonthlyTotalsDTO,
  MonthlyTotalsResultSchema,
  type MonthlyTotalsResult,
  PaceFieldSchema,
  type PaceFieldDTO,
  PaceInputDTOSchema,
  type PaceInputDTO,
  PaceResultDTOSchema,
  type PaceResultDTO,
  PaceResultSchema,
  type PaceResult,
  CsvImportIssueDTOSchema,
  type CsvImportIssueDTO,
  CsvImportInputDTOSchema,
  type CsvImportInputDTO,
  CsvImportResultDTOSchema,
  type CsvImportResultDTO,
  CsvImportResultSchema,
  type CsvImportResult,
  EmptyPayloadSchema,
  HealthDTOSchema,
  type HealthDTO,
  HealthResultSchema,
  type HealthResult,
  API_ROUTES,
  type ApiRoute,
} from './api/contracts.ts';

// Logger
export {
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogContext,
  type LogWriter,
  type Clock,
  type CreateLoggerOptions,
} from './logger/index.ts';
