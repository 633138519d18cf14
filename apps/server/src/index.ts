export { createServerApp } from './app.ts';
export { createServerBackend } from './backend.ts';
export { loadServerConfig, resolvePathFromEnv, type ServerConfig } from './config.ts';
export {
  exportFilename,
  handleExportCsv,
  handleGetAllRecords,
  handleGetMonthlyTotals,
  handleGetYearlyTable,
  handleHealth,
  handleImportCsv,
  handleLogSession,
  handleResolvePace,
  statusForError,
  type CsvExportResponse,
  type HandlerContext,
  type HttpResponse,
  type ServerBackend,
} from './http-handlers.ts';
