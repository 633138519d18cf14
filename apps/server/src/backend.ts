import type { SessionLogQueries } from '@rowlog/core';
import { resolvePace } from '@rowlog/training';
import type { ServerBackend } from './http-handlers.ts';

export function createServerBackend(queries: SessionLogQueries): ServerBackend {
  return {
    getAllRecords: () => queries.getAllRecords(),
    getYearlyTable: (year) => queries.getYearlyTable(year),
    getMonthlyTotals: (year) => queries.getMonthlyTotals(year),
    logSession: (input) => queries.logSession(input),
    resolvePace: (input) => resolvePace(input),
    exportCsv: () => queries.exportCsv(),
    importCsv: (input) => queries.importCsv(input),
    countSessions: () => queries.countSessions(),
  };
}
