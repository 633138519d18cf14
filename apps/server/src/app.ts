import { API_ROUTES, AppError } from '@rowlog/shared';
import express, { type NextFunction, type Request, type Response } from 'express';
import {
  handleExportCsv,
  handleGetAllRecords,
  handleGetMonthlyTotals,
  handleGetYearlyTable,
  handleHealth,
  handleImportCsv,
  handleLogSession,
  handleResolvePace,
  type HandlerContext,
  type HttpResponse,
} from './http-handlers.ts';

const BODY_LIMIT = '2mb';

function send<T>(res: Response, response: HttpResponse<T>): void {
  res.status(response.status).json(response.body);
}

/**
 * A plain-text body is taken as the CSV itself.
 */
function toImportPayload(body: unknown): unknown {
  if (typeof body === 'string') {
    return { csv_text: body };
  }
  return body;
}

export function createServerApp(context: HandlerContext): express.Express {
  const app = express();
  const logger = context.logger.withContext({ module: 'http' });

  app.disable('x-powered-by');
  app.use(express.json({ limit: BODY_LIMIT }));
  app.use(express.urlencoded({ extended: false, limit: BODY_LIMIT }));
  app.use(express.text({ type: ['text/csv', 'text/plain'], limit: BODY_LIMIT }));

  app.get(API_ROUTES.HEALTH, (_req, res) => {
    send(res, handleHealth(context, {}));
  });

  app.get(API_ROUTES.ALL_RECORDS, (_req, res) => {
    send(res, handleGetAllRecords(context, {}));
  });

  app.get(API_ROUTES.YEARLY_TABLE, (req, res) => {
    send(res, handleGetYearlyTable(context, req.query));
  });

  app.get(API_ROUTES.MONTHLY_TOTALS, (req, res) => {
    send(res, handleGetMonthlyTotals(context, req.query));
  });

  app.post(API_ROUTES.LOG_SESSION, (req, res) => {
    send(res, handleLogSession(context, req.body ?? {}));
  });

  app.post(API_ROUTES.PACE, (req, res) => {
    send(res, handleResolvePace(context, req.body ?? {}));
  });

  app.get(API_ROUTES.EXPORT_CSV, (_req, res) => {
    const response = handleExportCsv(context);
    if (response.kind === 'error') {
      res.status(response.status).json(response.body);
      return;
    }
    res.attachment(response.filename);
    res.type('text/csv');
    res.status(response.status).send(response.csv);
  });

  app.post(API_ROUTES.IMPORT_CSV, (req, res) => {
    send(res, handleImportCsv(context, toImportPayload(req.body)));
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      ok: false,
      error: AppError.create('API_ROUTE_NOT_FOUND', 'Nie znaleziono zasobu.', 'warning', {
        method: req.method,
        path: req.path,
      }).toDTO(),
    });
  });

  // Body parser failures (malformed JSON, oversized bodies) land here.
  app.use((cause: unknown, req: Request, res: Response, _next: NextFunction) => {
    const isClientError = cause instanceof SyntaxError || hasClientStatus(cause);
    const error = AppError.fromUnknown(
      isClientError ? 'API_INVALID_PAYLOAD' : 'API_HANDLER_EXECUTION_FAILED',
      isClientError ? 'Przekazano niepoprawne dane wejściowe.' : 'Wewnętrzna obsługa żądania zakończona niepowodzeniem.',
      cause,
      { method: req.method, path: req.path },
    );
    if (!isClientError) {
      logger.error('Nieobsłużony błąd żądania.', { error: error.toDTO() });
    }
    res.status(isClientError ? 400 : 500).json({ ok: false, error: error.toDTO() });
  });

  return app;
}

function hasClientStatus(cause: unknown): boolean {
  if (typeof cause !== 'object' || cause === null || !('status' in cause)) {
    return false;
  }
  const status = cause.status;
  return typeof status === 'number' && status >= 400 && status < 500;
}
