import type { Server } from 'node:http';
import type { DatabaseConnection } from '@rowlog/core';
import { AppError, toError, type Logger } from '@rowlog/shared';
import type { Express } from 'express';

export interface ListenOptions {
  port: number;
  host: string;
  connection: Pick<DatabaseConnection, 'close'>;
  logger: Logger;
  onReady: (server: Server) => void;
  /** Called after the listen failure was logged and the database closed. */
  onFailure: (error: AppError) => void;
}

export interface RunningServer {
  server: Server;
  shutdown: (signal: string) => void;
}

function closeConnection(connection: Pick<DatabaseConnection, 'close'>, logger: Logger): boolean {
  const closeResult = connection.close();
  if (!closeResult.ok) {
    logger.error('Nie udało się zamknąć bazy danych.', { error: closeResult.error.toDTO() });
    return false;
  }
  return true;
}

/**
 * Starts listening and ties the database connection to the server: it is closed
 * when the port cannot be bound and after a graceful shutdown.
 */
export function listenWithDatabase(app: Express, options: ListenOptions): RunningServer {
  const { connection, logger } = options;

  const server = app.listen(options.port, options.host, () => {
    options.onReady(server);
  });

  server.once('error', (cause) => {
    const error = AppError.create(
      'SERVER_LISTEN_FAILED',
      'Nie udało się uruchomić nasłuchiwania serwera.',
      'fatal',
      { host: options.host, port: options.port },
      toError(cause),
    );
    logger.fatal(error.message, { error: error.toDTO() });
    closeConnection(connection, logger);
    options.onFailure(error);
  });

  const shutdown = (signal: string): void => {
    logger.info('Zamykanie serwera.', { signal });
    server.close(() => {
      if (!closeConnection(connection, logger)) {
        options.onFailure(AppError.create('DB_CLOSE_FAILED', 'Nie udało się zamknąć bazy danych.'));
      }
    });
  };

  return { server, shutdown };
}
