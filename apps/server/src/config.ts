import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { AppError, err, isLogLevel, ok, type LogLevel, type Result } from '@rowlog/shared';
import { z } from 'zod/v4';

export const REPO_ROOT_PATH = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../..');

export interface ServerConfig {
  port: number;
  host: string;
  dbPath: string;
  seedFixturePath: string | null;
  logLevel: LogLevel;
}

const ServerEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(5000),
  HOST: z.string().min(1).default('127.0.0.1'),
  ROWLOG_DATA_DIR: z.string().min(1).optional(),
  ROWLOG_DB_FILENAME: z.string().min(1).default('rowing_log.sqlite'),
  ROWLOG_SEED_FIXTURE_PATH: z.string().min(1).optional(),
  ROWLOG_LOG_LEVEL: z.string().refine(isLogLevel, { message: 'Nieznany poziom logowania.' }).default('info'),
});

export function resolvePathFromEnv(value: string | undefined, fallbackPath: string, rootPath = REPO_ROOT_PATH): string {
  if (!value) {
    return fallbackPath;
  }

  if (path.isAbsolute(value)) {
    return value;
  }

  return path.join(rootPath, value);
}

/**
 * `:memory:` as the database file name keeps the log in memory.
 */
export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
  rootPath = REPO_ROOT_PATH,
): Result<ServerConfig, AppError> {
  const parsed = ServerEnvSchema.safeParse(env);
  if (!parsed.success) {
    return err(
      AppError.create('CONFIG_INVALID', 'Niepoprawna konfiguracja serwera.', 'error', {
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      }),
    );
  }

  const values = parsed.data;
  const logLevel = isLogLevel(values.ROWLOG_LOG_LEVEL) ? values.ROWLOG_LOG_LEVEL : 'info';
  const dataDir = resolvePathFromEnv(values.ROWLOG_DATA_DIR, path.join(rootPath, 'data'), rootPath);
  const dbPath =
    values.ROWLOG_DB_FILENAME === ':memory:' ? ':memory:' : path.join(dataDir, values.ROWLOG_DB_FILENAME);

  return ok({
    port: values.PORT,
    host: values.HOST,
    dbPath,
    seedFixturePath: values.ROWLOG_SEED_FIXTURE_PATH
      ? resolvePathFromEnv(values.ROWLOG_SEED_FIXTURE_PATH, '', rootPath)
      : null,
    logLevel,
  });
}
