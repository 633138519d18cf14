// Database
export {
  createDatabaseConnection,
  closeDatabaseConnection,
  openSessionLogDatabase,
  type CreateDatabaseInput,
  type DatabaseConnection,
  type OpenSessionLogResult,
} from './database.ts';

// Migrations
export {
  MIGRATIONS,
  runMigrations,
  type MigrationDefinition,
  type RunMigrationsResult,
} from './migrations/index.ts';

// Repositories (mutation layer)
export {
  createSessionRepository,
  type AppendSessionsResult,
  type ListSessionsInput,
  type SessionRepository,
  type SessionRow,
} from './repositories/index.ts';

// CSV
export {
  SESSION_CSV_COLUMNS,
  parseSessionsCsv,
  serializeSessionsCsv,
  type ParsedSessionsCsv,
  type SessionCsvColumn,
} from './csv/session-csv.ts';

// Queries
export {
  createSessionLogQueries,
  type SessionLogQueries,
  type SessionLogQueriesOptions,
} from './queries/session-log-queries.ts';

// Fixtures
export {
  loadSeedFixtureFromFile,
  seedDatabaseFromFixture,
  type SeedFixture,
  type SeedDatabaseResult,
} from './fixtures/index.ts';
