import type { MigrationDefinition } from './types.ts';

export const sessionLogSchemaMigration: MigrationDefinition = {
  id: 1,
  name: '001-session-log-schema',
  up: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        date TEXT NOT NULL,
        distance_km REAL NOT NULL CHECK (distance_km >= 0),
        duration_min REAL NOT NULL CHECK (duration_min > 0),
        speed_kmh REAL,
        session_type TEXT NOT NULL,
        notes TEXT NOT NULL DEFAULT '',
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_date ON sessions(date);
    `);
  },
};
