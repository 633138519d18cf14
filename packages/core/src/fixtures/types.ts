import type { SessionRecord } from '@rowlog/training';

export interface SeedFixture {
  generatedAt: string;
  sessions: SessionRecord[];
}

export interface SeedDatabaseResult {
  sessionsInserted: number;
}
