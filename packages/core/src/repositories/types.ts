export interface SessionRow {
  id: number;
  date: string;
  distance_km: number;
  duration_min: number;
  speed_kmh: number | null;
  session_type: string;
  notes: string;
  created_at: string;
}

export interface ListSessionsInput {
  /** Inclusive YYYY-MM-DD bounds; either may be omitted. */
  dateFrom?: string;
  dateTo?: string;
}

export interface AppendSessionsResult {
  inserted: number;
  firstId: number | null;
  lastId: number | null;
}
