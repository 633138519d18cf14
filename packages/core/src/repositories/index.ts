export { createSessionRepository, type SessionRepository } from './session-repository.ts';
export type { AppendSessionsResult, ListSessionsInput, SessionRow } from './types.ts';
