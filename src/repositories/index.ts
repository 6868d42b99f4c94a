export { InMemorySessionRepository } from './inMemorySessionRepository';
export { DrizzleSessionRepository } from './drizzleSessionRepository';
export { toHeader } from './sessionRepository';
export type { SessionRepository, SessionHeader, ListSessionsFilter } from './sessionRepository';
