export {
  createSessionEntity,
  beginMatching,
  runMatchingPass,
  runMatchingPassAsync,
  completeMatching,
  failMatching,
  completeSession,
  assertRecordsNormalized,
  cloneSession,
} from './sessionMachine';
export { applyOperation, NOTE_REQUIRED_KINDS } from './resolution';
export { findCoverageViolations, assertCoverage, uncoveredRecordIds } from './coverage';
export { summarize } from './summary';
export { SYSTEM_ACTOR } from './audit';

export type { CreateSessionParams } from './sessionMachine';
export type {
  ResolutionOperation,
  ConfirmMatchOperation,
  RejectMatchOperation,
  ResolveExceptionOperation,
  ManualLinkOperation,
} from './resolution';
export type {
  Session,
  SessionStatus,
  SessionSummary,
  Match,
  MatchKind,
  MatchStatus,
  ReconciliationException,
  ExceptionStatus,
  AuditEntry,
  AuditAction,
  EntityContext,
} from './types';
