import { sql } from 'drizzle-orm';
import {
  bigint,
  date,
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import type { NearMissReference } from '../matching/types';

export const SESSION_STATUSES = ['CREATED', 'MATCHING', 'REVIEW', 'COMPLETED', 'FAILED'] as const;
export const RECORD_SOURCES = ['LEDGER', 'BANK'] as const;
export const MATCH_KINDS = ['AUTO', 'MANUAL'] as const;
export const MATCH_STATUSES = ['PROPOSED', 'CONFIRMED', 'REJECTED'] as const;
export const EXCEPTION_KINDS = [
  'UNMATCHED_LEDGER',
  'UNMATCHED_BANK',
  'AMOUNT_MISMATCH',
  'DUPLICATE_CANDIDATE',
] as const;
export const EXCEPTION_STATUSES = ['OPEN', 'RESOLVED'] as const;
export const AUDIT_ACTIONS = [
  'MATCHING_RUN',
  'MATCH_CONFIRMED',
  'MATCH_REJECTED',
  'EXCEPTION_RESOLVED',
  'MANUAL_LINK',
  'SESSION_COMPLETED',
  'SESSION_FAILED',
] as const;

export const sessions = pgTable('reconciliation_sessions', {
  id: uuid('id').primaryKey(),
  name: text('name').notNull(),
  description: text('description'),
  status: text('status', { enum: SESSION_STATUSES }).notNull().default('CREATED'),
  dateToleranceDays: integer('date_tolerance_days').notNull(),
  amountTolerance: bigint('amount_tolerance', { mode: 'number' }).notNull(),
  failureReason: text('failure_reason'),
  version: integer('version').notNull().default(1),
  createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull().default(sql`now()`),
  updatedAt: timestamp('updated_at', { withTimezone: true, mode: 'date' }).notNull().default(sql`now()`),
  processedAt: timestamp('processed_at', { withTimezone: true, mode: 'date' }),
});

export const records = pgTable(
  'transaction_records',
  {
    id: uuid('id').primaryKey(),
    sessionId: uuid('session_id')
      .notNull()
      .references(() => sessions.id, { onDelete: 'cascade' }),
    source: text('source', { enum: RECORD_SOURCES }).notNull(),
    recordDate: date('record_date', { mode: 'string' }).notNull(),
    amount: bigint('amount', { mode: 'number' }).notNull(),
    description: text('description').notNull(),
    externalReference: text('external_reference'),
    rowNumber: integer('row_number').notNull(),
  },
  (table) => ({
    sessionSourceIdx: index('transaction_records_session_source_idx').on(table.sessionId, table.source),
  })
);

export const matches = pgTable(
  'matches',
  {
    id: uuid('id').primaryKey(),
    sessionId: uuid('session_id')
      .notNull()
      .references(() => sessions.id, { onDelete: 'cascade' }),
    ledgerRecordId: uuid('ledger_record_id').notNull(),
    bankRecordId: uuid('bank_record_id').notNull(),
    score: doublePrecision('score').notNull(),
    dateDifferenceDays: integer('date_difference_days').notNull(),
    amountDifference: bigint('amount_difference', { mode: 'number' }).notNull(),
    kind: text('kind', { enum: MATCH_KINDS }).notNull(),
    status: text('status', { enum: MATCH_STATUSES }).notNull(),
    confirmedBy: text('confirmed_by'),
    confirmedAt: timestamp('confirmed_at', { withTimezone: true, mode: 'date' }),
    rejectedBy: text('rejected_by'),
    rejectedAt: timestamp('rejected_at', { withTimezone: true, mode: 'date' }),
    rejectionReason: text('rejection_reason'),
    position: integer('position').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull(),
  },
  (table) => ({
    sessionIdx: index('matches_session_idx').on(table.sessionId),
  })
);

export const exceptions = pgTable(
  'reconciliation_exceptions',
  {
    id: uuid('id').primaryKey(),
    sessionId: uuid('session_id')
      .notNull()
      .references(() => sessions.id, { onDelete: 'cascade' }),
    recordId: uuid('record_id').notNull(),
    source: text('source', { enum: RECORD_SOURCES }).notNull(),
    kind: text('kind', { enum: EXCEPTION_KINDS }).notNull(),
    status: text('status', { enum: EXCEPTION_STATUSES }).notNull(),
    nearMiss: jsonb('near_miss').$type<NearMissReference>(),
    duplicateOfRecordIds: text('duplicate_of_record_ids').array(),
    resolutionNote: text('resolution_note'),
    resolvedBy: text('resolved_by'),
    resolvedAt: timestamp('resolved_at', { withTimezone: true, mode: 'date' }),
    closedByMatchId: uuid('closed_by_match_id'),
    position: integer('position').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull(),
  },
  (table) => ({
    sessionIdx: index('reconciliation_exceptions_session_idx').on(table.sessionId),
  })
);

export const auditEntries = pgTable(
  'audit_entries',
  {
    id: uuid('id').primaryKey(),
    sessionId: uuid('session_id')
      .notNull()
      .references(() => sessions.id, { onDelete: 'cascade' }),
    action: text('action', { enum: AUDIT_ACTIONS }).notNull(),
    performedBy: text('performed_by').notNull(),
    targetId: text('target_id'),
    note: text('note'),
    position: integer('position').notNull(),
    at: timestamp('at', { withTimezone: true, mode: 'date' }).notNull(),
  },
  (table) => ({
    sessionIdx: index('audit_entries_session_idx').on(table.sessionId),
  })
);

export type SessionRow = typeof sessions.$inferSelect;
export type RecordRow = typeof records.$inferSelect;
export type MatchRow = typeof matches.$inferSelect;
export type ExceptionRow = typeof exceptions.$inferSelect;
export type AuditEntryRow = typeof auditEntries.$inferSelect;
