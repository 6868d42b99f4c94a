import type { AuditAction, AuditEntry, EntityContext } from './types';

/** Identity recorded for decisions the engine takes on its own */
export const SYSTEM_ACTOR = 'system';

export interface AuditDetails {
  targetId?: string;
  note?: string;
}

export function auditEntry(
  action: AuditAction,
  performedBy: string,
  ctx: EntityContext,
  details: AuditDetails = {}
): AuditEntry {
  return {
    id: ctx.newId(),
    action,
    performedBy,
    ...(details.targetId !== undefined ? { targetId: details.targetId } : {}),
    ...(details.note !== undefined ? { note: details.note } : {}),
    at: ctx.now,
  };
}
