/**
 * Audit trail domain model.
 *
 * Immutable records of directory mutations and decision outcomes.
 */

export const AUDIT_ACTIONS = [
  'risk.assessed',
  'mitigation.monitored',
  'mitigation.applied',
  'mitigation.resolved',
  'elevation.approved',
  'elevation.rejected',
  'group.created',
  'group.member_added',
  'group.member_removed',
  'group.principal_purged',
] as const;

/** Audit event categories. */
export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export function isAuditAction(value: unknown): value is AuditAction {
  return typeof value === 'string' && AUDIT_ACTIONS.some((action) => action === value);
}

/** Resource types for audit records. */
export type AuditResourceType = 'principal' | 'mitigation' | 'elevation-request' | 'group';

/** Audit outcome. */
export type AuditOutcome = 'success' | 'failure';

/** An immutable audit record. */
export interface AuditRecord {
  id: string;
  timestamp: string;
  actorId: string;
  action: AuditAction;
  resourceType: AuditResourceType;
  resourceId: string;
  outcome: AuditOutcome;
  /** Additional context about the action. */
  details?: Record<string, unknown>;
}
