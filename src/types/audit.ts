/**
 * Audit Types
 */

/**
 * Event handed to AuditService.log()
 */
export interface AuditEvent {
  action: string; // e.g. 'subscription.created', 'plan.created'
  resourceType: string; // e.g. 'subscription', 'plan'
  resourceId?: string;
  details?: Record<string, unknown>;
}

/**
 * Row written to audit_logs
 */
export interface AuditLogEntry {
  actorId: string | null;
  actorType: string;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  userAgent: string | null;
  requestId: string | null;
}
