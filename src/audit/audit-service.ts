/**
 * Audit trail for directory mutations and human decisions.
 *
 * Hot paths call `recordSafely`: a failed audit write is logged and never
 * blocks a mitigation, a callback or a group sync.
 */

import { v4 as uuid } from 'uuid';
import { AuditAction, AuditRecord } from '../domain/audit';
import { errorMessage } from '../domain/errors';
import { Store } from '../storage/store';
import { logger } from '../logger';

/** Everything the caller supplies; the id and timestamp are assigned here. */
export type AuditEvent = Omit<AuditRecord, 'id' | 'timestamp'>;

export interface AuditQuery {
  resourceId?: string;
  action?: AuditAction;
  limit?: number;
  offset?: number;
}

const log = logger.child({ component: 'audit' });

export class AuditService {
  constructor(
    private readonly store: Store,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async record(event: AuditEvent): Promise<AuditRecord> {
    return this.store.audit.create({ ...event, id: `aud_${uuid()}`, timestamp: this.clock().toISOString() });
  }

  async recordSafely(event: AuditEvent): Promise<AuditRecord | null> {
    try {
      return await this.record(event);
    } catch (err) {
      log.error('Audit write failed', {
        action: event.action,
        resourceId: event.resourceId,
        error: errorMessage(err),
      });
      return null;
    }
  }

  /** Records in insertion order, filtered and paged. */
  async query(filter: AuditQuery = {}): Promise<AuditRecord[]> {
    return this.store.audit.list(filter);
  }
}
