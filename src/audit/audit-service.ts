/**
 * Audit trail service.
 *
 * Appends immutable records for state-changing registry actions. Recording
 * never fails the action being audited: store errors are logged and dropped.
 */

import { v4 as uuid } from 'uuid';
import { AuditRecord, AuditAction, AuditOutcome } from '../domain/audit';
import { AuditStore } from '../storage/store';
import { logger } from '../logger';

export interface AuditInput {
  actorId: string;
  action: AuditAction;
  resourceId: string;
  outcome?: AuditOutcome;
  details?: Record<string, unknown>;
}

/** Actor recorded for actions the registry takes on its own. */
export const SYSTEM_ACTOR = 'system';

export class AuditService {
  private log = logger.child({ component: 'audit' });

  constructor(private store: AuditStore) {}

  async record(input: AuditInput): Promise<AuditRecord | null> {
    const record: AuditRecord = {
      id: `aud_${uuid()}`,
      timestamp: new Date().toISOString(),
      actorId: input.actorId,
      action: input.action,
      resourceId: input.resourceId,
      outcome: input.outcome ?? 'success',
      details: input.details,
    };

    try {
      return await this.store.create(record);
    } catch (err) {
      this.log.error('Audit logging failed', {
        action: input.action,
        resourceId: input.resourceId,
        error: err instanceof Error ? err.message : 'Unknown error',
      });
      return null;
    }
  }
}
