import { AuditLog } from '@/lib/db/models';
import { errorMessage } from '@/lib/errors';

export type AuditEntry = {
  jobId?: string;
  action: string;
  entity: string;
  entityId?: string;
  payload?: Record<string, unknown>;
};

/** Receives audit entries. A sink may reject; the emitter never lets that reach its caller. */
export type AuditSink = (entry: AuditEntry) => Promise<void>;

export const mongoAuditSink: AuditSink = async (entry) => {
  await AuditLog.create({
    job_id: entry.jobId,
    action: entry.action,
    entity: entry.entity,
    entity_id: entry.entityId,
    payload: entry.payload
  });
};

export const noopAuditSink: AuditSink = async () => {};

export type AuditEmitter = (entry: AuditEntry) => void;

/**
 * Fire-and-forget audit writes. The returned promise chain always settles
 * with a warning on failure, so primary operations never wait on or fail
 * because of the audit log.
 */
export function createAuditEmitter(sink: AuditSink): AuditEmitter {
  return (entry) => {
    let pending: Promise<void>;
    try {
      pending = sink(entry);
    } catch (error) {
      pending = Promise.reject(error);
    }
    void pending.catch((error: unknown) => {
      console.warn(`[Audit] ${entry.action} on ${entry.entity} not recorded: ${errorMessage(error)}`);
    });
  };
}
