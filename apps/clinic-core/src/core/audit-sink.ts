import type { AuditEventType } from '@clinic-attendance/attendance-policy';
import type { Actor } from '@clinic-attendance/shared';

import type { AuditLogRecord } from '../data/types.js';
import type { UnitOfWork } from '../data/unit-of-work.js';
import { errorMessage, type Logger } from '../server/logger.js';

export interface AuditEvent {
  eventType: AuditEventType;
  description: string;
  actorId?: string;
  actorName?: string;
  actorRole?: Actor['role'];
  targetType?: AuditLogRecord['targetType'];
  targetId?: string;
}

export type AuditRecordResult = { recorded: true } | { recorded: false; reason: string };

/** Best-effort event sink. `record` resolves in every case and never rejects. */
export interface AuditSink {
  record(event: AuditEvent): Promise<AuditRecordResult>;
}

export function actorFields(actor: Actor): Pick<AuditEvent, 'actorId' | 'actorName' | 'actorRole'> {
  return {
    actorId: actor.id,
    actorRole: actor.role,
    ...(actor.name === undefined ? {} : { actorName: actor.name }),
  };
}

/** Writes each event to the audit log table in its own unit of work. */
export class StoreAuditSink implements AuditSink {
  constructor(
    private readonly database: UnitOfWork,
    private readonly logger: Logger,
  ) {}

  async record(event: AuditEvent): Promise<AuditRecordResult> {
    try {
      await this.database.run((store) =>
        store.auditLog.append({
          actionType: event.eventType,
          description: event.description,
          ...(event.actorId === undefined ? {} : { actorId: event.actorId }),
          ...(event.actorName === undefined ? {} : { actorName: event.actorName }),
          ...(event.actorRole === undefined ? {} : { actorRole: event.actorRole }),
          ...(event.targetType === undefined ? {} : { targetType: event.targetType }),
          ...(event.targetId === undefined ? {} : { targetId: event.targetId }),
        }),
      );
      return { recorded: true };
    } catch (error) {
      return dropped(this.logger, event, error);
    }
  }
}

/** Records through any sink, including one that breaks its promise not to reject. */
export async function recordBestEffort(
  sink: AuditSink,
  event: AuditEvent,
  logger: Logger,
): Promise<AuditRecordResult> {
  try {
    return await sink.record(event);
  } catch (error) {
    return dropped(logger, event, error);
  }
}

function dropped(logger: Logger, event: AuditEvent, error: unknown): AuditRecordResult {
  const reason = errorMessage(error);
  logger.warn('audit event dropped', {
    eventType: event.eventType,
    ...(event.targetId === undefined ? {} : { targetId: event.targetId }),
    error: reason,
  });
  return { recorded: false, reason };
}
