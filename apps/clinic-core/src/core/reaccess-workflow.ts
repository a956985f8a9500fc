import {
  DEFAULT_APPROVAL_RESPONSE,
  DEFAULT_REJECTION_RESPONSE,
  applyReaccessApproval,
  canTransitionReaccessRequest,
  type ReaccessDecision,
} from '@clinic-attendance/attendance-policy';
import { fail, succeed, type Actor, type OperationResult } from '@clinic-attendance/shared';

import type { PatientRecord, ReaccessRequestRecord } from '../data/types.js';
import type { UnitOfWork } from '../data/unit-of-work.js';
import type { Logger } from '../server/logger.js';
import { canSubmitReaccess, canViewPatient } from './access-policy.js';
import { actorFields, recordBestEffort, type AuditSink } from './audit-sink.js';
import { duplicateRequest, forbidden, invalidTransition, notFound } from './failures.js';
import { runWithConstraintRetry } from './operation.js';

export interface SubmitReaccessCommand {
  patientId: string;
  reason: string;
  contactPhone?: string;
}

export interface DecideReaccessCommand {
  requestId: string;
  responseText?: string;
}

export interface PendingRequestStatus {
  hasPending: boolean;
  request: ReaccessRequestRecord | null;
}

export interface ReaccessWorkflowDependencies {
  database: UnitOfWork;
  audit: AuditSink;
  logger: Logger;
  clock?: () => Date;
}

interface Adjudication {
  request: ReaccessRequestRecord;
  patient: PatientRecord;
}

const decisionEvents = {
  approved: { eventType: 'reaccess_approved', verb: 'approved' },
  rejected: { eventType: 'reaccess_rejected', verb: 'rejected' },
} as const;

export class ReaccessWorkflow {
  private readonly clock: () => Date;

  constructor(private readonly dependencies: ReaccessWorkflowDependencies) {
    this.clock = dependencies.clock ?? (() => new Date());
  }

  async submit(
    command: SubmitReaccessCommand,
    actor: Actor,
  ): Promise<OperationResult<ReaccessRequestRecord>> {
    const result = await runWithConstraintRetry(
      this.dependencies.database,
      'single_pending_reaccess',
      async (store): Promise<OperationResult<Adjudication>> => {
        const patient = await store.patients.findById(command.patientId);
        if (patient === null) {
          return fail(notFound('patient', command.patientId));
        }

        if (!canSubmitReaccess(actor, patient)) {
          return fail(forbidden('submit a re-access request for this patient'));
        }

        const pending = await store.reaccessRequests.findPending(patient.id);
        if (pending !== null) {
          return fail(duplicateRequest(pending));
        }

        const request = await store.reaccessRequests.insert({
          patientId: patient.id,
          reason: command.reason,
          ...(command.contactPhone === undefined ? {} : { contactPhone: command.contactPhone }),
        });
        return succeed({ request, patient });
      },
    );

    if (!result.ok) {
      return result;
    }

    const { request, patient } = result.value;
    await recordBestEffort(
      this.dependencies.audit,
      {
        eventType: 'reaccess_submitted',
        description: `Re-access request submitted by patient: ${patient.fullName}`,
        ...actorFields(actor),
        targetType: 'reaccess_request',
        targetId: request.id,
      },
      this.dependencies.logger,
    );

    return succeed(request);
  }

  /** Marks the request approved and restores the patient's account in the same unit of work. */
  approve(
    command: DecideReaccessCommand,
    admin: Actor,
  ): Promise<OperationResult<ReaccessRequestRecord>> {
    return this.decide('approved', command, admin);
  }

  /** Marks the request rejected. The patient's account state is left as it is. */
  reject(
    command: DecideReaccessCommand,
    admin: Actor,
  ): Promise<OperationResult<ReaccessRequestRecord>> {
    return this.decide('rejected', command, admin);
  }

  async checkExisting(
    patientId: string,
    actor: Actor,
  ): Promise<OperationResult<PendingRequestStatus>> {
    return this.dependencies.database.run(
      async (store): Promise<OperationResult<PendingRequestStatus>> => {
        const patient = await store.patients.findById(patientId);
        if (patient === null) {
          return fail(notFound('patient', patientId));
        }

        if (!canViewPatient(actor, patient)) {
          return fail(forbidden('view re-access requests of this patient'));
        }

        const request = await store.reaccessRequests.findPending(patient.id);
        return succeed({ hasPending: request !== null, request });
      },
    );
  }

  private async decide(
    decision: ReaccessDecision,
    command: DecideReaccessCommand,
    admin: Actor,
  ): Promise<OperationResult<ReaccessRequestRecord>> {
    const result = await this.dependencies.database.run(
      async (store): Promise<OperationResult<Adjudication>> => {
        const current = await store.reaccessRequests.findById(command.requestId);
        if (current === null) {
          return fail(notFound('reaccess_request', command.requestId));
        }

        if (!canTransitionReaccessRequest(current.status, decision)) {
          return fail(invalidTransition('re-access request', current.status, decision));
        }

        const patient = await store.patients.findById(current.patientId);
        if (patient === null) {
          return fail(notFound('patient', current.patientId));
        }

        const request = await store.reaccessRequests.markProcessed(current.id, {
          status: decision,
          adminResponse:
            command.responseText ??
            (decision === 'approved' ? DEFAULT_APPROVAL_RESPONSE : DEFAULT_REJECTION_RESPONSE),
          processedBy: admin.id,
          processedAt: this.clock().toISOString(),
        });

        if (decision === 'approved') {
          await store.patients.setAccountState(patient.id, applyReaccessApproval());
        }

        return succeed({ request, patient });
      },
    );

    if (!result.ok) {
      return result;
    }

    const { request, patient } = result.value;
    const event = decisionEvents[decision];
    await recordBestEffort(
      this.dependencies.audit,
      {
        eventType: event.eventType,
        description: `Re-access request ${event.verb} for patient: ${patient.fullName}`,
        ...actorFields(admin),
        targetType: 'reaccess_request',
        targetId: request.id,
      },
      this.dependencies.logger,
    );

    return succeed(request);
  }
}
