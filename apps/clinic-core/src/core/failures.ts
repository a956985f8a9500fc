import { describeConflict } from '@clinic-attendance/attendance-policy';
import type {
  DuplicateRequestFailure,
  ForbiddenFailure,
  InvalidTransitionFailure,
  NotFoundFailure,
  PatientRestrictedFailure,
  PersistenceFailure,
  SchedulingConflictFailure,
} from '@clinic-attendance/shared';

import type { ConflictingAppointment, ReaccessRequestRecord } from '../data/types.js';

const entityLabels: Record<NotFoundFailure['entity'], string> = {
  appointment: 'Appointment',
  patient: 'Patient',
  doctor: 'Doctor',
  reaccess_request: 'Re-access request',
};

export function notFound(entity: NotFoundFailure['entity'], id: string): NotFoundFailure {
  return { kind: 'NotFound', entity, id, message: `${entityLabels[entity]} not found: ${id}` };
}

export function patientRestricted(patientId: string): PatientRestrictedFailure {
  return {
    kind: 'PatientRestricted',
    patientId,
    message:
      'Patient account is restricted due to missed appointments. A re-access request must be approved before booking.',
  };
}

export function schedulingConflict(conflict: ConflictingAppointment): SchedulingConflictFailure {
  return {
    kind: 'SchedulingConflict',
    conflictingAppointmentId: conflict.id,
    conflictingAt: conflict.scheduledAt,
    counterpartName: conflict.patientName,
    message: describeConflict(conflict.patientName, conflict.scheduledAt),
  };
}

export function duplicateRequest(pending: ReaccessRequestRecord): DuplicateRequestFailure {
  return {
    kind: 'DuplicateRequest',
    patientId: pending.patientId,
    pendingRequestId: pending.id,
    message: 'You already have a pending re-access request. Please wait for admin review.',
  };
}

export function invalidTransition(entity: string, from: string, to: string): InvalidTransitionFailure {
  return {
    kind: 'InvalidTransition',
    from,
    to,
    message: `Cannot move ${entity} from ${from} to ${to}`,
  };
}

export function forbidden(action: string): ForbiddenFailure {
  return { kind: 'Forbidden', message: `Not allowed to ${action}` };
}

export function persistenceFailure(): PersistenceFailure {
  return { kind: 'PersistenceFailure', message: 'The operation could not be completed. Please retry.' };
}
