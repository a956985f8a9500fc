export interface NotFoundFailure {
  kind: 'NotFound';
  entity: 'appointment' | 'patient' | 'doctor' | 'reaccess_request';
  id: string;
  message: string;
}

export interface PatientRestrictedFailure {
  kind: 'PatientRestricted';
  patientId: string;
  message: string;
}

export interface SchedulingConflictFailure {
  kind: 'SchedulingConflict';
  conflictingAppointmentId: string;
  conflictingAt: string;
  counterpartName: string;
  message: string;
}

export interface DuplicateRequestFailure {
  kind: 'DuplicateRequest';
  patientId: string;
  pendingRequestId: string;
  message: string;
}

export interface ValidationFailure {
  kind: 'ValidationError';
  message: string;
  fields: Record<string, string>;
}

export interface ForbiddenFailure {
  kind: 'Forbidden';
  message: string;
}

export interface InvalidTransitionFailure {
  kind: 'InvalidTransition';
  from: string;
  to: string;
  message: string;
}

export interface PersistenceFailure {
  kind: 'PersistenceFailure';
  message: string;
}

export type ClinicFailure =
  | NotFoundFailure
  | PatientRestrictedFailure
  | SchedulingConflictFailure
  | DuplicateRequestFailure
  | ValidationFailure
  | ForbiddenFailure
  | InvalidTransitionFailure
  | PersistenceFailure;

export type FailureKind = ClinicFailure['kind'];

export type OperationResult<T> = { ok: true; value: T } | { ok: false; failure: ClinicFailure };

export function succeed<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(failure: ClinicFailure): OperationResult<T> {
  return { ok: false, failure };
}
