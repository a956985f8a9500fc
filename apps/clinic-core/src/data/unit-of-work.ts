import type { AppointmentStatus } from '@clinic-attendance/attendance-policy';

import type {
  AppointmentQuery,
  AppointmentRecord,
  AppointmentView,
  AuditLogPage,
  AuditLogRecord,
  ConflictingAppointment,
  DoctorRecord,
  NewAppointment,
  NewAuditLogRecord,
  NewReaccessRequest,
  PatientAccountState,
  PatientRecord,
  ReaccessProcessing,
  ReaccessRequestRecord,
  ReaccessRequestView,
} from './types.js';

export interface AppointmentStore {
  /** Serializes schedule changes for one doctor until the unit of work ends. */
  lockDoctorSchedule(doctorId: string): Promise<void>;
  findById(id: string): Promise<AppointmentRecord | null>;
  findScheduledConflict(
    doctorId: string,
    scheduledAt: string,
    windowMinutes: number,
    excludeId?: string,
  ): Promise<ConflictingAppointment | null>;
  insert(input: NewAppointment): Promise<AppointmentRecord>;
  updateSchedule(id: string, scheduledAt: string, reason: string): Promise<AppointmentRecord>;
  updateStatus(id: string, status: AppointmentStatus): Promise<AppointmentRecord>;
  delete(id: string): Promise<boolean>;
  list(query: AppointmentQuery): Promise<AppointmentView[]>;
}

export interface PatientDirectory {
  findById(patientId: string): Promise<PatientRecord | null>;
  findByAccountId(accountId: string): Promise<PatientRecord | null>;
  /** Locks the patient row for the rest of the unit of work. */
  getAccountState(patientId: string): Promise<PatientAccountState | null>;
  setAccountState(patientId: string, state: PatientAccountState): Promise<void>;
  /** Increments the consecutive-missed counter and returns the new value. */
  incrementMissedCount(patientId: string): Promise<number>;
}

export interface DoctorDirectory {
  resolveDoctor(staffAccountId: string): Promise<DoctorRecord | null>;
  findById(doctorId: string): Promise<DoctorRecord | null>;
}

export interface ReaccessRequestStore {
  findById(id: string): Promise<ReaccessRequestRecord | null>;
  findPending(patientId: string): Promise<ReaccessRequestRecord | null>;
  insert(input: NewReaccessRequest): Promise<ReaccessRequestRecord>;
  markProcessed(id: string, processing: ReaccessProcessing): Promise<ReaccessRequestRecord>;
  list(options: { pendingOnly: boolean }): Promise<ReaccessRequestView[]>;
}

export interface AuditLogStore {
  append(record: NewAuditLogRecord): Promise<AuditLogRecord>;
  list(options: { actionType?: string; limit: number; offset: number }): Promise<AuditLogPage>;
  listActionTypes(): Promise<string[]>;
  purgeOlderThan(cutoff: Date): Promise<number>;
}

export interface ClinicStore {
  appointments: AppointmentStore;
  patients: PatientDirectory;
  doctors: DoctorDirectory;
  reaccessRequests: ReaccessRequestStore;
  auditLog: AuditLogStore;
}

/**
 * Runs `work` against a transactional store. Every write made through the store commits
 * together when `work` resolves and is rolled back when it rejects.
 */
export interface UnitOfWork {
  run<T>(work: (store: ClinicStore) => Promise<T>): Promise<T>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

/** Raised by a store when a storage-level uniqueness or exclusion rule rejects a write. */
export class StoreConstraintError extends Error {
  constructor(
    public readonly constraint: 'appointment_slot' | 'single_pending_reaccess',
    message: string,
  ) {
    super(message);
    this.name = 'StoreConstraintError';
  }
}

export class RecordNotFoundError extends Error {
  constructor(
    public readonly entity: string,
    public readonly id: string,
  ) {
    super(`${entity} not found: ${id}`);
    this.name = 'RecordNotFoundError';
  }
}
