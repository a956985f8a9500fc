import { randomUUID } from 'node:crypto';

import {
  AppointmentStatus,
  MIN_VISIT_SPACING_MINUTES,
  findSchedulingConflict,
} from '@clinic-attendance/attendance-policy';

import {
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
import {
  AppointmentStore,
  AuditLogStore,
  ClinicStore,
  DoctorDirectory,
  PatientDirectory,
  ReaccessRequestStore,
  RecordNotFoundError,
  StoreConstraintError,
  UnitOfWork,
} from './unit-of-work.js';

interface Tables {
  appointments: Map<string, AppointmentRecord>;
  patients: Map<string, PatientRecord>;
  doctors: Map<string, DoctorRecord>;
  reaccessRequests: Map<string, ReaccessRequestRecord>;
  auditLog: AuditLogRecord[];
}

function emptyTables(): Tables {
  return {
    appointments: new Map(),
    patients: new Map(),
    doctors: new Map(),
    reaccessRequests: new Map(),
    auditLog: [],
  };
}

// Records are replaced, never mutated, so copying the containers is enough.
function copyTables(tables: Tables): Tables {
  return {
    appointments: new Map(tables.appointments),
    patients: new Map(tables.patients),
    doctors: new Map(tables.doctors),
    reaccessRequests: new Map(tables.reaccessRequests),
    auditLog: [...tables.auditLog],
  };
}

function newestFirst<T extends { createdAt: string }>(records: Iterable<T>): T[] {
  return Array.from(records)
    .reverse()
    .sort((left, right) => right.createdAt.localeCompare(left.createdAt));
}

export type Clock = () => Date;

class InMemoryAppointmentStore implements AppointmentStore {
  constructor(
    private readonly tables: Tables,
    private readonly clock: Clock,
  ) {}

  async lockDoctorSchedule(_doctorId: string): Promise<void> {
    // Units of work already run one at a time.
  }

  async findById(id: string): Promise<AppointmentRecord | null> {
    return this.tables.appointments.get(id) ?? null;
  }

  async findScheduledConflict(
    doctorId: string,
    scheduledAt: string,
    windowMinutes: number,
    excludeId?: string,
  ): Promise<ConflictingAppointment | null> {
    const conflict = findSchedulingConflict(this.scheduledFor(doctorId), scheduledAt, {
      windowMinutes,
      ...(excludeId === undefined ? {} : { excludeId }),
    });
    if (conflict === null) {
      return null;
    }

    return {
      id: conflict.id,
      scheduledAt: conflict.scheduledAt,
      patientName: this.tables.patients.get(conflict.patientId)?.fullName ?? 'Unknown patient',
    };
  }

  async insert(input: NewAppointment): Promise<AppointmentRecord> {
    this.assertSlotFree(input.doctorId, input.scheduledAt);

    const appointment: AppointmentRecord = {
      id: randomUUID(),
      patientId: input.patientId,
      doctorId: input.doctorId,
      scheduledAt: input.scheduledAt,
      reason: input.reason,
      status: 'scheduled',
      createdAt: this.clock().toISOString(),
    };

    this.tables.appointments.set(appointment.id, appointment);
    return appointment;
  }

  async updateSchedule(id: string, scheduledAt: string, reason: string): Promise<AppointmentRecord> {
    const current = this.require(id);
    if (current.status === 'scheduled') {
      this.assertSlotFree(current.doctorId, scheduledAt, id);
    }

    const updated: AppointmentRecord = { ...current, scheduledAt, reason };
    this.tables.appointments.set(id, updated);
    return updated;
  }

  async updateStatus(id: string, status: AppointmentStatus): Promise<AppointmentRecord> {
    const updated: AppointmentRecord = { ...this.require(id), status };
    this.tables.appointments.set(id, updated);
    return updated;
  }

  async delete(id: string): Promise<boolean> {
    return this.tables.appointments.delete(id);
  }

  async list(query: AppointmentQuery): Promise<AppointmentView[]> {
    const matches = Array.from(this.tables.appointments.values()).filter(
      (appointment) =>
        (query.doctorId === undefined || appointment.doctorId === query.doctorId) &&
        (query.patientId === undefined || appointment.patientId === query.patientId) &&
        (query.status === undefined || appointment.status === query.status),
    );

    return matches
      .sort((left, right) => right.scheduledAt.localeCompare(left.scheduledAt))
      .map((appointment) => {
        const patient = this.tables.patients.get(appointment.patientId);
        const doctor = this.tables.doctors.get(appointment.doctorId);
        return {
          ...appointment,
          patientName: patient?.fullName ?? null,
          patientPhone: patient?.phoneNumber ?? null,
          patientAccountStatus: patient?.accountStatus ?? null,
          doctorName: doctor?.fullName ?? null,
        };
      });
  }

  private scheduledFor(doctorId: string): AppointmentRecord[] {
    return Array.from(this.tables.appointments.values()).filter(
      (appointment) => appointment.doctorId === doctorId && appointment.status === 'scheduled',
    );
  }

  private assertSlotFree(doctorId: string, scheduledAt: string, excludeId?: string): void {
    const conflict = findSchedulingConflict(this.scheduledFor(doctorId), scheduledAt, {
      windowMinutes: MIN_VISIT_SPACING_MINUTES,
      ...(excludeId === undefined ? {} : { excludeId }),
    });
    if (conflict !== null) {
      throw new StoreConstraintError(
        'appointment_slot',
        `Slot ${scheduledAt} overlaps appointment ${conflict.id}`,
      );
    }
  }

  private require(id: string): AppointmentRecord {
    const current = this.tables.appointments.get(id);
    if (current === undefined) {
      throw new RecordNotFoundError('appointment', id);
    }

    return current;
  }
}

class InMemoryPatientDirectory implements PatientDirectory {
  constructor(private readonly tables: Tables) {}

  async findById(patientId: string): Promise<PatientRecord | null> {
    return this.tables.patients.get(patientId) ?? null;
  }

  async findByAccountId(accountId: string): Promise<PatientRecord | null> {
    for (const patient of this.tables.patients.values()) {
      if (patient.accountId === accountId) {
        return patient;
      }
    }

    return null;
  }

  async getAccountState(patientId: string): Promise<PatientAccountState | null> {
    const patient = this.tables.patients.get(patientId);
    if (patient === undefined) {
      return null;
    }

    return { status: patient.accountStatus, missedCount: patient.missedCount };
  }

  async setAccountState(patientId: string, state: PatientAccountState): Promise<void> {
    const patient = this.require(patientId);
    this.tables.patients.set(patientId, {
      ...patient,
      accountStatus: state.status,
      missedCount: state.missedCount,
    });
  }

  async incrementMissedCount(patientId: string): Promise<number> {
    const patient = this.require(patientId);
    const missedCount = patient.missedCount + 1;
    this.tables.patients.set(patientId, { ...patient, missedCount });
    return missedCount;
  }

  private require(patientId: string): PatientRecord {
    const patient = this.tables.patients.get(patientId);
    if (patient === undefined) {
      throw new RecordNotFoundError('patient', patientId);
    }

    return patient;
  }
}

class InMemoryDoctorDirectory implements DoctorDirectory {
  constructor(private readonly tables: Tables) {}

  async resolveDoctor(staffAccountId: string): Promise<DoctorRecord | null> {
    for (const doctor of this.tables.doctors.values()) {
      if (doctor.accountId === staffAccountId) {
        return doctor;
      }
    }

    return null;
  }

  async findById(doctorId: string): Promise<DoctorRecord | null> {
    return this.tables.doctors.get(doctorId) ?? null;
  }
}

class InMemoryReaccessRequestStore implements ReaccessRequestStore {
  constructor(
    private readonly tables: Tables,
    private readonly clock: Clock,
  ) {}

  async findById(id: string): Promise<ReaccessRequestRecord | null> {
    return this.tables.reaccessRequests.get(id) ?? null;
  }

  async findPending(patientId: string): Promise<ReaccessRequestRecord | null> {
    for (const request of this.tables.reaccessRequests.values()) {
      if (request.patientId === patientId && request.status === 'pending') {
        return request;
      }
    }

    return null;
  }

  async insert(input: NewReaccessRequest): Promise<ReaccessRequestRecord> {
    const existing = await this.findPending(input.patientId);
    if (existing !== null) {
      throw new StoreConstraintError(
        'single_pending_reaccess',
        `Patient ${input.patientId} already has pending request ${existing.id}`,
      );
    }

    const request: ReaccessRequestRecord = {
      id: randomUUID(),
      patientId: input.patientId,
      reason: input.reason,
      ...(input.contactPhone === undefined ? {} : { contactPhone: input.contactPhone }),
      status: 'pending',
      createdAt: this.clock().toISOString(),
    };

    this.tables.reaccessRequests.set(request.id, request);
    return request;
  }

  async markProcessed(id: string, processing: ReaccessProcessing): Promise<ReaccessRequestRecord> {
    const current = this.tables.reaccessRequests.get(id);
    if (current === undefined) {
      throw new RecordNotFoundError('reaccess_request', id);
    }

    const updated: ReaccessRequestRecord = {
      ...current,
      status: processing.status,
      adminResponse: processing.adminResponse,
      processedAt: processing.processedAt,
      processedBy: processing.processedBy,
    };

    this.tables.reaccessRequests.set(id, updated);
    return updated;
  }

  async list(options: { pendingOnly: boolean }): Promise<ReaccessRequestView[]> {
    const views: ReaccessRequestView[] = [];

    for (const request of newestFirst(this.tables.reaccessRequests.values())) {
      if (options.pendingOnly && request.status !== 'pending') {
        continue;
      }

      const patient = this.tables.patients.get(request.patientId);
      if (patient === undefined) {
        continue;
      }

      views.push({
        ...request,
        patientName: patient.fullName,
        ...(patient.nationalId === undefined ? {} : { nationalId: patient.nationalId }),
        ...(patient.phoneNumber === undefined ? {} : { patientPhone: patient.phoneNumber }),
        missedCount: patient.missedCount,
      });
    }

    return views;
  }
}

class InMemoryAuditLogStore implements AuditLogStore {
  constructor(
    private readonly tables: Tables,
    private readonly clock: Clock,
  ) {}

  async append(record: NewAuditLogRecord): Promise<AuditLogRecord> {
    const entry: AuditLogRecord = {
      ...record,
      id: randomUUID(),
      createdAt: this.clock().toISOString(),
    };

    this.tables.auditLog.push(entry);
    return entry;
  }

  async list(options: { actionType?: string; limit: number; offset: number }): Promise<AuditLogPage> {
    const filtered = newestFirst(this.tables.auditLog).filter(
      (entry) => options.actionType === undefined || entry.actionType === options.actionType,
    );

    return {
      entries: filtered.slice(options.offset, options.offset + options.limit),
      total: filtered.length,
      limit: options.limit,
      offset: options.offset,
    };
  }

  async listActionTypes(): Promise<string[]> {
    return Array.from(new Set(this.tables.auditLog.map((entry) => entry.actionType))).sort();
  }

  async purgeOlderThan(cutoff: Date): Promise<number> {
    const cutoffIso = cutoff.toISOString();
    const kept = this.tables.auditLog.filter((entry) => entry.createdAt >= cutoffIso);
    const removed = this.tables.auditLog.length - kept.length;
    this.tables.auditLog.splice(0, this.tables.auditLog.length, ...kept);
    return removed;
  }
}

export interface InMemoryClinicDatabaseOptions {
  clock?: Clock;
}

export interface PatientSeed {
  id: string;
  accountId: string;
  fullName: string;
  nationalId?: string;
  phoneNumber?: string;
  accountStatus?: PatientRecord['accountStatus'];
  missedCount?: number;
}

/**
 * Single-process store. Units of work run strictly one after another against a private copy
 * of the tables, which replaces the shared tables only when the work resolves.
 */
export class InMemoryClinicDatabase implements UnitOfWork {
  private tables: Tables = emptyTables();
  private tail: Promise<void> = Promise.resolve();
  private readonly clock: Clock;

  constructor(options: InMemoryClinicDatabaseOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  run<T>(work: (store: ClinicStore) => Promise<T>): Promise<T> {
    return this.transact((tables) => work(this.createStore(tables)));
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    await this.tail;
  }

  seedPatient(seed: PatientSeed): Promise<PatientRecord> {
    return this.transact(async (tables) => {
      const patient: PatientRecord = {
        ...seed,
        accountStatus: seed.accountStatus ?? 'active',
        missedCount: seed.missedCount ?? 0,
      };
      tables.patients.set(patient.id, patient);
      return patient;
    });
  }

  seedDoctor(doctor: DoctorRecord): Promise<DoctorRecord> {
    return this.transact(async (tables) => {
      tables.doctors.set(doctor.id, doctor);
      return doctor;
    });
  }

  private transact<T>(work: (tables: Tables) => Promise<T>): Promise<T> {
    const execution = this.tail.then(async () => {
      const working = copyTables(this.tables);
      const result = await work(working);
      this.tables = working;
      return result;
    });

    this.tail = execution.then(
      () => undefined,
      () => undefined,
    );
    return execution;
  }

  private createStore(tables: Tables): ClinicStore {
    return {
      appointments: new InMemoryAppointmentStore(tables, this.clock),
      patients: new InMemoryPatientDirectory(tables),
      doctors: new InMemoryDoctorDirectory(tables),
      reaccessRequests: new InMemoryReaccessRequestStore(tables, this.clock),
      auditLog: new InMemoryAuditLogStore(tables, this.clock),
    };
  }
}
