import { z } from 'zod';

import type { AccountStatus } from '@clinic-attendance/attendance-policy';
import {
  accountRefSchema,
  appointmentListFilterSchema,
  appointmentRefSchema,
  attendanceSetStatusInputSchema,
  auditLogPurgeSchema,
  auditLogQuerySchema,
  fail,
  patientRefSchema,
  reaccessDecisionInputSchema,
  reaccessListQuerySchema,
  reaccessSubmitInputSchema,
  scheduleCreateInputSchema,
  scheduleRescheduleInputSchema,
  succeed,
  type AccountRef,
  type Actor,
  type ActorRole,
  type AppointmentListFilter,
  type AppointmentRef,
  type AttendanceSetStatusInput,
  type AuditLogPurge,
  type AuditLogQuery,
  type OperationResult,
  type PatientRef,
  type ReaccessDecisionInput,
  type ReaccessListQuery,
  type ReaccessSubmitInput,
  type ScheduleCreateInput,
  type ScheduleRescheduleInput,
} from '@clinic-attendance/shared';

import type {
  AppointmentRecord,
  AppointmentView,
  AuditLogPage,
  ReaccessRequestRecord,
  ReaccessRequestView,
} from '../data/types.js';
import type { UnitOfWork } from '../data/unit-of-work.js';
import { validationFailure } from '../data/validation.js';
import type { Logger } from '../server/logger.js';
import { ADMIN_ROLES, STAFF_ROLES, canViewPatient, hasRole } from './access-policy.js';
import { AttendanceTracker, type AttendanceUpdate } from './attendance-tracker.js';
import { StoreAuditSink, type AuditSink } from './audit-sink.js';
import { forbidden, notFound } from './failures.js';
import { guardOperation } from './operation.js';
import { ReaccessWorkflow, type PendingRequestStatus } from './reaccess-workflow.js';
import { Scheduler } from './scheduler.js';

const ALL_ROLES: readonly ActorRole[] = ['admin', 'doctor', 'nurse', 'patient'];
const DAY_MS = 24 * 60 * 60 * 1000;
const noInputSchema = z.undefined();

export interface AccountAccess {
  patientId: string;
  fullName: string;
  accountStatus: AccountStatus;
  restricted: boolean;
  missedCount: number;
}

export interface ClinicCoreDependencies {
  database: UnitOfWork;
  logger: Logger;
  audit?: AuditSink;
  clock?: () => Date;
}

interface OperationDefinition<Parsed> {
  name: string;
  roles: readonly ActorRole[];
  schema: z.ZodType<Parsed, z.ZodTypeDef, unknown>;
}

/**
 * Surface of the clinic core. Every operation checks the actor's role, validates its input
 * and resolves to an OperationResult; nothing is thrown to the caller.
 */
export class ClinicCore {
  readonly scheduler: Scheduler;
  readonly attendance: AttendanceTracker;
  readonly reaccess: ReaccessWorkflow;

  private readonly database: UnitOfWork;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(dependencies: ClinicCoreDependencies) {
    this.database = dependencies.database;
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? (() => new Date());

    const audit =
      dependencies.audit ??
      new StoreAuditSink(dependencies.database, dependencies.logger.child({ component: 'audit' }));

    this.scheduler = new Scheduler({
      database: this.database,
      audit,
      logger: this.logger.child({ component: 'scheduler' }),
    });
    this.attendance = new AttendanceTracker({
      database: this.database,
      audit,
      logger: this.logger.child({ component: 'attendance' }),
    });
    this.reaccess = new ReaccessWorkflow({
      database: this.database,
      audit,
      logger: this.logger.child({ component: 'reaccess' }),
      clock: this.clock,
    });
  }

  scheduleCreate(
    actor: Actor,
    input: ScheduleCreateInput,
  ): Promise<OperationResult<AppointmentRecord>> {
    const operation = { name: 'scheduleCreate', roles: STAFF_ROLES, schema: scheduleCreateInputSchema };
    return this.execute(operation, actor, input, (parsed) => this.scheduler.create(parsed, actor));
  }

  scheduleReschedule(
    actor: Actor,
    input: ScheduleRescheduleInput,
  ): Promise<OperationResult<AppointmentRecord>> {
    const operation = {
      name: 'scheduleReschedule',
      roles: STAFF_ROLES,
      schema: scheduleRescheduleInputSchema,
    };
    return this.execute(operation, actor, input, (parsed) => this.scheduler.reschedule(parsed, actor));
  }

  scheduleCancel(
    actor: Actor,
    input: AppointmentRef,
  ): Promise<OperationResult<AppointmentRecord>> {
    const operation = { name: 'scheduleCancel', roles: STAFF_ROLES, schema: appointmentRefSchema };
    return this.execute(operation, actor, input, (parsed) =>
      this.scheduler.cancel(parsed.appointmentId, actor),
    );
  }

  scheduleDelete(
    actor: Actor,
    input: AppointmentRef,
  ): Promise<OperationResult<{ id: string }>> {
    const operation = { name: 'scheduleDelete', roles: ADMIN_ROLES, schema: appointmentRefSchema };
    return this.execute(operation, actor, input, (parsed) =>
      this.scheduler.delete(parsed.appointmentId, actor),
    );
  }

  attendanceSetStatus(
    actor: Actor,
    input: AttendanceSetStatusInput,
  ): Promise<OperationResult<AttendanceUpdate>> {
    const operation = {
      name: 'attendanceSetStatus',
      roles: STAFF_ROLES,
      schema: attendanceSetStatusInputSchema,
    };
    return this.execute(operation, actor, input, (parsed) =>
      this.attendance.setStatus(parsed.appointmentId, parsed.status, actor),
    );
  }

  reaccessSubmit(
    actor: Actor,
    input: ReaccessSubmitInput,
  ): Promise<OperationResult<ReaccessRequestRecord>> {
    const operation = { name: 'reaccessSubmit', roles: ALL_ROLES, schema: reaccessSubmitInputSchema };
    return this.execute(operation, actor, input, (parsed) => this.reaccess.submit(parsed, actor));
  }

  reaccessApprove(
    actor: Actor,
    input: ReaccessDecisionInput,
  ): Promise<OperationResult<ReaccessRequestRecord>> {
    const operation = { name: 'reaccessApprove', roles: ADMIN_ROLES, schema: reaccessDecisionInputSchema };
    return this.execute(operation, actor, input, (parsed) => this.reaccess.approve(parsed, actor));
  }

  reaccessReject(
    actor: Actor,
    input: ReaccessDecisionInput,
  ): Promise<OperationResult<ReaccessRequestRecord>> {
    const operation = { name: 'reaccessReject', roles: ADMIN_ROLES, schema: reaccessDecisionInputSchema };
    return this.execute(operation, actor, input, (parsed) => this.reaccess.reject(parsed, actor));
  }

  reaccessCheckExisting(
    actor: Actor,
    input: PatientRef,
  ): Promise<OperationResult<PendingRequestStatus>> {
    const operation = { name: 'reaccessCheckExisting', roles: ALL_ROLES, schema: patientRefSchema };
    return this.execute(operation, actor, input, (parsed) =>
      this.reaccess.checkExisting(parsed.patientId, actor),
    );
  }

  listAppointments(
    actor: Actor,
    filter: AppointmentListFilter,
  ): Promise<OperationResult<AppointmentView[]>> {
    const operation = {
      name: 'listAppointments',
      roles: STAFF_ROLES,
      schema: appointmentListFilterSchema,
    };
    return this.execute(operation, actor, filter, ({ doctorAccountId, ...rest }) =>
      this.database.run(async (store): Promise<OperationResult<AppointmentView[]>> => {
        if (doctorAccountId === undefined) {
          return succeed(await store.appointments.list(rest));
        }

        const doctor = await store.doctors.resolveDoctor(doctorAccountId);
        if (doctor === null) {
          return fail(notFound('doctor', doctorAccountId));
        }

        return succeed(await store.appointments.list({ ...rest, doctorId: doctor.id }));
      }),
    );
  }

  /** Appointments of the patient bound to `accountId`, for that patient's own view. */
  listAccountAppointments(
    actor: Actor,
    input: AccountRef,
  ): Promise<OperationResult<AppointmentView[]>> {
    const operation = { name: 'listAccountAppointments', roles: ALL_ROLES, schema: accountRefSchema };
    return this.execute(operation, actor, input, ({ accountId }) =>
      this.database.run(async (store): Promise<OperationResult<AppointmentView[]>> => {
        const patient = await store.patients.findByAccountId(accountId);
        if (patient === null) {
          return fail(notFound('patient', accountId));
        }

        if (!canViewPatient(actor, patient)) {
          return fail(forbidden('view appointments of this patient'));
        }

        return succeed(await store.appointments.list({ patientId: patient.id }));
      }),
    );
  }

  checkAccountAccess(actor: Actor, input: PatientRef): Promise<OperationResult<AccountAccess>> {
    const operation = { name: 'checkAccountAccess', roles: ALL_ROLES, schema: patientRefSchema };
    return this.execute(operation, actor, input, ({ patientId }) =>
      this.database.run(async (store): Promise<OperationResult<AccountAccess>> => {
        const patient = await store.patients.findById(patientId);
        if (patient === null) {
          return fail(notFound('patient', patientId));
        }

        if (!canViewPatient(actor, patient)) {
          return fail(forbidden('view the account of this patient'));
        }

        return succeed({
          patientId: patient.id,
          fullName: patient.fullName,
          accountStatus: patient.accountStatus,
          restricted: patient.accountStatus === 'restricted',
          missedCount: patient.missedCount,
        });
      }),
    );
  }

  listReaccessRequests(
    actor: Actor,
    query: ReaccessListQuery,
  ): Promise<OperationResult<ReaccessRequestView[]>> {
    const operation = {
      name: 'listReaccessRequests',
      roles: ADMIN_ROLES,
      schema: reaccessListQuerySchema,
    };
    return this.execute(operation, actor, query, async ({ status }) => {
      const requests = await this.database.run((store) =>
        store.reaccessRequests.list({ pendingOnly: status === 'pending' }),
      );
      return succeed(requests);
    });
  }

  listAuditLogs(actor: Actor, query: AuditLogQuery): Promise<OperationResult<AuditLogPage>> {
    const operation = { name: 'listAuditLogs', roles: ADMIN_ROLES, schema: auditLogQuerySchema };
    return this.execute(operation, actor, query, async ({ actionType, limit, offset }) => {
      const page = await this.database.run((store) =>
        store.auditLog.list({
          limit,
          offset,
          ...(actionType === undefined ? {} : { actionType }),
        }),
      );
      return succeed(page);
    });
  }

  listAuditActionTypes(actor: Actor): Promise<OperationResult<string[]>> {
    const operation = { name: 'listAuditActionTypes', roles: ADMIN_ROLES, schema: noInputSchema };
    return this.execute(operation, actor, undefined, async () =>
      succeed(await this.database.run((store) => store.auditLog.listActionTypes())),
    );
  }

  purgeAuditLogs(
    actor: Actor,
    input: AuditLogPurge,
  ): Promise<OperationResult<{ removed: number }>> {
    const operation = { name: 'purgeAuditLogs', roles: ADMIN_ROLES, schema: auditLogPurgeSchema };
    return this.execute(operation, actor, input, async ({ olderThanDays }) => {
      const cutoff = new Date(this.clock().getTime() - olderThanDays * DAY_MS);
      const removed = await this.database.run((store) => store.auditLog.purgeOlderThan(cutoff));
      this.logger.info('audit log purged', { removed, olderThanDays, actorId: actor.id });
      return succeed({ removed });
    });
  }

  private execute<Parsed, T>(
    operation: OperationDefinition<Parsed>,
    actor: Actor,
    input: unknown,
    body: (parsed: Parsed) => Promise<OperationResult<T>>,
  ): Promise<OperationResult<T>> {
    return guardOperation(this.logger, operation.name, async () => {
      if (!hasRole(actor, operation.roles)) {
        return fail(forbidden(`perform ${operation.name} as ${actor.role}`));
      }

      const parsed = operation.schema.safeParse(input);
      if (!parsed.success) {
        return fail(validationFailure(parsed.error));
      }

      return body(parsed.data);
    });
  }
}
