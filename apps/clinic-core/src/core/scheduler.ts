import {
  MIN_VISIT_SPACING_MINUTES,
  canTransitionAppointment,
  formatSlotTime,
  isTerminalAppointmentStatus,
} from '@clinic-attendance/attendance-policy';
import { fail, succeed, type Actor, type OperationResult } from '@clinic-attendance/shared';

import type { AppointmentRecord } from '../data/types.js';
import type { UnitOfWork } from '../data/unit-of-work.js';
import type { Logger } from '../server/logger.js';
import { actorFields, recordBestEffort, type AuditSink } from './audit-sink.js';
import {
  invalidTransition,
  notFound,
  patientRestricted,
  schedulingConflict,
} from './failures.js';
import { runWithConstraintRetry } from './operation.js';

export interface CreateAppointmentCommand {
  doctorAccountId: string;
  patientId: string;
  scheduledAt: string;
  reason: string;
}

export interface RescheduleAppointmentCommand {
  appointmentId: string;
  scheduledAt: string;
  reason: string;
}

export interface SchedulerDependencies {
  database: UnitOfWork;
  audit: AuditSink;
  logger: Logger;
}

export function toUtcInstant(value: string): string {
  return new Date(value).toISOString();
}

/**
 * Books, moves, cancels and removes appointments. Every check-then-write pair runs in one
 * unit of work holding the doctor's schedule lock, so two bookings closer than
 * MIN_VISIT_SPACING_MINUTES never both commit.
 */
export class Scheduler {
  constructor(private readonly dependencies: SchedulerDependencies) {}

  async create(
    command: CreateAppointmentCommand,
    actor: Actor,
  ): Promise<OperationResult<AppointmentRecord>> {
    const scheduledAt = toUtcInstant(command.scheduledAt);

    const result = await runWithConstraintRetry(
      this.dependencies.database,
      'appointment_slot',
      async (store): Promise<OperationResult<AppointmentRecord>> => {
        const doctor = await store.doctors.resolveDoctor(command.doctorAccountId);
        if (doctor === null) {
          return fail(notFound('doctor', command.doctorAccountId));
        }

        const patient = await store.patients.findById(command.patientId);
        if (patient === null) {
          return fail(notFound('patient', command.patientId));
        }

        if (patient.accountStatus === 'restricted') {
          return fail(patientRestricted(patient.id));
        }

        await store.appointments.lockDoctorSchedule(doctor.id);
        const conflict = await store.appointments.findScheduledConflict(
          doctor.id,
          scheduledAt,
          MIN_VISIT_SPACING_MINUTES,
        );
        if (conflict !== null) {
          return fail(schedulingConflict(conflict));
        }

        const appointment = await store.appointments.insert({
          doctorId: doctor.id,
          patientId: patient.id,
          scheduledAt,
          reason: command.reason,
        });
        return succeed(appointment);
      },
    );

    if (result.ok) {
      await recordBestEffort(
        this.dependencies.audit,
        {
          eventType: 'appointment_created',
          description: `New appointment scheduled for ${formatSlotTime(result.value.scheduledAt)}`,
          ...actorFields(actor),
          targetType: 'appointment',
          targetId: result.value.id,
        },
        this.dependencies.logger,
      );
    }

    return result;
  }

  async reschedule(
    command: RescheduleAppointmentCommand,
    actor: Actor,
  ): Promise<OperationResult<AppointmentRecord>> {
    const scheduledAt = toUtcInstant(command.scheduledAt);

    const result = await runWithConstraintRetry(
      this.dependencies.database,
      'appointment_slot',
      async (store): Promise<OperationResult<AppointmentRecord>> => {
        const current = await store.appointments.findById(command.appointmentId);
        if (current === null) {
          return fail(notFound('appointment', command.appointmentId));
        }

        if (isTerminalAppointmentStatus(current.status)) {
          return fail(invalidTransition('appointment', current.status, 'scheduled'));
        }

        await store.appointments.lockDoctorSchedule(current.doctorId);
        const conflict = await store.appointments.findScheduledConflict(
          current.doctorId,
          scheduledAt,
          MIN_VISIT_SPACING_MINUTES,
          current.id,
        );
        if (conflict !== null) {
          return fail(schedulingConflict(conflict));
        }

        return succeed(
          await store.appointments.updateSchedule(current.id, scheduledAt, command.reason),
        );
      },
    );

    if (result.ok) {
      this.dependencies.logger.info('appointment rescheduled', {
        appointmentId: result.value.id,
        scheduledAt: result.value.scheduledAt,
        actorId: actor.id,
      });
    }

    return result;
  }

  async cancel(appointmentId: string, actor: Actor): Promise<OperationResult<AppointmentRecord>> {
    const result = await this.dependencies.database.run(
      async (store): Promise<OperationResult<AppointmentRecord>> => {
        const current = await store.appointments.findById(appointmentId);
        if (current === null) {
          return fail(notFound('appointment', appointmentId));
        }

        if (current.status === 'cancelled') {
          return succeed(current);
        }

        if (!canTransitionAppointment(current.status, 'cancelled')) {
          return fail(invalidTransition('appointment', current.status, 'cancelled'));
        }

        return succeed(await store.appointments.updateStatus(current.id, 'cancelled'));
      },
    );

    if (result.ok) {
      this.dependencies.logger.info('appointment cancelled', {
        appointmentId,
        actorId: actor.id,
      });
    }

    return result;
  }

  async delete(appointmentId: string, actor: Actor): Promise<OperationResult<{ id: string }>> {
    const removed = await this.dependencies.database.run((store) =>
      store.appointments.delete(appointmentId),
    );
    if (!removed) {
      return fail(notFound('appointment', appointmentId));
    }

    this.dependencies.logger.info('appointment deleted', { appointmentId, actorId: actor.id });
    return succeed({ id: appointmentId });
  }
}
