import {
  applyCompletedAppointment,
  canTransitionAppointment,
  isRestrictionWarranted,
  statusAfterMiss,
  type AttendanceOutcome,
  type PatientAccountState,
} from '@clinic-attendance/attendance-policy';
import { fail, succeed, type Actor, type OperationResult } from '@clinic-attendance/shared';

import type { AppointmentRecord } from '../data/types.js';
import type { UnitOfWork } from '../data/unit-of-work.js';
import type { Logger } from '../server/logger.js';
import { actorFields, recordBestEffort, type AuditSink } from './audit-sink.js';
import { invalidTransition, notFound } from './failures.js';

export interface AttendanceUpdate {
  appointment: AppointmentRecord;
  account: PatientAccountState;
  restricted: boolean;
}

export interface AttendanceTrackerDependencies {
  database: UnitOfWork;
  audit: AuditSink;
  logger: Logger;
}

interface CommittedUpdate extends AttendanceUpdate {
  patientName: string;
}

export class AttendanceTracker {
  constructor(private readonly dependencies: AttendanceTrackerDependencies) {}

  /**
   * Records a visit outcome. The appointment status and the patient's account state are
   * written in one unit of work; audit events follow the commit.
   */
  async setStatus(
    appointmentId: string,
    status: AttendanceOutcome,
    actor: Actor,
  ): Promise<OperationResult<AttendanceUpdate>> {
    const result = await this.dependencies.database.run(
      async (store): Promise<OperationResult<CommittedUpdate>> => {
        const appointment = await store.appointments.findById(appointmentId);
        if (appointment === null) {
          return fail(notFound('appointment', appointmentId));
        }

        if (!canTransitionAppointment(appointment.status, status)) {
          return fail(invalidTransition('appointment', appointment.status, status));
        }

        const patient = await store.patients.findById(appointment.patientId);
        const current = await store.patients.getAccountState(appointment.patientId);
        if (patient === null || current === null) {
          return fail(notFound('patient', appointment.patientId));
        }

        const updated = await store.appointments.updateStatus(appointment.id, status);

        if (status === 'completed') {
          const account = applyCompletedAppointment(current);
          await store.patients.setAccountState(patient.id, account);
          return succeed({
            appointment: updated,
            account,
            restricted: false,
            patientName: patient.fullName,
          });
        }

        const missedCount = await store.patients.incrementMissedCount(patient.id);
        const restricted = isRestrictionWarranted(missedCount);
        if (restricted && current.status !== 'restricted') {
          await store.patients.setAccountState(patient.id, { status: 'restricted', missedCount });
        }

        return succeed({
          appointment: updated,
          account: { status: statusAfterMiss(current.status, missedCount), missedCount },
          restricted,
          patientName: patient.fullName,
        });
      },
    );

    if (!result.ok) {
      return result;
    }

    const { patientName, ...update } = result.value;
    if (status === 'missed') {
      await this.emitMissed(update, patientName, actor);
    }

    this.dependencies.logger.info('attendance recorded', {
      appointmentId,
      status,
      missedCount: update.account.missedCount,
      accountStatus: update.account.status,
    });

    return succeed(update);
  }

  private async emitMissed(update: AttendanceUpdate, patientName: string, actor: Actor): Promise<void> {
    if (update.restricted) {
      await recordBestEffort(
        this.dependencies.audit,
        {
          eventType: 'patient_restricted',
          description: `Patient account restricted due to 3+ missed appointments: ${patientName}`,
          ...actorFields(actor),
          targetType: 'patient',
          targetId: update.appointment.patientId,
        },
        this.dependencies.logger,
      );
    }

    await recordBestEffort(
      this.dependencies.audit,
      {
        eventType: 'appointment_missed',
        description: 'Appointment marked as missed',
        ...actorFields(actor),
        targetType: 'appointment',
        targetId: update.appointment.id,
      },
      this.dependencies.logger,
    );
  }
}
