import { describe, expect, it } from 'vitest';

import type { AppointmentRecord } from '../../data/types.js';
import type { PatientDirectory } from '../../data/unit-of-work.js';
import {
  ADMIN,
  DecoratedDatabase,
  MAYA,
  NURSE,
  bookAppointment,
  createClinicFixture,
  failureOf,
  unwrap,
} from '../support/clinic-fixture.js';

function failingMissCounter(patients: PatientDirectory): PatientDirectory {
  return {
    findById: (id) => patients.findById(id),
    findByAccountId: (accountId) => patients.findByAccountId(accountId),
    getAccountState: (id) => patients.getAccountState(id),
    setAccountState: (id, state) => patients.setAccountState(id, state),
    incrementMissedCount: async () => {
      throw new Error('disk full');
    },
  };
}

describe('AttendanceTracker', () => {
  it('restricts the patient on the third consecutive miss', async () => {
    const { core } = await createClinicFixture({ patients: { 'patient-1': { missedCount: 2 } } });
    const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

    const update = unwrap(
      await core.attendanceSetStatus(NURSE, { appointmentId: appointment.id, status: 'missed' }),
    );

    expect(update.restricted).toBe(true);
    expect(update.account).toEqual({ status: 'restricted', missedCount: 3 });
    expect(update.appointment.status).toBe('missed');

    const page = unwrap(await core.listAuditLogs(ADMIN, {}));
    expect(page.entries.map((entry) => entry.actionType)).toEqual([
      'appointment_missed',
      'patient_restricted',
      'appointment_created',
    ]);
    expect(page.entries[1]).toMatchObject({
      description: 'Patient account restricted due to 3+ missed appointments: Maya Lin',
      targetType: 'patient',
      targetId: 'patient-1',
    });
    expect(page.entries[0]).toMatchObject({
      description: 'Appointment marked as missed',
      targetType: 'appointment',
      targetId: appointment.id,
    });

    const rebook = await core.scheduleCreate(NURSE, {
      doctorAccountId: 'doctor-account-1',
      patientId: 'patient-1',
      scheduledAt: '2026-02-05T10:00:00Z',
    });
    expect(failureOf(rebook).kind).toBe('PatientRestricted');
  });

  it('counts consecutive misses and resets on a completed visit', async () => {
    const { core } = await createClinicFixture();
    const slots = ['10:00', '11:00', '12:00', '13:00'];
    const appointments: AppointmentRecord[] = [];
    for (const slot of slots) {
      appointments.push(await bookAppointment(core, `2026-02-04T${slot}:00Z`));
    }

    const outcomes = ['missed', 'missed', 'completed', 'missed'] as const;
    const counts: number[] = [];
    for (const [index, status] of outcomes.entries()) {
      const appointment = appointments[index];
      if (appointment === undefined) {
        throw new Error(`No appointment booked for outcome ${index}`);
      }

      const update = unwrap(
        await core.attendanceSetStatus(NURSE, { appointmentId: appointment.id, status }),
      );
      counts.push(update.account.missedCount);
    }

    expect(counts).toEqual([1, 2, 0, 1]);
    const access = unwrap(await core.checkAccountAccess(NURSE, { patientId: 'patient-1' }));
    expect(access).toEqual({
      patientId: 'patient-1',
      fullName: 'Maya Lin',
      accountStatus: 'active',
      restricted: false,
      missedCount: 1,
    });
  });

  it('keeps an existing restriction when a later visit is completed', async () => {
    const { core } = await createClinicFixture({ patients: { 'patient-1': { missedCount: 2 } } });
    const missed = await bookAppointment(core, '2026-02-04T10:00:00Z');
    const attended = await bookAppointment(core, '2026-02-04T11:00:00Z');

    unwrap(await core.attendanceSetStatus(NURSE, { appointmentId: missed.id, status: 'missed' }));
    const update = unwrap(
      await core.attendanceSetStatus(NURSE, { appointmentId: attended.id, status: 'completed' }),
    );

    expect(update.account).toEqual({ status: 'restricted', missedCount: 0 });
    expect(update.restricted).toBe(false);
    const access = unwrap(await core.checkAccountAccess(MAYA, { patientId: 'patient-1' }));
    expect(access.restricted).toBe(true);
  });

  it('restricts from any count at or above the threshold', async () => {
    const { core } = await createClinicFixture({ patients: { 'patient-1': { missedCount: 5 } } });
    const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

    const update = unwrap(
      await core.attendanceSetStatus(NURSE, { appointmentId: appointment.id, status: 'missed' }),
    );

    expect(update.account).toEqual({ status: 'restricted', missedCount: 6 });
  });

  it('emits patient_restricted on every miss once the threshold is reached', async () => {
    const { core } = await createClinicFixture({ patients: { 'patient-1': { missedCount: 2 } } });
    const booked = [
      await bookAppointment(core, '2026-02-04T10:00:00Z'),
      await bookAppointment(core, '2026-02-04T11:00:00Z'),
      await bookAppointment(core, '2026-02-04T12:00:00Z'),
    ];

    for (const appointment of booked) {
      unwrap(await core.attendanceSetStatus(NURSE, { appointmentId: appointment.id, status: 'missed' }));
    }

    const restrictedEvents = unwrap(
      await core.listAuditLogs(ADMIN, { actionType: 'patient_restricted' }),
    );
    expect(restrictedEvents.total).toBe(3);
    const access = unwrap(await core.checkAccountAccess(NURSE, { patientId: 'patient-1' }));
    expect(access).toMatchObject({ accountStatus: 'restricted', missedCount: 5 });
  });

  it('refuses to change an appointment that already has an outcome', async () => {
    const { core } = await createClinicFixture();
    const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');
    unwrap(await core.attendanceSetStatus(NURSE, { appointmentId: appointment.id, status: 'completed' }));

    const result = await core.attendanceSetStatus(NURSE, {
      appointmentId: appointment.id,
      status: 'missed',
    });

    expect(failureOf(result)).toMatchObject({
      kind: 'InvalidTransition',
      from: 'completed',
      to: 'missed',
      message: 'Cannot move appointment from completed to missed',
    });
    const access = unwrap(await core.checkAccountAccess(NURSE, { patientId: 'patient-1' }));
    expect(access.missedCount).toBe(0);
  });

  it('fails with NotFound for an unknown appointment and Forbidden for patients', async () => {
    const { core } = await createClinicFixture();

    const missing = await core.attendanceSetStatus(NURSE, { appointmentId: 'missing', status: 'missed' });
    expect(failureOf(missing)).toMatchObject({ kind: 'NotFound', entity: 'appointment', id: 'missing' });

    const byPatient = await core.attendanceSetStatus(MAYA, { appointmentId: 'missing', status: 'missed' });
    expect(failureOf(byPatient).kind).toBe('Forbidden');
  });

  it('rolls back the status change when the counter update fails', async () => {
    let failCounter = false;
    const { core, logLines } = await createClinicFixture({
      wrapDatabase: (database) =>
        new DecoratedDatabase(database, (store) =>
          failCounter ? { ...store, patients: failingMissCounter(store.patients) } : store,
        ),
    });
    const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');
    failCounter = true;

    const result = await core.attendanceSetStatus(NURSE, {
      appointmentId: appointment.id,
      status: 'missed',
    });

    expect(failureOf(result)).toEqual({
      kind: 'PersistenceFailure',
      message: 'The operation could not be completed. Please retry.',
    });
    expect(logLines).toContainEqual(
      expect.objectContaining({
        level: 'error',
        message: 'operation failed',
        operation: 'attendanceSetStatus',
        error: 'disk full',
      }),
    );

    failCounter = false;
    const [stored] = unwrap(await core.listAppointments(NURSE, {}));
    expect(stored?.status).toBe('scheduled');
    const access = unwrap(await core.checkAccountAccess(NURSE, { patientId: 'patient-1' }));
    expect(access.missedCount).toBe(0);
    const missedEvents = unwrap(
      await core.listAuditLogs(ADMIN, { actionType: 'appointment_missed' }),
    );
    expect(missedEvents.total).toBe(0);
  });

  it('keeps the committed change when audit events cannot be written', async () => {
    const { core, logLines } = await createClinicFixture({
      patients: { 'patient-1': { missedCount: 2 } },
      wrapDatabase: (database) =>
        new DecoratedDatabase(database, (store) => ({
          ...store,
          auditLog: {
            append: async () => {
              throw new Error('audit store offline');
            },
            list: (options) => store.auditLog.list(options),
            listActionTypes: () => store.auditLog.listActionTypes(),
            purgeOlderThan: (cutoff) => store.auditLog.purgeOlderThan(cutoff),
          },
        })),
    });
    const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

    const update = unwrap(
      await core.attendanceSetStatus(NURSE, { appointmentId: appointment.id, status: 'missed' }),
    );

    expect(update.account).toEqual({ status: 'restricted', missedCount: 3 });
    const dropped = logLines.filter((line) => line.message === 'audit event dropped');
    expect(dropped.map((line) => line['eventType'])).toEqual([
      'appointment_created',
      'patient_restricted',
      'appointment_missed',
    ]);
    expect(dropped[1]).toMatchObject({
      level: 'warn',
      component: 'audit',
      targetId: 'patient-1',
      error: 'audit store offline',
    });
    const access = unwrap(await core.checkAccountAccess(NURSE, { patientId: 'patient-1' }));
    expect(access.restricted).toBe(true);
  });

  it('reports a committed miss even when the audit sink rejects', async () => {
    const { core, logLines } = await createClinicFixture({
      patients: { 'patient-1': { missedCount: 2 } },
      audit: {
        record: async () => {
          throw new Error('sink down');
        },
      },
    });
    const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

    const update = unwrap(
      await core.attendanceSetStatus(NURSE, { appointmentId: appointment.id, status: 'missed' }),
    );

    expect(update.account).toEqual({ status: 'restricted', missedCount: 3 });
    const dropped = logLines.filter(
      (line) => line.message === 'audit event dropped' && line['component'] === 'attendance',
    );
    expect(dropped.map((line) => line['eventType'])).toEqual([
      'patient_restricted',
      'appointment_missed',
    ]);
    expect(dropped[1]).toMatchObject({ level: 'warn', targetId: appointment.id, error: 'sink down' });
  });
});
