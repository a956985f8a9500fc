import { describe, expect, it } from 'vitest';

import { minutesBetween } from '@clinic-attendance/attendance-policy';

import {
  ADMIN,
  DOCTOR_ACCOUNT,
  MAYA,
  NURSE,
  OTHER_DOCTOR_ACCOUNT,
  bookAppointment,
  createClinicFixture,
  failureOf,
  unwrap,
} from '../support/clinic-fixture.js';

describe('Scheduler', () => {
  it('rejects a booking 10 minutes after an existing one and accepts one 20 minutes after', async () => {
    const { core } = await createClinicFixture();
    await bookAppointment(core, '2026-02-04T10:00:00Z');

    const tooClose = await core.scheduleCreate(NURSE, {
      doctorAccountId: DOCTOR_ACCOUNT,
      patientId: 'patient-2',
      scheduledAt: '2026-02-04T10:10:00Z',
    });
    expect(failureOf(tooClose)).toMatchObject({
      kind: 'SchedulingConflict',
      conflictingAt: '2026-02-04T10:00:00.000Z',
      counterpartName: 'Maya Lin',
      message: 'Time conflict: You already have an appointment with Maya Lin at Feb 04, 2026 10:00',
    });

    const spaced = unwrap(
      await core.scheduleCreate(NURSE, {
        doctorAccountId: DOCTOR_ACCOUNT,
        patientId: 'patient-2',
        scheduledAt: '2026-02-04T10:20:00Z',
      }),
    );
    expect(spaced.status).toBe('scheduled');
    expect(spaced.doctorId).toBe('doctor-1');
    expect(spaced.reason).toBe('');
  });

  it('blocks collisions on both sides and allows exactly 15 minutes of spacing', async () => {
    const { core } = await createClinicFixture();
    await bookAppointment(core, '2026-02-04T10:00:00Z');

    const earlier = await core.scheduleCreate(NURSE, {
      doctorAccountId: DOCTOR_ACCOUNT,
      patientId: 'patient-2',
      scheduledAt: '2026-02-04T09:50:00Z',
    });
    expect(failureOf(earlier).kind).toBe('SchedulingConflict');

    await bookAppointment(core, '2026-02-04T09:45:00Z', 'patient-2');
    await bookAppointment(core, '2026-02-04T10:15:00Z', 'patient-2');
  });

  it('compares instants given with different offsets', async () => {
    const { core } = await createClinicFixture();
    await bookAppointment(core, '2026-02-04T10:00:00Z');

    const sameInstant = await core.scheduleCreate(NURSE, {
      doctorAccountId: DOCTOR_ACCOUNT,
      patientId: 'patient-2',
      scheduledAt: '2026-02-04T12:05:00+02:00',
    });
    expect(failureOf(sameInstant).kind).toBe('SchedulingConflict');
  });

  it('keeps schedules of different doctors independent', async () => {
    const { core } = await createClinicFixture();
    await bookAppointment(core, '2026-02-04T10:00:00Z');

    const other = await bookAppointment(core, '2026-02-04T10:00:00Z', 'patient-2', OTHER_DOCTOR_ACCOUNT);
    expect(other.doctorId).toBe('doctor-2');
  });

  it('fails with NotFound for an unknown doctor or patient', async () => {
    const { core } = await createClinicFixture();

    const unknownDoctor = await core.scheduleCreate(NURSE, {
      doctorAccountId: 'nobody',
      patientId: 'patient-1',
      scheduledAt: '2026-02-04T10:00:00Z',
    });
    expect(failureOf(unknownDoctor)).toMatchObject({ kind: 'NotFound', entity: 'doctor', id: 'nobody' });

    const unknownPatient = await core.scheduleCreate(NURSE, {
      doctorAccountId: DOCTOR_ACCOUNT,
      patientId: 'patient-404',
      scheduledAt: '2026-02-04T10:00:00Z',
    });
    expect(failureOf(unknownPatient)).toMatchObject({
      kind: 'NotFound',
      entity: 'patient',
      message: 'Patient not found: patient-404',
    });
  });

  it('refuses to book a restricted patient and creates no appointment', async () => {
    const { core } = await createClinicFixture({
      patients: { 'patient-1': { accountStatus: 'restricted', missedCount: 3 } },
    });

    const result = await core.scheduleCreate(NURSE, {
      doctorAccountId: DOCTOR_ACCOUNT,
      patientId: 'patient-1',
      scheduledAt: '2026-02-04T10:00:00Z',
    });

    expect(failureOf(result)).toMatchObject({ kind: 'PatientRestricted', patientId: 'patient-1' });
    expect(unwrap(await core.listAppointments(NURSE, {}))).toEqual([]);
  });

  it('records an appointment_created audit entry after booking', async () => {
    const { core } = await createClinicFixture();
    const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

    const page = unwrap(await core.listAuditLogs(ADMIN, { actionType: 'appointment_created' }));
    expect(page.total).toBe(1);
    expect(page.entries[0]).toMatchObject({
      actionType: 'appointment_created',
      description: 'New appointment scheduled for Feb 04, 2026 10:00',
      actorId: 'nurse-account',
      actorName: 'Nurse Ada',
      actorRole: 'nurse',
      targetType: 'appointment',
      targetId: appointment.id,
    });
  });

  it('reports a committed booking even when the audit sink rejects', async () => {
    const { core, logLines } = await createClinicFixture({
      audit: {
        record: async () => {
          throw new Error('sink down');
        },
      },
    });

    const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

    expect(appointment.status).toBe('scheduled');
    expect(logLines.filter((line) => line.message === 'audit event dropped')).toEqual([
      expect.objectContaining({
        level: 'warn',
        component: 'scheduler',
        eventType: 'appointment_created',
        targetId: appointment.id,
        error: 'sink down',
      }),
    ]);
    expect(
      unwrap(await core.listAppointments(NURSE, { doctorAccountId: DOCTOR_ACCOUNT })),
    ).toHaveLength(1);
  });

  it('lets only one of two concurrent overlapping bookings commit', async () => {
    const { core } = await createClinicFixture();

    const results = await Promise.all([
      core.scheduleCreate(NURSE, {
        doctorAccountId: DOCTOR_ACCOUNT,
        patientId: 'patient-1',
        scheduledAt: '2026-02-04T10:00:00Z',
      }),
      core.scheduleCreate(NURSE, {
        doctorAccountId: DOCTOR_ACCOUNT,
        patientId: 'patient-2',
        scheduledAt: '2026-02-04T10:05:00Z',
      }),
    ]);

    expect(results.filter((result) => result.ok)).toHaveLength(1);
    expect(results.map((result) => (result.ok ? 'ok' : result.failure.kind))).toContain(
      'SchedulingConflict',
    );
    expect(unwrap(await core.listAppointments(NURSE, { doctorAccountId: DOCTOR_ACCOUNT }))).toHaveLength(1);
  });

  it('never leaves two scheduled appointments of a doctor closer than 15 minutes', async () => {
    const { core } = await createClinicFixture();
    const offsets = [0, 7, 14, 15, 29, 30, 44, 46, 60, 61, 75, 90, 5, 20, 104, 118];
    const base = Date.parse('2026-02-04T08:00:00Z');
    const at = (minutes: number) => new Date(base + minutes * 60_000).toISOString();

    const booked: string[] = [];
    for (const [index, offset] of offsets.entries()) {
      const result = await core.scheduleCreate(NURSE, {
        doctorAccountId: DOCTOR_ACCOUNT,
        patientId: index % 2 === 0 ? 'patient-1' : 'patient-2',
        scheduledAt: at(offset),
      });
      if (result.ok) {
        booked.push(result.value.id);
      }
    }

    for (const [index, id] of booked.entries()) {
      await core.scheduleReschedule(NURSE, { appointmentId: id, scheduledAt: at(index * 9 + 3) });
    }

    const scheduled = unwrap(
      await core.listAppointments(NURSE, { doctorAccountId: DOCTOR_ACCOUNT, status: 'scheduled' }),
    );
    expect(scheduled.length).toBeGreaterThan(1);
    for (const left of scheduled) {
      for (const right of scheduled) {
        if (left.id !== right.id) {
          expect(minutesBetween(left.scheduledAt, right.scheduledAt)).toBeGreaterThanOrEqual(15);
        }
      }
    }
  });

  describe('reschedule', () => {
    it('never conflicts with the appointment being moved', async () => {
      const { core } = await createClinicFixture();
      const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

      const sameTime = unwrap(
        await core.scheduleReschedule(NURSE, {
          appointmentId: appointment.id,
          scheduledAt: '2026-02-04T10:00:00Z',
          reason: 'Follow-up',
        }),
      );
      expect(sameTime.scheduledAt).toBe('2026-02-04T10:00:00.000Z');
      expect(sameTime.reason).toBe('Follow-up');

      const nudged = unwrap(
        await core.scheduleReschedule(NURSE, {
          appointmentId: appointment.id,
          scheduledAt: '2026-02-04T10:05:00Z',
        }),
      );
      expect(nudged).toMatchObject({
        id: appointment.id,
        scheduledAt: '2026-02-04T10:05:00.000Z',
        status: 'scheduled',
        patientId: 'patient-1',
        doctorId: 'doctor-1',
      });
    });

    it('reports a conflict with another appointment of the same doctor', async () => {
      const { core } = await createClinicFixture();
      const first = await bookAppointment(core, '2026-02-04T10:00:00Z');
      const second = await bookAppointment(core, '2026-02-04T10:30:00Z', 'patient-2');

      const result = await core.scheduleReschedule(NURSE, {
        appointmentId: first.id,
        scheduledAt: '2026-02-04T10:20:00Z',
      });

      expect(failureOf(result)).toMatchObject({
        kind: 'SchedulingConflict',
        conflictingAppointmentId: second.id,
        counterpartName: 'Omar Haddad',
        message: 'Time conflict: You already have an appointment with Omar Haddad at Feb 04, 2026 10:30',
      });
    });

    it('refuses to move an appointment that is no longer scheduled', async () => {
      const { core } = await createClinicFixture();
      const cancelled = await bookAppointment(core, '2026-02-04T10:00:00Z');
      unwrap(await core.scheduleCancel(NURSE, { appointmentId: cancelled.id }));
      await bookAppointment(core, '2026-02-04T11:00:00Z', 'patient-2');

      const result = await core.scheduleReschedule(NURSE, {
        appointmentId: cancelled.id,
        scheduledAt: '2026-02-04T11:05:00Z',
      });

      expect(failureOf(result)).toMatchObject({
        kind: 'InvalidTransition',
        from: 'cancelled',
        to: 'scheduled',
        message: 'Cannot move appointment from cancelled to scheduled',
      });
      const appointments = unwrap(
        await core.listAppointments(NURSE, { doctorAccountId: DOCTOR_ACCOUNT }),
      );
      expect(appointments.find((entry) => entry.id === cancelled.id)?.scheduledAt).toBe(
        '2026-02-04T10:00:00.000Z',
      );
    });

    it('fails with NotFound for an unknown appointment', async () => {
      const { core } = await createClinicFixture();

      const result = await core.scheduleReschedule(NURSE, {
        appointmentId: 'missing',
        scheduledAt: '2026-02-04T10:00:00Z',
      });

      expect(failureOf(result)).toMatchObject({ kind: 'NotFound', entity: 'appointment' });
    });
  });

  describe('cancel', () => {
    it('frees the slot and is a no-op when repeated', async () => {
      const { core } = await createClinicFixture();
      const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

      const cancelled = unwrap(await core.scheduleCancel(NURSE, { appointmentId: appointment.id }));
      expect(cancelled.status).toBe('cancelled');

      const again = unwrap(await core.scheduleCancel(NURSE, { appointmentId: appointment.id }));
      expect(again.status).toBe('cancelled');

      const rebooked = await bookAppointment(core, '2026-02-04T10:00:00Z', 'patient-2');
      expect(rebooked.status).toBe('scheduled');
    });

    it('does not touch the attendance counter', async () => {
      const { core } = await createClinicFixture({ patients: { 'patient-1': { missedCount: 2 } } });
      const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

      unwrap(await core.scheduleCancel(NURSE, { appointmentId: appointment.id }));

      const access = unwrap(await core.checkAccountAccess(NURSE, { patientId: 'patient-1' }));
      expect(access).toMatchObject({ missedCount: 2, restricted: false });
    });

    it('refuses to cancel an appointment that already has an outcome', async () => {
      const { core } = await createClinicFixture();
      const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');
      unwrap(await core.attendanceSetStatus(NURSE, { appointmentId: appointment.id, status: 'missed' }));

      const result = await core.scheduleCancel(NURSE, { appointmentId: appointment.id });

      expect(failureOf(result)).toMatchObject({
        kind: 'InvalidTransition',
        from: 'missed',
        to: 'cancelled',
      });
    });
  });

  describe('delete', () => {
    it('is reserved to administrators', async () => {
      const { core } = await createClinicFixture();
      const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

      const byNurse = await core.scheduleDelete(NURSE, { appointmentId: appointment.id });
      expect(failureOf(byNurse)).toMatchObject({
        kind: 'Forbidden',
        message: 'Not allowed to perform scheduleDelete as nurse',
      });

      expect(unwrap(await core.scheduleDelete(ADMIN, { appointmentId: appointment.id }))).toEqual({
        id: appointment.id,
      });
      expect(unwrap(await core.listAppointments(ADMIN, {}))).toEqual([]);
    });

    it('fails with NotFound when nothing was removed', async () => {
      const { core } = await createClinicFixture();

      const result = await core.scheduleDelete(ADMIN, { appointmentId: 'missing' });

      expect(failureOf(result)).toMatchObject({ kind: 'NotFound', entity: 'appointment', id: 'missing' });
    });

    it('writes a log line instead of an audit entry', async () => {
      const { core, logLines } = await createClinicFixture();
      const appointment = await bookAppointment(core, '2026-02-04T10:00:00Z');

      unwrap(await core.scheduleDelete(ADMIN, { appointmentId: appointment.id }));

      expect(logLines).toContainEqual(
        expect.objectContaining({
          level: 'info',
          message: 'appointment deleted',
          component: 'scheduler',
          appointmentId: appointment.id,
          actorId: 'admin-account',
        }),
      );
      const types = unwrap(await core.listAuditActionTypes(ADMIN));
      expect(types).toEqual(['appointment_created']);
    });
  });

  it('rejects callers without a staff role and malformed input', async () => {
    const { core } = await createClinicFixture();

    const byPatient = await core.scheduleCreate(MAYA, {
      doctorAccountId: DOCTOR_ACCOUNT,
      patientId: 'patient-1',
      scheduledAt: '2026-02-04T10:00:00Z',
    });
    expect(failureOf(byPatient).kind).toBe('Forbidden');

    const malformed = await core.scheduleCreate(NURSE, {
      doctorAccountId: DOCTOR_ACCOUNT,
      patientId: 'patient-1',
      scheduledAt: 'next tuesday',
    });
    const failure = failureOf(malformed);
    expect(failure.kind).toBe('ValidationError');
    expect(failure.kind === 'ValidationError' ? Object.keys(failure.fields) : []).toEqual(['scheduledAt']);
  });
});
