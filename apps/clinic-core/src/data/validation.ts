import { z } from 'zod';

import type { AccountStatus, AppointmentStatus, ReaccessStatus } from '@clinic-attendance/attendance-policy';
import { actorRoleSchema, type ActorRole, type ValidationFailure } from '@clinic-attendance/shared';

import type { AuditLogRecord } from './types.js';

const appointmentStatusSchema = z.enum(['scheduled', 'completed', 'missed', 'cancelled']);
const accountStatusSchema = z.enum(['active', 'restricted']);
const reaccessStatusSchema = z.enum(['pending', 'approved', 'rejected']);
const targetTypeSchema = z.enum(['appointment', 'patient', 'reaccess_request']);

function parseColumn<T>(schema: z.ZodType<T>, column: string, value: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Unexpected ${column} value in storage: ${value}`);
  }

  return parsed.data;
}

export function parseAppointmentStatus(value: string): AppointmentStatus {
  return parseColumn(appointmentStatusSchema, 'appointment status', value);
}

export function parseAccountStatus(value: string): AccountStatus {
  return parseColumn(accountStatusSchema, 'account status', value);
}

export function parseReaccessStatus(value: string): ReaccessStatus {
  return parseColumn(reaccessStatusSchema, 're-access status', value);
}

export function parseActorRole(value: string): ActorRole {
  return parseColumn(actorRoleSchema, 'actor role', value);
}

export function parseTargetType(value: string): NonNullable<AuditLogRecord['targetType']> {
  return parseColumn(targetTypeSchema, 'target type', value);
}

export function validationFailure(error: z.ZodError): ValidationFailure {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.') || 'input';
    fields[path] ??= issue.message;
  }

  return { kind: 'ValidationError', message: 'Invalid input', fields };
}
