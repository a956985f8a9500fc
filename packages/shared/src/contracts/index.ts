import { z } from 'zod';

export * from './results.js';

const idSchema = z.string().trim().min(1).max(64);
const instantSchema = z.string().datetime({ offset: true });

export const actorRoleSchema = z.enum(['admin', 'doctor', 'nurse', 'patient']);

export const actorSchema = z.object({
  id: idSchema,
  role: actorRoleSchema,
  name: z.string().min(1).max(150).optional(),
});

export const scheduleCreateInputSchema = z.object({
  doctorAccountId: idSchema,
  patientId: idSchema,
  scheduledAt: instantSchema,
  reason: z.string().max(2000).default(''),
});

export const scheduleRescheduleInputSchema = z.object({
  appointmentId: idSchema,
  scheduledAt: instantSchema,
  reason: z.string().max(2000).default(''),
});

export const appointmentRefSchema = z.object({
  appointmentId: idSchema,
});

export const attendanceSetStatusInputSchema = z.object({
  appointmentId: idSchema,
  status: z.enum(['completed', 'missed']),
});

export const appointmentListFilterSchema = z.object({
  doctorAccountId: idSchema.optional(),
  patientId: idSchema.optional(),
  status: z.enum(['scheduled', 'completed', 'missed', 'cancelled']).optional(),
});

export const reaccessSubmitInputSchema = z.object({
  patientId: idSchema,
  reason: z.string().trim().min(1).max(2000),
  contactPhone: z
    .string()
    .regex(/^\+?\d{6,20}$/, 'Phone must contain 6 to 20 digits')
    .optional(),
});

export const reaccessDecisionInputSchema = z.object({
  requestId: idSchema,
  responseText: z.string().trim().min(1).max(2000).optional(),
});

export const patientRefSchema = z.object({
  patientId: idSchema,
});

export const accountRefSchema = z.object({
  accountId: idSchema,
});

export const reaccessListQuerySchema = z.object({
  status: z.enum(['pending', 'all']).default('pending'),
});

export const auditLogQuerySchema = z.object({
  actionType: z.string().min(1).max(50).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export const auditLogPurgeSchema = z.object({
  olderThanDays: z.coerce.number().int().min(1).default(30),
});

export type ActorRole = z.infer<typeof actorRoleSchema>;
export type Actor = z.infer<typeof actorSchema>;
export type ScheduleCreateInput = z.input<typeof scheduleCreateInputSchema>;
export type ScheduleRescheduleInput = z.input<typeof scheduleRescheduleInputSchema>;
export type AppointmentRef = z.infer<typeof appointmentRefSchema>;
export type AttendanceSetStatusInput = z.infer<typeof attendanceSetStatusInputSchema>;
export type AppointmentListFilter = z.infer<typeof appointmentListFilterSchema>;
export type ReaccessSubmitInput = z.infer<typeof reaccessSubmitInputSchema>;
export type ReaccessDecisionInput = z.infer<typeof reaccessDecisionInputSchema>;
export type PatientRef = z.infer<typeof patientRefSchema>;
export type AccountRef = z.infer<typeof accountRefSchema>;
export type ReaccessListQuery = z.input<typeof reaccessListQuerySchema>;
export type AuditLogQuery = z.input<typeof auditLogQuerySchema>;
export type AuditLogPurge = z.input<typeof auditLogPurgeSchema>;
