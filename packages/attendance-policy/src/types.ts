export type AppointmentStatus = 'scheduled' | 'completed' | 'missed' | 'cancelled';

export type AttendanceOutcome = Extract<AppointmentStatus, 'completed' | 'missed'>;

export type AccountStatus = 'active' | 'restricted';

export type ReaccessStatus = 'pending' | 'approved' | 'rejected';

export type ReaccessDecision = Exclude<ReaccessStatus, 'pending'>;

export interface PatientAccountState {
  status: AccountStatus;
  missedCount: number;
}

export const AUDIT_EVENT_TYPES = [
  'appointment_created',
  'appointment_missed',
  'patient_restricted',
  'reaccess_submitted',
  'reaccess_approved',
  'reaccess_rejected',
] as const;

export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number];

export interface ScheduledSlot {
  id: string;
  scheduledAt: string;
}
