import type {
  AccountStatus,
  AppointmentStatus,
  PatientAccountState,
  ReaccessStatus,
} from '@clinic-attendance/attendance-policy';
import type { ActorRole, AppointmentListFilter } from '@clinic-attendance/shared';

export interface AppointmentRecord {
  id: string;
  patientId: string;
  doctorId: string;
  scheduledAt: string;
  reason: string;
  status: AppointmentStatus;
  createdAt: string;
}

export interface AppointmentView extends AppointmentRecord {
  patientName: string | null;
  patientPhone: string | null;
  patientAccountStatus: AccountStatus | null;
  doctorName: string | null;
}

export interface ConflictingAppointment {
  id: string;
  scheduledAt: string;
  patientName: string;
}

export interface NewAppointment {
  patientId: string;
  doctorId: string;
  scheduledAt: string;
  reason: string;
}

export interface AppointmentQuery extends Omit<AppointmentListFilter, 'doctorAccountId'> {
  doctorId?: string;
}

export interface PatientRecord {
  id: string;
  accountId: string;
  fullName: string;
  nationalId?: string;
  phoneNumber?: string;
  accountStatus: AccountStatus;
  missedCount: number;
}

export interface DoctorRecord {
  id: string;
  accountId: string;
  fullName: string;
}

export interface ReaccessRequestRecord {
  id: string;
  patientId: string;
  reason: string;
  contactPhone?: string;
  status: ReaccessStatus;
  adminResponse?: string;
  createdAt: string;
  processedAt?: string;
  processedBy?: string;
}

export interface ReaccessRequestView extends ReaccessRequestRecord {
  patientName: string;
  nationalId?: string;
  patientPhone?: string;
  missedCount: number;
}

export interface NewReaccessRequest {
  patientId: string;
  reason: string;
  contactPhone?: string;
}

export interface ReaccessProcessing {
  status: Exclude<ReaccessStatus, 'pending'>;
  adminResponse: string;
  processedBy: string;
  processedAt: string;
}

export interface AuditLogRecord {
  id: string;
  actionType: string;
  description: string;
  actorId?: string;
  actorName?: string;
  actorRole?: ActorRole;
  targetType?: 'appointment' | 'patient' | 'reaccess_request';
  targetId?: string;
  createdAt: string;
}

export type NewAuditLogRecord = Omit<AuditLogRecord, 'id' | 'createdAt'>;

export interface AuditLogPage {
  entries: AuditLogRecord[];
  total: number;
  limit: number;
  offset: number;
}

export type { PatientAccountState };
