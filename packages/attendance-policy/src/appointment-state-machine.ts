import { AppointmentStatus } from './types.js';

export const APPOINTMENT_ALLOWED_TRANSITIONS: Record<AppointmentStatus, AppointmentStatus[]> = {
  scheduled: ['completed', 'missed', 'cancelled'],
  completed: [],
  missed: [],
  cancelled: [],
};

export function isTerminalAppointmentStatus(status: AppointmentStatus): boolean {
  return APPOINTMENT_ALLOWED_TRANSITIONS[status].length === 0;
}

export function canTransitionAppointment(
  from: AppointmentStatus,
  to: AppointmentStatus,
): boolean {
  return APPOINTMENT_ALLOWED_TRANSITIONS[from].includes(to);
}
