import { ReaccessStatus } from './types.js';

export const REACCESS_ALLOWED_TRANSITIONS: Record<ReaccessStatus, ReaccessStatus[]> = {
  pending: ['approved', 'rejected'],
  approved: [],
  rejected: [],
};

export const DEFAULT_APPROVAL_RESPONSE =
  'Your request has been approved. You can now login and book appointments.';

export const DEFAULT_REJECTION_RESPONSE =
  'Your request has been rejected. Please contact the clinic for more information.';

export function canTransitionReaccessRequest(from: ReaccessStatus, to: ReaccessStatus): boolean {
  return REACCESS_ALLOWED_TRANSITIONS[from].includes(to);
}
