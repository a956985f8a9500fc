import { AccountStatus, PatientAccountState } from './types.js';

/** Consecutive misses at which an account is restricted. */
export const RESTRICTION_THRESHOLD = 3;

// Re-derived from the counter on every miss.
export function isRestrictionWarranted(missedCount: number): boolean {
  return missedCount >= RESTRICTION_THRESHOLD;
}

export function statusAfterMiss(current: AccountStatus, missedCount: number): AccountStatus {
  return isRestrictionWarranted(missedCount) ? 'restricted' : current;
}

/**
 * A completed visit forgives earlier misses but leaves an existing restriction in place;
 * only an approved re-access request lifts it.
 */
export function applyCompletedAppointment(current: PatientAccountState): PatientAccountState {
  return { status: current.status, missedCount: 0 };
}

export function applyReaccessApproval(): PatientAccountState {
  return { status: 'active', missedCount: 0 };
}
