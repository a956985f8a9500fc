import type { Actor, ActorRole } from '@clinic-attendance/shared';

import type { PatientRecord } from '../data/types.js';

export const STAFF_ROLES: readonly ActorRole[] = ['admin', 'doctor', 'nurse'];
export const ADMIN_ROLES: readonly ActorRole[] = ['admin'];

export function hasRole(actor: Actor, roles: readonly ActorRole[]): boolean {
  return roles.includes(actor.role);
}

export function isStaff(actor: Actor): boolean {
  return hasRole(actor, STAFF_ROLES);
}

export function ownsPatientRecord(actor: Actor, patient: PatientRecord): boolean {
  return actor.role === 'patient' && patient.accountId === actor.id;
}

export function canViewPatient(actor: Actor, patient: PatientRecord): boolean {
  return isStaff(actor) || ownsPatientRecord(actor, patient);
}

export function canSubmitReaccess(actor: Actor, patient: PatientRecord): boolean {
  return actor.role === 'admin' || ownsPatientRecord(actor, patient);
}
