import { ScheduledSlot } from './types.js';

/** Minimum spacing between two scheduled visits of the same doctor. */
export const MIN_VISIT_SPACING_MINUTES = 15;

const MS_PER_MINUTE = 60_000;

export function minutesBetween(left: string | Date, right: string | Date): number {
  const leftMs = typeof left === 'string' ? Date.parse(left) : left.getTime();
  const rightMs = typeof right === 'string' ? Date.parse(right) : right.getTime();
  return Math.abs(leftMs - rightMs) / MS_PER_MINUTE;
}

export interface ConflictSearchOptions {
  excludeId?: string;
  windowMinutes?: number;
}

/**
 * Returns the closest slot that collides with `candidate`, or null.
 * Slots must already be restricted to one doctor's `scheduled` appointments.
 */
export function findSchedulingConflict<T extends ScheduledSlot>(
  slots: Iterable<T>,
  candidate: string | Date,
  options: ConflictSearchOptions = {},
): T | null {
  const windowMinutes = options.windowMinutes ?? MIN_VISIT_SPACING_MINUTES;
  let closest: T | null = null;
  let closestDistance = Number.POSITIVE_INFINITY;

  for (const slot of slots) {
    if (options.excludeId !== undefined && slot.id === options.excludeId) {
      continue;
    }

    const distance = minutesBetween(slot.scheduledAt, candidate);
    if (distance < windowMinutes && distance < closestDistance) {
      closest = slot;
      closestDistance = distance;
    }
  }

  return closest;
}

const MONTH_NAMES = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
] as const;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Formats an instant as `Feb 04, 2026 10:00` in UTC. */
export function formatSlotTime(value: string | Date): string {
  const date = typeof value === 'string' ? new Date(value) : value;
  const month = MONTH_NAMES[date.getUTCMonth()] ?? '';
  return `${month} ${pad(date.getUTCDate())}, ${date.getUTCFullYear()} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

export function describeConflict(patientName: string, scheduledAt: string | Date): string {
  return `Time conflict: You already have an appointment with ${patientName} at ${formatSlotTime(scheduledAt)}`;
}
