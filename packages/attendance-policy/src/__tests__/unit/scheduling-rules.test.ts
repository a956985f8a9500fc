import { describe, expect, it } from 'vitest';

import {
  MIN_VISIT_SPACING_MINUTES,
  canTransitionAppointment,
  canTransitionReaccessRequest,
  describeConflict,
  findSchedulingConflict,
  formatSlotTime,
  isTerminalAppointmentStatus,
  minutesBetween,
} from '../../index.js';

describe('appointment state machine', () => {
  it('only leaves the scheduled state', () => {
    expect(canTransitionAppointment('scheduled', 'missed')).toBe(true);
    expect(canTransitionAppointment('scheduled', 'cancelled')).toBe(true);
    expect(canTransitionAppointment('missed', 'completed')).toBe(false);
    expect(isTerminalAppointmentStatus('completed')).toBe(true);
    expect(isTerminalAppointmentStatus('scheduled')).toBe(false);
    expect(isTerminalAppointmentStatus('cancelled')).toBe(true);
  });
});

describe('re-access state machine', () => {
  it('processes a request exactly once', () => {
    expect(canTransitionReaccessRequest('pending', 'approved')).toBe(true);
    expect(canTransitionReaccessRequest('pending', 'rejected')).toBe(true);
    expect(canTransitionReaccessRequest('approved', 'rejected')).toBe(false);
    expect(canTransitionReaccessRequest('rejected', 'approved')).toBe(false);
  });
});

describe('conflict window', () => {
  const slots = [
    { id: 'a-1', scheduledAt: '2026-02-04T10:00:00.000Z' },
    { id: 'a-2', scheduledAt: '2026-02-04T11:00:00.000Z' },
  ];

  it('blocks collisions on both sides of an existing slot', () => {
    expect(findSchedulingConflict(slots, '2026-02-04T10:10:00Z')?.id).toBe('a-1');
    expect(findSchedulingConflict(slots, '2026-02-04T09:50:00Z')?.id).toBe('a-1');
    expect(findSchedulingConflict(slots, '2026-02-04T10:20:00Z')).toBeNull();
  });

  it('treats exactly fifteen minutes as free', () => {
    expect(MIN_VISIT_SPACING_MINUTES).toBe(15);
    expect(findSchedulingConflict(slots, '2026-02-04T10:15:00Z')).toBeNull();
    expect(findSchedulingConflict(slots, '2026-02-04T10:14:59Z')?.id).toBe('a-1');
    expect(minutesBetween('2026-02-04T10:30:00Z', new Date('2026-02-04T10:00:00Z'))).toBe(30);
  });

  it('ignores the excluded slot and reports the closest collision', () => {
    expect(findSchedulingConflict(slots, '2026-02-04T10:00:00Z', { excludeId: 'a-1' })).toBeNull();
    expect(
      findSchedulingConflict(slots, '2026-02-04T10:40:00Z', { windowMinutes: 60 })?.id,
    ).toBe('a-2');
  });

  it('formats conflict messages in UTC', () => {
    expect(formatSlotTime('2026-02-04T10:00:00Z')).toBe('Feb 04, 2026 10:00');
    expect(describeConflict('Jane Roe', '2026-12-01T08:05:00Z')).toBe(
      'Time conflict: You already have an appointment with Jane Roe at Dec 01, 2026 08:05',
    );
  });
});
