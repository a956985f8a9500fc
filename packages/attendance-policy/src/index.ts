export function attendancePolicyPackageName(): string {
  return 'attendance-policy';
}

export * from './types.js';
export * from './appointment-state-machine.js';
export * from './reaccess-state-machine.js';
export * from './conflict-window.js';
export * from './attendance-policy.js';
export * from './retry-executor.js';
