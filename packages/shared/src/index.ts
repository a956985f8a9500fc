export function sharedPackageName(): string {
  return 'shared';
}

export * from './contracts/index.js';
