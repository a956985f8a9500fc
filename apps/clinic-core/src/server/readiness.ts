import type { UnitOfWork } from '../data/unit-of-work.js';
import { errorMessage, type Logger } from './logger.js';
import type { MigrationRunner } from './migrations/index.js';

export interface ReadinessCheck {
  name: string;
  run(): Promise<'up' | 'down'>;
}

export function createDefaultReadinessChecks(
  database: UnitOfWork,
  migrationRunner: MigrationRunner,
  logger: Logger,
): ReadinessCheck[] {
  return [
    {
      name: 'database',
      async run() {
        return (await database.healthCheck()) ? 'up' : 'down';
      },
    },
    {
      name: 'migrations',
      async run() {
        try {
          const pending = await migrationRunner.pending();
          return pending.length === 0 ? 'up' : 'down';
        } catch (error) {
          logger.warn('migration readiness check failed', { error: errorMessage(error) });
          return 'down';
        }
      },
    },
  ];
}
