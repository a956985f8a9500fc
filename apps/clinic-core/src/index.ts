import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { TRANSACTION_RETRY_POLICY } from '@clinic-attendance/attendance-policy';

import { ClinicCore } from './core/clinic-core.js';
import { InMemoryClinicDatabase } from './data/in-memory-database.js';
import { PostgresUnitOfWork, createPostgresPool } from './data/postgres-database.js';
import type { UnitOfWork } from './data/unit-of-work.js';
import { buildClinicCoreApp } from './server/app.js';
import {
  isInMemoryDatabase,
  loadClinicCoreConfig,
  type ClinicCoreConfig,
} from './server/config.js';
import { createLogger, errorMessage, type Logger } from './server/logger.js';
import {
  FileSystemMigrationSource,
  InMemoryMigrationStateStore,
  MigrationRunner,
  NoopSqlExecutor,
  PgMigrationStateStore,
  PgSqlExecutor,
} from './server/migrations/index.js';
import { createDefaultReadinessChecks } from './server/readiness.js';

export { ClinicCore } from './core/clinic-core.js';
export type { AccountAccess, ClinicCoreDependencies } from './core/clinic-core.js';
export type { AuditEvent, AuditRecordResult, AuditSink } from './core/audit-sink.js';
export { StoreAuditSink } from './core/audit-sink.js';
export { InMemoryClinicDatabase } from './data/in-memory-database.js';
export { PostgresUnitOfWork } from './data/postgres-database.js';
export type { ClinicStore, UnitOfWork } from './data/unit-of-work.js';

export function clinicCoreServiceName(): string {
  return 'clinic-core';
}

interface StorageBundle {
  database: UnitOfWork;
  migrationRunner: MigrationRunner;
}

function createStorage(
  config: ClinicCoreConfig,
  logger: Logger,
  migrationsDirectory: string,
): StorageBundle {
  const source = new FileSystemMigrationSource(migrationsDirectory);

  if (isInMemoryDatabase(config)) {
    return {
      database: new InMemoryClinicDatabase(),
      migrationRunner: new MigrationRunner({
        source,
        sqlExecutor: new NoopSqlExecutor(),
        stateStore: new InMemoryMigrationStateStore(),
      }),
    };
  }

  const pool = createPostgresPool({
    connectionString: config.DATABASE_URL,
    maxConnections: config.DATABASE_POOL_MAX,
  });
  return {
    database: new PostgresUnitOfWork({
      pool,
      logger: logger.child({ component: 'database' }),
      statementTimeoutMs: config.DATABASE_STATEMENT_TIMEOUT_MS,
      retryPolicy: { ...TRANSACTION_RETRY_POLICY, maxAttempts: config.TRANSACTION_MAX_ATTEMPTS },
    }),
    migrationRunner: new MigrationRunner({
      source,
      sqlExecutor: new PgSqlExecutor(pool),
      stateStore: new PgMigrationStateStore(pool),
    }),
  };
}

export async function createClinicCoreServer(source: NodeJS.ProcessEnv = process.env) {
  const config = loadClinicCoreConfig(source);
  const logger = createLogger({ service: clinicCoreServiceName(), level: config.LOG_LEVEL });

  const currentDirectory = dirname(fileURLToPath(import.meta.url));
  const migrationsDirectory = resolve(currentDirectory, './server/migrations/sql');
  const { database, migrationRunner } = createStorage(config, logger, migrationsDirectory);

  const core = new ClinicCore({ database, logger });
  const app = buildClinicCoreApp({
    config,
    logger,
    core,
    readinessChecks: createDefaultReadinessChecks(database, migrationRunner, logger),
  });

  app.addHook('onClose', async () => {
    await database.close();
  });

  return { app, config, logger, core, database, migrationRunner };
}

export async function startClinicCoreServer(): Promise<void> {
  const { app, config, logger, migrationRunner } = await createClinicCoreServer();

  try {
    const { applied } = await migrationRunner.up();
    await app.listen({ host: config.HOST, port: config.PORT });
    logger.info('clinic-core started', {
      host: config.HOST,
      port: config.PORT,
      env: config.NODE_ENV,
      appliedMigrations: applied,
      storage: isInMemoryDatabase(config) ? 'memory' : 'postgresql',
    });
  } catch (error) {
    logger.error('clinic-core failed to start', { error: errorMessage(error) });
    process.exitCode = 1;
    await app.close();
    throw error;
  }
}

const executedDirectly =
  process.argv[1] !== undefined && fileURLToPath(import.meta.url) === resolve(process.argv[1]);

if (executedDirectly) {
  startClinicCoreServer().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
}
