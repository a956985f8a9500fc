import pg from 'pg';
import type { Pool, PoolClient } from 'pg';

import {
  AppointmentStatus,
  RetryExecutor,
  RetryPolicy,
  TRANSACTION_RETRY_POLICY,
  getErrorCode,
} from '@clinic-attendance/attendance-policy';

import { errorMessage, type Logger } from '../server/logger.js';
import {
  AppointmentQuery,
  AppointmentRecord,
  AppointmentView,
  AuditLogPage,
  AuditLogRecord,
  ConflictingAppointment,
  DoctorRecord,
  NewAppointment,
  NewAuditLogRecord,
  NewReaccessRequest,
  PatientAccountState,
  PatientRecord,
  ReaccessProcessing,
  ReaccessRequestRecord,
  ReaccessRequestView,
} from './types.js';
import {
  AppointmentStore,
  AuditLogStore,
  ClinicStore,
  DoctorDirectory,
  PatientDirectory,
  ReaccessRequestStore,
  RecordNotFoundError,
  StoreConstraintError,
  UnitOfWork,
} from './unit-of-work.js';
import {
  parseAccountStatus,
  parseActorRole,
  parseAppointmentStatus,
  parseReaccessStatus,
  parseTargetType,
} from './validation.js';

type Queryable = Pick<PoolClient, 'query'>;

// All timestamps are stored as UTC `timestamp` columns and read back as ISO-8601 text.
function utcText(column: string): string {
  return `to_char(${column}, 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"')`;
}

const TO_UTC_TIMESTAMP = `::timestamptz AT TIME ZONE 'UTC'`;
const DOCTOR_SCHEDULE_LOCK_NAMESPACE = 4201;

type AppointmentRow = {
  appointment_id: string;
  patient_id: string;
  doctor_id: string;
  scheduled_at: string;
  reason_for_visit: string;
  status: string;
  created_at: string;
};

type AppointmentViewRow = AppointmentRow & {
  patient_name: string | null;
  patient_phone: string | null;
  patient_account_status: string | null;
  doctor_name: string | null;
};

type PatientRow = {
  patient_id: string;
  account_id: string;
  full_name: string;
  national_id: string | null;
  phone_number: string | null;
  account_status: string;
  consecutive_missed_appointments: number;
};

type DoctorRow = {
  doctor_id: string;
  account_id: string;
  full_name: string;
};

type ReaccessRow = {
  request_id: string;
  patient_id: string;
  reason: string;
  contact_phone: string | null;
  status: string;
  admin_response: string | null;
  created_at: string;
  processed_at: string | null;
  processed_by: string | null;
};

type ReaccessViewRow = ReaccessRow & {
  patient_name: string;
  national_id: string | null;
  patient_phone: string | null;
  consecutive_missed_appointments: number;
};

type AuditLogRow = {
  log_id: string;
  action_type: string;
  action_description: string;
  user_id: string | null;
  user_name: string | null;
  user_role: string | null;
  target_type: string | null;
  target_id: string | null;
  created_at: string;
};

const APPOINTMENT_COLUMNS = `a.appointment_id, a.patient_id, a.doctor_id,
  ${utcText('a.scheduled_at')} AS scheduled_at, a.reason_for_visit, a.status,
  ${utcText('a.created_at')} AS created_at`;

const REACCESS_COLUMNS = `r.request_id, r.patient_id, r.reason, r.contact_phone, r.status, r.admin_response,
  ${utcText('r.created_at')} AS created_at,
  CASE WHEN r.processed_at IS NULL THEN NULL ELSE ${utcText('r.processed_at')} END AS processed_at,
  r.processed_by`;

function toAppointment(row: AppointmentRow): AppointmentRecord {
  return {
    id: row.appointment_id,
    patientId: row.patient_id,
    doctorId: row.doctor_id,
    scheduledAt: row.scheduled_at,
    reason: row.reason_for_visit,
    status: parseAppointmentStatus(row.status),
    createdAt: row.created_at,
  };
}

function toPatient(row: PatientRow): PatientRecord {
  return {
    id: row.patient_id,
    accountId: row.account_id,
    fullName: row.full_name,
    ...(row.national_id === null ? {} : { nationalId: row.national_id }),
    ...(row.phone_number === null ? {} : { phoneNumber: row.phone_number }),
    accountStatus: parseAccountStatus(row.account_status),
    missedCount: row.consecutive_missed_appointments,
  };
}

function toDoctor(row: DoctorRow): DoctorRecord {
  return { id: row.doctor_id, accountId: row.account_id, fullName: row.full_name };
}

function toReaccessRequest(row: ReaccessRow): ReaccessRequestRecord {
  return {
    id: row.request_id,
    patientId: row.patient_id,
    reason: row.reason,
    ...(row.contact_phone === null ? {} : { contactPhone: row.contact_phone }),
    status: parseReaccessStatus(row.status),
    ...(row.admin_response === null ? {} : { adminResponse: row.admin_response }),
    createdAt: row.created_at,
    ...(row.processed_at === null ? {} : { processedAt: row.processed_at }),
    ...(row.processed_by === null ? {} : { processedBy: row.processed_by }),
  };
}

function toAuditLog(row: AuditLogRow): AuditLogRecord {
  const actorRole = row.user_role === null ? undefined : parseActorRole(row.user_role);
  const targetType = row.target_type === null ? undefined : parseTargetType(row.target_type);

  return {
    id: row.log_id,
    actionType: row.action_type,
    description: row.action_description,
    ...(row.user_id === null ? {} : { actorId: row.user_id }),
    ...(row.user_name === null ? {} : { actorName: row.user_name }),
    ...(actorRole === undefined ? {} : { actorRole }),
    ...(targetType === undefined ? {} : { targetType }),
    ...(row.target_id === null ? {} : { targetId: row.target_id }),
    createdAt: row.created_at,
  };
}

function firstRow<T>(rows: T[], entity: string, id: string): T {
  const row = rows[0];
  if (row === undefined) {
    throw new RecordNotFoundError(entity, id);
  }

  return row;
}

class PostgresAppointmentStore implements AppointmentStore {
  constructor(private readonly client: Queryable) {}

  async lockDoctorSchedule(doctorId: string): Promise<void> {
    await this.client.query('SELECT pg_advisory_xact_lock($1, hashtext($2))', [
      DOCTOR_SCHEDULE_LOCK_NAMESPACE,
      doctorId,
    ]);
  }

  async findById(id: string): Promise<AppointmentRecord | null> {
    const result = await this.client.query<AppointmentRow>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments a WHERE a.appointment_id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row === undefined ? null : toAppointment(row);
  }

  async findScheduledConflict(
    doctorId: string,
    scheduledAt: string,
    windowMinutes: number,
    excludeId?: string,
  ): Promise<ConflictingAppointment | null> {
    const result = await this.client.query<{ appointment_id: string; scheduled_at: string; patient_name: string }>(
      `SELECT a.appointment_id, ${utcText('a.scheduled_at')} AS scheduled_at,
              COALESCE(p.full_name, 'Unknown patient') AS patient_name
         FROM appointments a
         LEFT JOIN patients p ON p.patient_id = a.patient_id
        WHERE a.doctor_id = $1
          AND a.status = 'scheduled'
          AND ($4::text IS NULL OR a.appointment_id <> $4::text)
          AND abs(extract(epoch FROM a.scheduled_at - ($2${TO_UTC_TIMESTAMP}))) < $3 * 60
        ORDER BY abs(extract(epoch FROM a.scheduled_at - ($2${TO_UTC_TIMESTAMP})))
        LIMIT 1`,
      [doctorId, scheduledAt, windowMinutes, excludeId ?? null],
    );

    const row = result.rows[0];
    if (row === undefined) {
      return null;
    }

    return { id: row.appointment_id, scheduledAt: row.scheduled_at, patientName: row.patient_name };
  }

  async insert(input: NewAppointment): Promise<AppointmentRecord> {
    const result = await this.client.query<AppointmentRow>(
      `INSERT INTO appointments AS a (patient_id, doctor_id, scheduled_at, reason_for_visit, status)
       VALUES ($1, $2, $3${TO_UTC_TIMESTAMP}, $4, 'scheduled')
       RETURNING ${APPOINTMENT_COLUMNS}`,
      [input.patientId, input.doctorId, input.scheduledAt, input.reason],
    );
    return toAppointment(firstRow(result.rows, 'appointment', 'new'));
  }

  async updateSchedule(id: string, scheduledAt: string, reason: string): Promise<AppointmentRecord> {
    const result = await this.client.query<AppointmentRow>(
      `UPDATE appointments AS a SET scheduled_at = $2${TO_UTC_TIMESTAMP}, reason_for_visit = $3
        WHERE a.appointment_id = $1
        RETURNING ${APPOINTMENT_COLUMNS}`,
      [id, scheduledAt, reason],
    );
    return toAppointment(firstRow(result.rows, 'appointment', id));
  }

  async updateStatus(id: string, status: AppointmentStatus): Promise<AppointmentRecord> {
    const result = await this.client.query<AppointmentRow>(
      `UPDATE appointments AS a SET status = $2
        WHERE a.appointment_id = $1
        RETURNING ${APPOINTMENT_COLUMNS}`,
      [id, status],
    );
    return toAppointment(firstRow(result.rows, 'appointment', id));
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.client.query('DELETE FROM appointments WHERE appointment_id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async list(query: AppointmentQuery): Promise<AppointmentView[]> {
    const result = await this.client.query<AppointmentViewRow>(
      `SELECT ${APPOINTMENT_COLUMNS},
              p.full_name AS patient_name,
              p.phone_number AS patient_phone,
              p.account_status AS patient_account_status,
              d.full_name AS doctor_name
         FROM appointments a
         LEFT JOIN patients p ON p.patient_id = a.patient_id
         LEFT JOIN doctors d ON d.doctor_id = a.doctor_id
        WHERE ($1::text IS NULL OR a.doctor_id = $1::text)
          AND ($2::text IS NULL OR a.patient_id = $2::text)
          AND ($3::text IS NULL OR a.status = $3::text)
        ORDER BY a.scheduled_at DESC`,
      [query.doctorId ?? null, query.patientId ?? null, query.status ?? null],
    );

    return result.rows.map((row) => ({
      ...toAppointment(row),
      patientName: row.patient_name,
      patientPhone: row.patient_phone,
      patientAccountStatus:
        row.patient_account_status === null ? null : parseAccountStatus(row.patient_account_status),
      doctorName: row.doctor_name,
    }));
  }
}

const PATIENT_COLUMNS =
  'patient_id, account_id, full_name, national_id, phone_number, account_status, consecutive_missed_appointments';

class PostgresPatientDirectory implements PatientDirectory {
  constructor(private readonly client: Queryable) {}

  async findById(patientId: string): Promise<PatientRecord | null> {
    const result = await this.client.query<PatientRow>(
      `SELECT ${PATIENT_COLUMNS} FROM patients WHERE patient_id = $1`,
      [patientId],
    );
    const row = result.rows[0];
    return row === undefined ? null : toPatient(row);
  }

  async findByAccountId(accountId: string): Promise<PatientRecord | null> {
    const result = await this.client.query<PatientRow>(
      `SELECT ${PATIENT_COLUMNS} FROM patients WHERE account_id = $1`,
      [accountId],
    );
    const row = result.rows[0];
    return row === undefined ? null : toPatient(row);
  }

  async getAccountState(patientId: string): Promise<PatientAccountState | null> {
    const result = await this.client.query<Pick<PatientRow, 'account_status' | 'consecutive_missed_appointments'>>(
      `SELECT account_status, consecutive_missed_appointments
         FROM patients WHERE patient_id = $1 FOR UPDATE`,
      [patientId],
    );
    const row = result.rows[0];
    if (row === undefined) {
      return null;
    }

    return {
      status: parseAccountStatus(row.account_status),
      missedCount: row.consecutive_missed_appointments,
    };
  }

  async setAccountState(patientId: string, state: PatientAccountState): Promise<void> {
    const result = await this.client.query(
      `UPDATE patients SET account_status = $2, consecutive_missed_appointments = $3
        WHERE patient_id = $1`,
      [patientId, state.status, state.missedCount],
    );
    if ((result.rowCount ?? 0) === 0) {
      throw new RecordNotFoundError('patient', patientId);
    }
  }

  async incrementMissedCount(patientId: string): Promise<number> {
    const result = await this.client.query<Pick<PatientRow, 'consecutive_missed_appointments'>>(
      `UPDATE patients SET consecutive_missed_appointments = consecutive_missed_appointments + 1
        WHERE patient_id = $1
        RETURNING consecutive_missed_appointments`,
      [patientId],
    );
    return firstRow(result.rows, 'patient', patientId).consecutive_missed_appointments;
  }
}

class PostgresDoctorDirectory implements DoctorDirectory {
  constructor(private readonly client: Queryable) {}

  async resolveDoctor(staffAccountId: string): Promise<DoctorRecord | null> {
    const result = await this.client.query<DoctorRow>(
      'SELECT doctor_id, account_id, full_name FROM doctors WHERE account_id = $1',
      [staffAccountId],
    );
    const row = result.rows[0];
    return row === undefined ? null : toDoctor(row);
  }

  async findById(doctorId: string): Promise<DoctorRecord | null> {
    const result = await this.client.query<DoctorRow>(
      'SELECT doctor_id, account_id, full_name FROM doctors WHERE doctor_id = $1',
      [doctorId],
    );
    const row = result.rows[0];
    return row === undefined ? null : toDoctor(row);
  }
}

class PostgresReaccessRequestStore implements ReaccessRequestStore {
  constructor(private readonly client: Queryable) {}

  async findById(id: string): Promise<ReaccessRequestRecord | null> {
    const result = await this.client.query<ReaccessRow>(
      `SELECT ${REACCESS_COLUMNS} FROM reaccess_requests r WHERE r.request_id = $1 FOR UPDATE`,
      [id],
    );
    const row = result.rows[0];
    return row === undefined ? null : toReaccessRequest(row);
  }

  async findPending(patientId: string): Promise<ReaccessRequestRecord | null> {
    const result = await this.client.query<ReaccessRow>(
      `SELECT ${REACCESS_COLUMNS} FROM reaccess_requests r
        WHERE r.patient_id = $1 AND r.status = 'pending'`,
      [patientId],
    );
    const row = result.rows[0];
    return row === undefined ? null : toReaccessRequest(row);
  }

  async insert(input: NewReaccessRequest): Promise<ReaccessRequestRecord> {
    const result = await this.client.query<ReaccessRow>(
      `INSERT INTO reaccess_requests AS r (patient_id, reason, contact_phone)
       VALUES ($1, $2, $3)
       RETURNING ${REACCESS_COLUMNS}`,
      [input.patientId, input.reason, input.contactPhone ?? null],
    );
    return toReaccessRequest(firstRow(result.rows, 'reaccess_request', 'new'));
  }

  async markProcessed(id: string, processing: ReaccessProcessing): Promise<ReaccessRequestRecord> {
    const result = await this.client.query<ReaccessRow>(
      `UPDATE reaccess_requests AS r
          SET status = $2, admin_response = $3, processed_by = $4, processed_at = $5${TO_UTC_TIMESTAMP}
        WHERE r.request_id = $1
        RETURNING ${REACCESS_COLUMNS}`,
      [id, processing.status, processing.adminResponse, processing.processedBy, processing.processedAt],
    );
    return toReaccessRequest(firstRow(result.rows, 'reaccess_request', id));
  }

  async list(options: { pendingOnly: boolean }): Promise<ReaccessRequestView[]> {
    const result = await this.client.query<ReaccessViewRow>(
      `SELECT ${REACCESS_COLUMNS},
              p.full_name AS patient_name,
              p.national_id,
              p.phone_number AS patient_phone,
              p.consecutive_missed_appointments
         FROM reaccess_requests r
         JOIN patients p ON p.patient_id = r.patient_id
        WHERE (NOT $1::boolean OR r.status = 'pending')
        ORDER BY r.created_at DESC, r.request_seq DESC`,
      [options.pendingOnly],
    );

    return result.rows.map((row) => ({
      ...toReaccessRequest(row),
      patientName: row.patient_name,
      ...(row.national_id === null ? {} : { nationalId: row.national_id }),
      ...(row.patient_phone === null ? {} : { patientPhone: row.patient_phone }),
      missedCount: row.consecutive_missed_appointments,
    }));
  }
}

class PostgresAuditLogStore implements AuditLogStore {
  constructor(private readonly client: Queryable) {}

  async append(record: NewAuditLogRecord): Promise<AuditLogRecord> {
    const result = await this.client.query<AuditLogRow>(
      `INSERT INTO system_logs
         (action_type, action_description, user_id, user_name, user_role, target_type, target_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING log_id::text AS log_id, action_type, action_description, user_id, user_name,
                 user_role, target_type, target_id, ${utcText('created_at')} AS created_at`,
      [
        record.actionType,
        record.description,
        record.actorId ?? null,
        record.actorName ?? null,
        record.actorRole ?? null,
        record.targetType ?? null,
        record.targetId ?? null,
      ],
    );
    return toAuditLog(firstRow(result.rows, 'system_log', 'new'));
  }

  async list(options: { actionType?: string; limit: number; offset: number }): Promise<AuditLogPage> {
    const actionType = options.actionType ?? null;
    const [page, count] = await Promise.all([
      this.client.query<AuditLogRow>(
        `SELECT log_id::text AS log_id, action_type, action_description, user_id, user_name,
                user_role, target_type, target_id, ${utcText('created_at')} AS created_at
           FROM system_logs
          WHERE ($1::text IS NULL OR action_type = $1::text)
          ORDER BY created_at DESC, log_id DESC
          LIMIT $2 OFFSET $3`,
        [actionType, options.limit, options.offset],
      ),
      this.client.query<{ total: number }>(
        `SELECT count(*)::int AS total FROM system_logs
          WHERE ($1::text IS NULL OR action_type = $1::text)`,
        [actionType],
      ),
    ]);

    return {
      entries: page.rows.map(toAuditLog),
      total: count.rows[0]?.total ?? 0,
      limit: options.limit,
      offset: options.offset,
    };
  }

  async listActionTypes(): Promise<string[]> {
    const result = await this.client.query<{ action_type: string }>(
      'SELECT DISTINCT action_type FROM system_logs ORDER BY action_type',
    );
    return result.rows.map((row) => row.action_type);
  }

  async purgeOlderThan(cutoff: Date): Promise<number> {
    const result = await this.client.query(
      `DELETE FROM system_logs WHERE created_at < $1${TO_UTC_TIMESTAMP}`,
      [cutoff.toISOString()],
    );
    return result.rowCount ?? 0;
  }
}

function createPostgresStore(client: Queryable): ClinicStore {
  return {
    appointments: new PostgresAppointmentStore(client),
    patients: new PostgresPatientDirectory(client),
    doctors: new PostgresDoctorDirectory(client),
    reaccessRequests: new PostgresReaccessRequestStore(client),
    auditLog: new PostgresAuditLogStore(client),
  };
}

function constraintName(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('constraint' in error)) {
    return null;
  }

  return typeof error.constraint === 'string' ? error.constraint : null;
}

export function translateDatabaseError(error: unknown): unknown {
  const code = getErrorCode(error);
  const constraint = constraintName(error);

  if (code === '23P01' && constraint === 'appointments_doctor_slot_excl') {
    return new StoreConstraintError(
      'appointment_slot',
      'Doctor already has a scheduled appointment in this slot',
    );
  }

  if (code === '23505' && constraint === 'reaccess_requests_single_pending_idx') {
    return new StoreConstraintError(
      'single_pending_reaccess',
      'Patient already has a pending re-access request',
    );
  }

  return error;
}

export interface PostgresUnitOfWorkOptions {
  pool: Pool;
  logger: Logger;
  statementTimeoutMs: number;
  retryPolicy?: RetryPolicy;
  retryExecutor?: RetryExecutor;
}

/**
 * Each unit of work is one SERIALIZABLE transaction on a pooled connection. Serialization
 * failures and deadlocks are retried from the start of the work.
 */
export class PostgresUnitOfWork implements UnitOfWork {
  private readonly retryExecutor: RetryExecutor;
  private readonly retryPolicy: RetryPolicy;

  constructor(private readonly options: PostgresUnitOfWorkOptions) {
    this.retryExecutor = options.retryExecutor ?? new RetryExecutor();
    this.retryPolicy = options.retryPolicy ?? TRANSACTION_RETRY_POLICY;
  }

  run<T>(work: (store: ClinicStore) => Promise<T>): Promise<T> {
    return this.retryExecutor.execute(async (attempt) => {
      const client = await this.options.pool.connect();

      try {
        await client.query('BEGIN ISOLATION LEVEL SERIALIZABLE');
        await client.query("SELECT set_config('statement_timeout', $1, true)", [
          String(this.options.statementTimeoutMs),
        ]);
        const result = await work(createPostgresStore(client));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await this.rollback(client, attempt);
        throw translateDatabaseError(error);
      } finally {
        client.release();
      }
    }, this.retryPolicy);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.options.pool.query('SELECT 1');
      return true;
    } catch (error) {
      this.options.logger.warn('database health check failed', {
        error: errorMessage(error),
      });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.options.pool.end();
  }

  private async rollback(client: PoolClient, attempt: number): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      this.options.logger.warn('transaction rollback failed', {
        attempt,
        error: errorMessage(rollbackError),
      });
    }
  }
}

export interface PostgresPoolOptions {
  connectionString: string;
  maxConnections: number;
}

export function createPostgresPool(options: PostgresPoolOptions): Pool {
  return new pg.Pool({
    connectionString: options.connectionString,
    max: options.maxConnections,
  });
}
