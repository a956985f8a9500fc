import { ZodError } from 'zod';

import type { ClinicFailure } from '@clinic-attendance/shared';

export const ERROR_CODES = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  APPOINTMENT_NOT_FOUND: 'APPOINTMENT_NOT_FOUND',
  PATIENT_NOT_FOUND: 'PATIENT_NOT_FOUND',
  DOCTOR_NOT_FOUND: 'DOCTOR_NOT_FOUND',
  REACCESS_REQUEST_NOT_FOUND: 'REACCESS_REQUEST_NOT_FOUND',
  PATIENT_RESTRICTED: 'PATIENT_RESTRICTED',
  SCHEDULING_CONFLICT: 'SCHEDULING_CONFLICT',
  DUPLICATE_REQUEST: 'DUPLICATE_REQUEST',
  INVALID_TRANSITION: 'INVALID_TRANSITION',
  FORBIDDEN: 'FORBIDDEN',
  UNAUTHORIZED: 'UNAUTHORIZED',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  PERSISTENCE_FAILURE: 'PERSISTENCE_FAILURE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
    retryAfter?: number;
  };
}

export class ClinicError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly retryAfter?: number,
  ) {
    super(message);
    this.name = 'ClinicError';
  }
}

const notFoundCodes = {
  appointment: ERROR_CODES.APPOINTMENT_NOT_FOUND,
  patient: ERROR_CODES.PATIENT_NOT_FOUND,
  doctor: ERROR_CODES.DOCTOR_NOT_FOUND,
  reaccess_request: ERROR_CODES.REACCESS_REQUEST_NOT_FOUND,
} as const;

export function failureToClinicError(failure: ClinicFailure): ClinicError {
  switch (failure.kind) {
    case 'NotFound':
      return new ClinicError(notFoundCodes[failure.entity], 404, failure.message, {
        id: failure.id,
      });
    case 'PatientRestricted':
      return new ClinicError(ERROR_CODES.PATIENT_RESTRICTED, 403, failure.message, {
        patientId: failure.patientId,
      });
    case 'SchedulingConflict':
      return new ClinicError(ERROR_CODES.SCHEDULING_CONFLICT, 409, failure.message, {
        conflictingAppointmentId: failure.conflictingAppointmentId,
        conflictingAt: failure.conflictingAt,
        counterpartName: failure.counterpartName,
      });
    case 'DuplicateRequest':
      return new ClinicError(ERROR_CODES.DUPLICATE_REQUEST, 409, failure.message, {
        pendingRequestId: failure.pendingRequestId,
      });
    case 'ValidationError':
      return new ClinicError(ERROR_CODES.VALIDATION_ERROR, 400, failure.message, failure.fields);
    case 'Forbidden':
      return new ClinicError(ERROR_CODES.FORBIDDEN, 403, failure.message);
    case 'InvalidTransition':
      return new ClinicError(ERROR_CODES.INVALID_TRANSITION, 409, failure.message, {
        from: failure.from,
        to: failure.to,
      });
    case 'PersistenceFailure':
      return new ClinicError(ERROR_CODES.PERSISTENCE_FAILURE, 503, failure.message);
  }
}

// Fastify's own body parsing errors carry a 4xx statusCode.
function isMalformedRequestError(error: unknown): error is Error & { statusCode: number } {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  );
}

export function toErrorResponse(error: unknown): {
  statusCode: number;
  body: ErrorEnvelope;
} {
  if (error instanceof ClinicError) {
    return {
      statusCode: error.statusCode,
      body: {
        error: {
          code: error.code,
          message: error.message,
          ...(error.details === undefined ? {} : { details: error.details }),
          ...(error.retryAfter === undefined ? {} : { retryAfter: error.retryAfter }),
        },
      },
    };
  }

  if (error instanceof ZodError) {
    const details: Record<string, unknown> = {};
    for (const issue of error.issues) {
      const issueKey = issue.path.length > 0 ? issue.path.join('.') : 'request';
      details[issueKey] = issue.message;
    }

    return {
      statusCode: 400,
      body: {
        error: {
          code: ERROR_CODES.VALIDATION_ERROR,
          message: 'Invalid request parameters',
          details,
        },
      },
    };
  }

  if (isMalformedRequestError(error)) {
    return {
      statusCode: 400,
      body: {
        error: {
          code: ERROR_CODES.VALIDATION_ERROR,
          message: error.message,
        },
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: {
        code: ERROR_CODES.INTERNAL_ERROR,
        message: 'Internal server error',
      },
    },
  };
}
