import { randomUUID } from 'node:crypto';

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import {
  actorSchema,
  appointmentListFilterSchema,
  attendanceSetStatusInputSchema,
  auditLogPurgeSchema,
  auditLogQuerySchema,
  reaccessDecisionInputSchema,
  reaccessListQuerySchema,
  reaccessSubmitInputSchema,
  scheduleCreateInputSchema,
  scheduleRescheduleInputSchema,
  succeed,
  type Actor,
  type OperationResult,
} from '@clinic-attendance/shared';

import type { ClinicCore } from '../core/clinic-core.js';
import { ClinicError, ERROR_CODES, failureToClinicError, toErrorResponse } from './errors.js';
import type { ReadinessCheck } from './readiness.js';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
    actor: Actor | null;
  }
}

export function getCorrelationId(request: FastifyRequest): string {
  const headerValue = request.headers['x-correlation-id'];
  if (typeof headerValue === 'string' && headerValue.length > 0) {
    return headerValue;
  }

  return randomUUID();
}

/** Reads the authenticated caller from the `x-actor-*` headers set by the gateway. */
export function readActor(request: FastifyRequest): Actor | null {
  const name = request.headers['x-actor-name'];
  const parsed = actorSchema.safeParse({
    id: request.headers['x-actor-id'],
    role: request.headers['x-actor-role'],
    ...(typeof name === 'string' && name.length > 0 ? { name } : {}),
  });

  return parsed.success ? parsed.data : null;
}

function requireActor(request: FastifyRequest): Actor {
  if (request.actor === null) {
    throw new ClinicError(ERROR_CODES.UNAUTHORIZED, 401, 'Missing or invalid actor identity');
  }

  return request.actor;
}

function sendResult<T>(reply: FastifyReply, result: OperationResult<T>, successStatus = 200) {
  if (result.ok) {
    return reply.status(successStatus).send(result.value);
  }

  const mapped = toErrorResponse(failureToClinicError(result.failure));
  return reply.status(mapped.statusCode).send(mapped.body);
}

export async function registerHealthRoutes(
  app: FastifyInstance,
  readinessChecks: ReadinessCheck[],
): Promise<void> {
  app.get('/health', async (_request, reply) => {
    const memoryUsage = process.memoryUsage();
    return reply.status(200).send({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'clinic-core',
      metrics: {
        uptime: process.uptime(),
        memoryUsage: {
          rss: memoryUsage.rss,
          heapUsed: memoryUsage.heapUsed,
          heapTotal: memoryUsage.heapTotal,
        },
      },
    });
  });

  app.get('/ready', async (_request, reply) => {
    const checks = await Promise.all(
      readinessChecks.map(async (check) => ({ name: check.name, status: await check.run() })),
    );

    const services = Object.fromEntries(checks.map((check) => [check.name, check.status]));
    const allChecksUp = checks.every((check) => check.status === 'up');

    return reply.status(allChecksUp ? 200 : 503).send({
      status: allChecksUp ? 'ready' : 'not_ready',
      timestamp: new Date().toISOString(),
      services,
    });
  });
}

const idParamsSchema = z.object({ id: z.string().min(1) });
const patientParamsSchema = z.object({ patientId: z.string().min(1) });
const accountParamsSchema = z.object({ accountId: z.string().min(1) });

const rescheduleBodySchema = scheduleRescheduleInputSchema.omit({ appointmentId: true });
const setStatusBodySchema = attendanceSetStatusInputSchema.omit({ appointmentId: true });
const decisionBodySchema = reaccessDecisionInputSchema.omit({ requestId: true });

export async function registerAppointmentRoutes(
  app: FastifyInstance,
  core: ClinicCore,
): Promise<void> {
  app.post('/v1/appointments', async (request, reply) => {
    const body = scheduleCreateInputSchema.parse(request.body);
    return sendResult(reply, await core.scheduleCreate(requireActor(request), body), 201);
  });

  app.patch('/v1/appointments/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = rescheduleBodySchema.parse(request.body);
    const result = await core.scheduleReschedule(requireActor(request), {
      ...body,
      appointmentId: id,
    });
    return sendResult(reply, result);
  });

  app.post('/v1/appointments/:id/cancel', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const result = await core.scheduleCancel(requireActor(request), { appointmentId: id });
    return sendResult(reply, result);
  });

  app.delete('/v1/appointments/:id', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const result = await core.scheduleDelete(requireActor(request), { appointmentId: id });
    return sendResult(reply, result);
  });

  app.post('/v1/appointments/:id/status', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = setStatusBodySchema.parse(request.body);
    const result = await core.attendanceSetStatus(requireActor(request), {
      appointmentId: id,
      status: body.status,
    });
    return sendResult(reply, result);
  });

  app.get('/v1/appointments', async (request, reply) => {
    const filter = appointmentListFilterSchema.parse(request.query);
    return sendResult(reply, await core.listAppointments(requireActor(request), filter));
  });

  app.get('/v1/accounts/:accountId/appointments', async (request, reply) => {
    const params = accountParamsSchema.parse(request.params);
    return sendResult(reply, await core.listAccountAppointments(requireActor(request), params));
  });

  app.get('/v1/patients/:patientId/access', async (request, reply) => {
    const params = patientParamsSchema.parse(request.params);
    return sendResult(reply, await core.checkAccountAccess(requireActor(request), params));
  });
}

export async function registerReaccessRoutes(
  app: FastifyInstance,
  core: ClinicCore,
): Promise<void> {
  app.post('/v1/reaccess-requests', async (request, reply) => {
    const body = reaccessSubmitInputSchema.parse(request.body);
    return sendResult(reply, await core.reaccessSubmit(requireActor(request), body), 201);
  });

  app.get('/v1/reaccess-requests', async (request, reply) => {
    const query = reaccessListQuerySchema.parse(request.query);
    return sendResult(reply, await core.listReaccessRequests(requireActor(request), query));
  });

  app.get('/v1/patients/:patientId/reaccess-requests/pending', async (request, reply) => {
    const params = patientParamsSchema.parse(request.params);
    return sendResult(reply, await core.reaccessCheckExisting(requireActor(request), params));
  });

  app.post('/v1/reaccess-requests/:id/approve', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = decisionBodySchema.parse(request.body ?? {});
    const result = await core.reaccessApprove(requireActor(request), { ...body, requestId: id });
    return sendResult(reply, result);
  });

  app.post('/v1/reaccess-requests/:id/reject', async (request, reply) => {
    const { id } = idParamsSchema.parse(request.params);
    const body = decisionBodySchema.parse(request.body ?? {});
    const result = await core.reaccessReject(requireActor(request), { ...body, requestId: id });
    return sendResult(reply, result);
  });
}

export async function registerAuditLogRoutes(
  app: FastifyInstance,
  core: ClinicCore,
): Promise<void> {
  app.get('/v1/audit-logs', async (request, reply) => {
    const query = auditLogQuerySchema.parse(request.query);
    return sendResult(reply, await core.listAuditLogs(requireActor(request), query));
  });

  app.get('/v1/audit-logs/action-types', async (request, reply) => {
    const result = await core.listAuditActionTypes(requireActor(request));
    if (!result.ok) {
      return sendResult(reply, result);
    }

    return sendResult(reply, succeed({ actionTypes: result.value }));
  });

  app.delete('/v1/audit-logs', async (request, reply) => {
    const query = auditLogPurgeSchema.parse(request.query);
    return sendResult(reply, await core.purgeAuditLogs(requireActor(request), query));
  });
}
