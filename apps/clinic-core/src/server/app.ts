import Fastify from 'fastify';

import type { ClinicCore } from '../core/clinic-core.js';
import type { ClinicCoreConfig } from './config.js';
import { ClinicError, ERROR_CODES, toErrorResponse } from './errors.js';
import type { Logger } from './logger.js';
import { ClientRateLimiter } from './rate-limiter.js';
import type { ReadinessCheck } from './readiness.js';
import {
  getCorrelationId,
  readActor,
  registerAppointmentRoutes,
  registerAuditLogRoutes,
  registerHealthRoutes,
  registerReaccessRoutes,
} from './routes.js';

export interface ClinicCoreAppDependencies {
  config: ClinicCoreConfig;
  logger: Logger;
  readinessChecks: ReadinessCheck[];
  core: ClinicCore;
}

export function buildClinicCoreApp(dependencies: ClinicCoreAppDependencies) {
  const app = Fastify({ logger: false });
  const apiRateLimiter = new ClientRateLimiter(
    dependencies.config.API_RATE_LIMIT_PER_MINUTE,
    60_000,
  );

  app.decorateRequest('correlationId', '');
  app.decorateRequest('actor', null);

  app.addHook('onRequest', async (request, reply) => {
    request.correlationId = getCorrelationId(request);
    reply.header('x-correlation-id', request.correlationId);

    if (!request.url.startsWith('/v1/')) {
      return;
    }

    const sourceKey = request.headers['x-forwarded-for'];
    const key = typeof sourceKey === 'string' ? sourceKey : 'local';
    if (!apiRateLimiter.allow(key)) {
      const mapped = toErrorResponse(
        new ClinicError(
          ERROR_CODES.RATE_LIMIT_EXCEEDED,
          429,
          'Too many requests. Please retry after 60 seconds.',
          undefined,
          60,
        ),
      );
      await reply.status(mapped.statusCode).send(mapped.body);
      return;
    }

    const expectedToken = `Bearer ${dependencies.config.CLINIC_SERVICE_SHARED_TOKEN}`;
    if (request.headers.authorization !== expectedToken) {
      const mapped = toErrorResponse(
        new ClinicError(ERROR_CODES.UNAUTHORIZED, 401, 'Invalid or missing service bearer token'),
      );
      await reply.status(mapped.statusCode).send(mapped.body);
      return;
    }

    request.actor = readActor(request);
    if (request.actor === null) {
      const mapped = toErrorResponse(
        new ClinicError(
          ERROR_CODES.UNAUTHORIZED,
          401,
          'Missing or invalid actor headers: x-actor-id, x-actor-role',
        ),
      );
      await reply.status(mapped.statusCode).send(mapped.body);
    }
  });

  app.addHook('onResponse', async (request, reply) => {
    dependencies.logger.info('request complete', {
      correlationId: request.correlationId,
      method: request.method,
      path: request.url,
      statusCode: reply.statusCode,
      ...(request.actor === null ? {} : { actorId: request.actor.id }),
    });
  });

  app.register(async (instance) => {
    await registerHealthRoutes(instance, dependencies.readinessChecks);
    await registerAppointmentRoutes(instance, dependencies.core);
    await registerReaccessRoutes(instance, dependencies.core);
    await registerAuditLogRoutes(instance, dependencies.core);
  });

  app.setNotFoundHandler((_request, reply) => {
    const error = new ClinicError(ERROR_CODES.ROUTE_NOT_FOUND, 404, 'Route not found');
    const mapped = toErrorResponse(error);
    return reply.status(mapped.statusCode).send(mapped.body);
  });

  app.setErrorHandler((error, request, reply) => {
    const mapped = toErrorResponse(error);
    const fields = {
      correlationId: request.correlationId,
      method: request.method,
      path: request.url,
      statusCode: mapped.statusCode,
      code: mapped.body.error.code,
      message: mapped.body.error.message,
    };

    if (mapped.statusCode >= 500) {
      dependencies.logger.error('request failed', {
        ...fields,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    } else {
      dependencies.logger.warn('request rejected', fields);
    }

    return reply.status(mapped.statusCode).send(mapped.body);
  });

  return app;
}
