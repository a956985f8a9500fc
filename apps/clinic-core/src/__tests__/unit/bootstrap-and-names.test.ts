import { describe, expect, it } from 'vitest';

import { clinicCoreServiceName, createClinicCoreServer } from '../../index.js';

describe('bootstrap and naming exports', () => {
  it('creates the clinic-core server with its dependencies wired', async () => {
    const server = await createClinicCoreServer({
      NODE_ENV: 'test',
      HOST: '127.0.0.1',
      PORT: '3010',
      LOG_LEVEL: 'fatal',
      DATABASE_URL: 'memory:',
      CLINIC_SERVICE_SHARED_TOKEN: 'test-secret-token-0001',
    });

    expect(server.config.PORT).toBe(3010);
    expect(await server.migrationRunner.pending()).toEqual(['0001_clinic_schema']);
    expect(await server.database.healthCheck()).toBe(true);

    const health = await server.app.inject({ method: 'GET', url: '/health' });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({ status: 'healthy', service: 'clinic-core' });
    await server.app.close();
  });

  it('returns the service name', () => {
    expect(clinicCoreServiceName()).toBe('clinic-core');
  });
});
