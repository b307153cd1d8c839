import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import { describe, it, expect, afterEach, vi } from 'vitest';

import { healthRoutesPlugin } from '@/routes/health.js';

/** Mock storage handle, healthy by default */
function createMockStorage(healthy: () => Promise<boolean> = async () => true) {
  return {
    backendKind: 'azure',
    healthy: vi.fn(healthy),
  };
}

async function createHealthServer(
  storage: ReturnType<typeof createMockStorage> = createMockStorage()
): Promise<FastifyInstance> {
  const server = fastify({ logger: false });

  // Cast to 'never' to satisfy Fastify's strict decorator typing -- this is a test mock
  server.decorate('storage', storage as never);

  await server.register(healthRoutesPlugin);
  await server.ready();
  return server;
}

describe('Health Endpoint', () => {
  let server: FastifyInstance;

  afterEach(async () => {
    if (server) await server.close();
  });

  describe('Storage up (healthy)', () => {
    it('should return healthy status with HTTP 200', async () => {
      server = await createHealthServer();

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('healthy');
    });

    it('should report storage as up with backend and latency', async () => {
      server = await createHealthServer();

      const response = await server.inject({ method: 'GET', url: '/health' });

      const { storage } = response.json().dependencies;
      expect(storage.status).toBe('up');
      expect(storage.backend).toBe('azure');
      expect(storage.latency).toBeGreaterThanOrEqual(0);
      expect(storage.error).toBeUndefined();
    });
  });

  describe('Storage down (unhealthy)', () => {
    it('should return 503 when the probe reports false', async () => {
      server = await createHealthServer(createMockStorage(async () => false));

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json().status).toBe('unhealthy');
      expect(response.json().dependencies.storage.status).toBe('down');
    });

    it('should report the error when the probe throws', async () => {
      server = await createHealthServer(
        createMockStorage(async () => {
          throw new Error('Connection refused');
        })
      );

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json().dependencies.storage).toMatchObject({
        status: 'down',
        backend: 'azure',
        error: 'Connection refused',
      });
    });

    it('should handle non-Error throws', async () => {
      server = await createHealthServer(
        createMockStorage(() => Promise.reject('string error'))
      );

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.json().dependencies.storage.error).toBe('Unknown error');
    });
  });

  describe('Response shape validation', () => {
    it('should return ISO timestamp, uptime and version', async () => {
      server = await createHealthServer();

      const body = (await server.inject({ method: 'GET', url: '/health' })).json();

      expect(body.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
      expect(typeof body.uptime).toBe('number');
      expect(body.uptime).toBeGreaterThan(0);
      expect(typeof body.version).toBe('string');
    });

    it('should only list the storage dependency', async () => {
      server = await createHealthServer();

      const body = (await server.inject({ method: 'GET', url: '/health' })).json();

      expect(Object.keys(body.dependencies)).toEqual(['storage']);
    });
  });
});
