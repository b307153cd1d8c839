import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import type { Config } from './config/index.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { browseRoutesPlugin } from './routes/browse.js';
import { downloadRoutesPlugin } from './routes/download.js';
import { healthRoutesPlugin } from './routes/health.js';
import { manageRoutesPlugin } from './routes/manage.js';
import { uploadRoutesPlugin } from './routes/upload.js';
import { openFileStorage } from './storage/index.js';
import type { FileStorage } from './storage/index.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /**
   * Pre-opened storage handle. When omitted, one is opened from
   * config.storage and released when the server closes.
   */
  storage?: FileStorage;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
      // Never log credentials that might ride along on a request
      redact: ['req.headers.authorization'],
    },
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Disable default request logging (we use custom plugin)
    disableRequestLogging: true,
  });

  // Zod type provider compilers (enables Zod schemas in route schema declarations)
  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  server.decorate('config', config);

  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  // CORS - permissive in dev, restrictive in prod
  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'PUT', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  // Oversized uploads are truncated and rejected by the route, which also removes the partial file
  await server.register(multipart, {
    limits: { fileSize: config.server.uploadLimitBytes, files: 1 },
    throwFileSizeLimit: false,
  });

  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev });

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'sharestore',
        description:
          'File storage API over Azure file shares or local disk: save, fetch, list, copy, rename and delete files.',
        version: '1.0.0',
      },
      servers: [{ url: 'http://localhost:3000', description: 'Development' }],
      tags: [
        { name: 'Health', description: 'Server and backend health' },
        { name: 'Files', description: 'File content and file operations' },
        { name: 'Browse', description: 'File and directory metadata' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Storage layer initialization ----
  let storage = options.storage;
  if (!storage) {
    try {
      storage = await openFileStorage(config.storage, server.log);
    } catch (error) {
      server.log.error(
        { err: error instanceof Error ? error.message : 'Unknown error' },
        'Storage layer initialization failed'
      );
      throw error;
    }

    const owned = storage;
    server.addHook('onClose', async () => {
      await owned.release();
      server.log.info('Storage layer shutdown complete');
    });
  }

  server.decorate('storage', storage);
  server.log.info({ backend: storage.backendKind }, 'Storage layer initialized');

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(downloadRoutesPlugin);
  await server.register(uploadRoutesPlugin);
  await server.register(manageRoutesPlugin);
  await server.register(browseRoutesPlugin);

  return server;
}
