// GET /files/* -- stream a stored file.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import { errorResponseSchema, pathParamsSchema, type PathParams } from './schemas.js';

const downloadRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Params: PathParams }>(
    '/files/*',
    {
      schema: {
        description: 'Download a file (application/octet-stream)',
        tags: ['Files'],
        params: pathParamsSchema,
        response: {
          400: errorResponseSchema,
          404: errorResponseSchema,
          503: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const path = request.params['*'] ?? '';
      // STORAGE_NOT_FOUND (404) propagates to the error handler
      const stream = await fastify.storage.getFileStream(path);

      // Fastify destroys the stream if the client goes away mid-transfer
      return reply.status(200).header('Content-Type', 'application/octet-stream').send(stream);
    }
  );

  done();
};

export const downloadRoutesPlugin = fp(downloadRoutes, {
  name: 'download-routes',
  fastify: '5.x',
});
