// DELETE /files/*, POST /copy, POST /rename.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import {
  errorResponseSchema,
  pathParamsSchema,
  transferBodySchema,
  type PathParams,
  type TransferBody,
} from './schemas.js';

const emptyResponse = z.null().describe('No content');

const manageRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.delete<{ Params: PathParams }>(
    '/files/*',
    {
      schema: {
        description: 'Delete a file. Deleting a missing file succeeds.',
        tags: ['Files'],
        params: pathParamsSchema,
        response: { 204: emptyResponse, 400: errorResponseSchema, 503: errorResponseSchema },
      },
    },
    async (request, reply) => {
      await fastify.storage.deleteFile(request.params['*'] ?? '');
      return reply.status(204).send();
    }
  );

  fastify.post<{ Body: TransferBody }>(
    '/copy',
    {
      schema: {
        description: 'Copy a file. The target is replaced unless overwrite is disabled.',
        tags: ['Files'],
        body: transferBodySchema,
        response: {
          204: emptyResponse,
          400: errorResponseSchema,
          404: errorResponseSchema,
          409: errorResponseSchema,
          503: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      await fastify.storage.copyFile(request.body.source, request.body.target);
      return reply.status(204).send();
    }
  );

  fastify.post<{ Body: TransferBody }>(
    '/rename',
    {
      schema: {
        description: 'Move a file. Not atomic on share backends (copy, then delete).',
        tags: ['Files'],
        body: transferBodySchema,
        response: {
          204: emptyResponse,
          400: errorResponseSchema,
          404: errorResponseSchema,
          409: errorResponseSchema,
          503: errorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      await fastify.storage.renameFile(request.body.source, request.body.target);
      return reply.status(204).send();
    }
  );

  done();
};

export const manageRoutesPlugin = fp(manageRoutes, {
  name: 'manage-routes',
  fastify: '5.x',
});
