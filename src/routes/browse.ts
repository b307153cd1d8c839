// GET /info/* and GET /dirs/* -- metadata queries.
//
// Both answer 200 for missing paths; absence is reported in `exists`.

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

import {
  directoryContentsSchema,
  errorResponseSchema,
  fileInfoSchema,
  pathParamsSchema,
  toDirectoryContentsBody,
  toFileInfoBody,
  type PathParams,
} from './schemas.js';

const browseRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  for (const url of ['/info', '/info/*']) {
    fastify.get<{ Params: PathParams }>(
      url,
      {
        schema: {
          description: 'Describe a file or directory',
          tags: ['Browse'],
          params: pathParamsSchema,
          response: { 200: fileInfoSchema, 400: errorResponseSchema, 503: errorResponseSchema },
        },
      },
      async (request) => {
        const info = await fastify.storage.getFileInfo(request.params['*'] ?? '');
        return toFileInfoBody(info);
      }
    );
  }

  for (const url of ['/dirs', '/dirs/*']) {
    fastify.get<{ Params: PathParams }>(
      url,
      {
        schema: {
          description: 'List a directory',
          tags: ['Browse'],
          params: pathParamsSchema,
          response: {
            200: directoryContentsSchema,
            400: errorResponseSchema,
            503: errorResponseSchema,
          },
        },
      },
      async (request) => {
        const contents = await fastify.storage.getDirectoryContents(request.params['*'] ?? '');
        return toDirectoryContentsBody(contents);
      }
    );
  }

  done();
};

export const browseRoutesPlugin = fp(browseRoutes, {
  name: 'browse-routes',
  fastify: '5.x',
});
