// PUT /files/* and POST /files/* -- store a file.
//
// PUT takes the raw request body (application/octet-stream is streamed
// straight into storage). POST takes a multipart/form-data "file" field.

import { Readable } from 'node:stream';

import createError from '@fastify/error';
import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

// Import for type augmentation -- adds request.file() to FastifyRequest
import '@fastify/multipart';

import { RequestBodyMissingError } from '../errors/index.js';
import {
  errorResponseSchema,
  fileInfoSchema,
  pathParamsSchema,
  toFileInfoBody,
  type PathParams,
} from './schemas.js';

const UploadTooLargeError = createError<[number]>(
  'UPLOAD_TOO_LARGE',
  'Upload exceeds the %d byte limit',
  413
);

/** Body as parsed by Fastify: a stream for octet-stream, a string for text, nothing when empty. */
function uploadContent(body: unknown): Readable | Buffer | string {
  if (body === undefined || body === null) return '';
  if (body instanceof Readable || Buffer.isBuffer(body) || typeof body === 'string') {
    return body;
  }
  throw new RequestBodyMissingError('send file bytes as application/octet-stream');
}

const uploadRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  // Hand the unread request stream to the route instead of buffering it
  fastify.addContentTypeParser('application/octet-stream', (_request, payload, parsed) => {
    parsed(null, payload);
  });

  const responses = {
    201: fileInfoSchema,
    400: errorResponseSchema,
    413: errorResponseSchema,
    503: errorResponseSchema,
  };

  fastify.put<{ Params: PathParams }>(
    '/files/*',
    {
      schema: {
        description: 'Create or replace a file with the raw request body',
        tags: ['Files'],
        params: pathParamsSchema,
        response: responses,
      },
    },
    async (request, reply) => {
      const path = request.params['*'] ?? '';
      await fastify.storage.saveFile(path, uploadContent(request.body));

      const info = await fastify.storage.getFileInfo(path);
      return reply.status(201).send(toFileInfoBody(info));
    }
  );

  fastify.post<{ Params: PathParams }>(
    '/files/*',
    {
      schema: {
        description: 'Create or replace a file from a multipart/form-data "file" field',
        tags: ['Files'],
        params: pathParamsSchema,
        response: responses,
      },
    },
    async (request, reply) => {
      const path = request.params['*'] ?? '';
      const data = await request.file();
      if (!data) {
        throw new RequestBodyMissingError('multipart/form-data with a "file" field');
      }

      await fastify.storage.saveFile(path, data.file);

      if (data.file.truncated) {
        // Do not leave a partial upload behind
        await fastify.storage.deleteFile(path);
        throw new UploadTooLargeError(fastify.config.server.uploadLimitBytes);
      }

      const info = await fastify.storage.getFileInfo(path);
      return reply.status(201).send(toFileInfoBody(info));
    }
  );

  done();
};

export const uploadRoutesPlugin = fp(uploadRoutes, {
  name: 'upload-routes',
  fastify: '5.x',
});
