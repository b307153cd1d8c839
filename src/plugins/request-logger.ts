import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';

interface RequestLoggerOptions {
  isDev: boolean;
}

/** Storage path addressed by a wildcard route, if any. */
function storagePath(params: unknown): string | undefined {
  if (typeof params === 'object' && params !== null && '*' in params) {
    const value = params['*'];
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

const requestLogger: FastifyPluginCallback<RequestLoggerOptions> = (fastify, options, done) => {
  const { isDev } = options;

  fastify.addHook('onRequest', async (request) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      url: request.url,
      requestId: request.id,
    };

    // Headers in dev only; bodies are file content and never logged
    if (isDev) {
      logData.userAgent = request.headers['user-agent'];
      logData.contentType = request.headers['content-type'];
    }

    request.log.info(logData, 'Incoming request');
  });

  fastify.addHook('onResponse', async (request, reply) => {
    const logData: Record<string, unknown> = {
      method: request.method,
      route: request.routeOptions.url,
      path: storagePath(request.params),
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id,
    };

    if (reply.statusCode >= 500) {
      request.log.error(logData, 'Request completed with server error');
    } else if (reply.statusCode >= 400) {
      request.log.warn(logData, 'Request completed with client error');
    } else {
      request.log.info(logData, 'Request completed');
    }
  });

  done();
};

export const requestLoggerPlugin = fp(requestLogger, {
  name: 'request-logger',
  fastify: '5.x',
});
