import * as Sentry from '@sentry/node';
import type { FastifyBaseLogger } from 'fastify';

// Only initialize if DSN is provided
// This allows running without Sentry in development
export function initSentry(
  dsn: string | undefined,
  environment: string,
  logger: FastifyBaseLogger,
  tracesSampleRate = 0.1
): void {
  if (!dsn) {
    logger.info('Sentry DSN not configured, error tracking disabled');
    return;
  }

  Sentry.init({
    dsn,
    environment,
    tracesSampleRate,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  logger.info({ environment }, 'Sentry initialized');
}

// Re-export Sentry for use in error handler
export { Sentry };
