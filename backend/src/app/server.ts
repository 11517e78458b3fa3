/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts; routes are registered afterwards (app/routes.ts).
 * - Hook order matters: request context → credential → request log.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerCredentialMiddleware } from '../shared/credential/credential.middleware';
import { registerErrorHandler } from '../shared/http/error-handler';

export function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: opts.config.nodeEnv === 'production',
  });

  registerRequestContext(app);
  registerCredentialMiddleware(app, opts.deps.credentialStore);
  registerErrorHandler(app);

  // Basic request logging (requestId + which session the caller is attached to).
  // Never log headers: the Authorization header carries the credential.
  app.addHook('onRequest', async (req) => {
    logger.http('request', {
      method: req.method,
      url: req.routeOptions.url ?? req.url,
      requestId: req.requestContext.requestId,
      sessionId: req.credentialContext?.sessionId ?? null,
    });
  });

  return app;
}
