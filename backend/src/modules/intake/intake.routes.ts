/**
 * src/modules/intake/intake.routes.ts
 *
 * WHY:
 * - Declares intake module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { IntakeController } from './intake.controller';

export function registerIntakeRoutes(app: FastifyInstance, controller: IntakeController) {
  app.post('/intake/sessions', controller.createSession.bind(controller));
  app.get('/intake/sessions/:sessionId/progress', controller.getProgress.bind(controller));
  app.post('/intake/sessions/:sessionId/fields', controller.submitField.bind(controller));
  app.post('/intake/sessions/:sessionId/status', controller.advanceStatus.bind(controller));
  app.post('/intake/sessions/:sessionId/abandon', controller.abandonSession.bind(controller));
  app.post(
    '/intake/sessions/:sessionId/credential/refresh',
    controller.refreshCredential.bind(controller),
  );

  // Recovery
  app.post('/intake/sessions/:sessionId/recovery', controller.requestRecovery.bind(controller));
  app.post('/intake/recovery/redeem', controller.redeemRecoveryToken.bind(controller));
}
