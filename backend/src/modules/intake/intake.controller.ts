/**
 * src/modules/intake/intake.controller.ts
 *
 * WHY:
 * - Maps HTTP → orchestrator call for all intake endpoints.
 * - Returns structured responses; the orchestrator result shapes are the wire shapes.
 *
 * RULES:
 * - No store access here.
 * - No business rules here.
 * - Every session-scoped route requires a credential for THAT session
 *   (requireSessionCredential). Creation and token redemption are the two open doors.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import { AppError } from '../../shared/http/errors';
import { requireSessionCredential } from '../../shared/http/require-credential';
import type { IntakeOrchestrator } from './intake.orchestrator';
import type { RequestMeta } from './intake.types';
import {
  advanceStatusSchema,
  createSessionSchema,
  redeemRecoverySchema,
  sessionParamsSchema,
  submitFieldSchema,
} from './intake.schemas';

const RECOVERY_REQUESTED_RESPONSE = {
  message: 'A recovery link has been sent to the contact email on file.',
} as const;

function parseOrThrow<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown, message: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw AppError.validationError(message, { issues: parsed.error.issues });
  }
  return parsed.data;
}

function requestMeta(req: FastifyRequest): RequestMeta {
  return {
    requestId: req.requestContext.requestId,
    ip: req.ip,
    userAgent: req.headers['user-agent'] ?? null,
  };
}

export class IntakeController {
  constructor(private readonly orchestrator: IntakeOrchestrator) {}

  private sessionFor(req: FastifyRequest): { sessionId: string; credential: string } {
    const { sessionId } = parseOrThrow(sessionParamsSchema, req.params, 'Invalid session id');
    const ctx = requireSessionCredential(req, sessionId);
    return { sessionId, credential: ctx.credential };
  }

  async createSession(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(createSessionSchema, req.body ?? undefined, 'Invalid request body');

    const result = await this.orchestrator.createSession({
      referralSource: body.referralSource ?? null,
      meta: requestMeta(req),
    });

    return reply.status(201).send(result);
  }

  async getProgress(req: FastifyRequest, reply: FastifyReply) {
    const { sessionId } = this.sessionFor(req);

    const result = await this.orchestrator.getProgress({ sessionId, meta: requestMeta(req) });
    return reply.status(200).send(result);
  }

  async submitField(req: FastifyRequest, reply: FastifyReply) {
    const { sessionId, credential } = this.sessionFor(req);
    const body = parseOrThrow(submitFieldSchema, req.body, 'Invalid request body');

    const next = await this.orchestrator.submitField({
      sessionId,
      credential,
      extraction: body,
      meta: requestMeta(req),
    });

    return reply.status(200).send(next);
  }

  async advanceStatus(req: FastifyRequest, reply: FastifyReply) {
    const { sessionId, credential } = this.sessionFor(req);
    const body = parseOrThrow(advanceStatusSchema, req.body, 'Invalid request body');

    const session = await this.orchestrator.advanceStatus({
      sessionId,
      credential,
      target: body.status,
      meta: requestMeta(req),
    });

    return reply.status(200).send({ session });
  }

  async abandonSession(req: FastifyRequest, reply: FastifyReply) {
    const { sessionId } = this.sessionFor(req);

    const session = await this.orchestrator.abandonSession({ sessionId, meta: requestMeta(req) });
    return reply.status(200).send({ session, success: true });
  }

  async refreshCredential(req: FastifyRequest, reply: FastifyReply) {
    const { sessionId, credential } = this.sessionFor(req);

    const grant = await this.orchestrator.refreshCredential({
      sessionId,
      credential,
      meta: requestMeta(req),
    });

    return reply.status(200).send({ credential: grant });
  }

  async requestRecovery(req: FastifyRequest, reply: FastifyReply) {
    const { sessionId } = this.sessionFor(req);

    const result = await this.orchestrator.requestRecovery({ sessionId, meta: requestMeta(req) });

    return reply.status(200).send({ ...RECOVERY_REQUESTED_RESPONSE, expiresAt: result.expiresAt });
  }

  async redeemRecoveryToken(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(redeemRecoverySchema, req.body, 'Invalid request body');

    const result = await this.orchestrator.redeemRecoveryToken({
      token: body.token,
      meta: requestMeta(req),
    });

    return reply.status(200).send(result);
  }
}
