/**
 * backend/src/shared/http/require-credential.ts
 *
 * WHY:
 * - Controllers must not duplicate "require a credential for THIS session" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or stores.
 * - Throws AppError so error-handler maps it consistently.
 *
 * Guard sequence:
 * 1) no credential -> 401 "Authentication required"
 * 2) credential for another session -> 403 "Credential does not grant access to this session."
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { CredentialContext } from '../credential/credential.middleware';

export function requireSessionCredential(
  req: FastifyRequest,
  sessionId: string,
): Readonly<CredentialContext> {
  const ctx = req.credentialContext;
  if (!ctx) throw AppError.unauthorized('Authentication required');

  if (ctx.sessionId !== sessionId) {
    throw AppError.forbidden('Credential does not grant access to this session.');
  }

  return { credential: ctx.credential, sessionId: ctx.sessionId, origin: ctx.origin };
}
