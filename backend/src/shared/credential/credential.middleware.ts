/**
 * backend/src/shared/credential/credential.middleware.ts
 *
 * WHY:
 * - Reads the bearer credential on every request.
 * - If it resolves to a live credential, populates req.credentialContext.
 * - Does NOT throw if no credential — endpoints decide if one is required
 *   (see require-credential.ts).
 *
 * RULES:
 * - Runs AFTER requestContext.
 * - Best-effort: if the header is missing/malformed/expired, credentialContext stays null.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { CredentialStore } from './credential.store';
import type { CredentialOrigin } from './credential.types';
import { CREDENTIAL_HEADER, CREDENTIAL_SCHEME } from './credential.types';

export type CredentialContext = {
  /** The presented bearer value; flows extend or rotate it. */
  credential: string;
  sessionId: string;
  origin: CredentialOrigin;
};

declare module 'fastify' {
  interface FastifyRequest {
    credentialContext: CredentialContext | null;
  }
}

export function parseBearer(raw: string | string[] | undefined): string | null {
  if (typeof raw !== 'string') return null;

  const [scheme, value, ...rest] = raw.trim().split(/\s+/);
  if (rest.length > 0 || !value) return null;
  if (scheme?.toLowerCase() !== CREDENTIAL_SCHEME.toLowerCase()) return null;

  return value;
}

export function registerCredentialMiddleware(
  app: FastifyInstance,
  credentialStore: CredentialStore,
): void {
  app.decorateRequest('credentialContext', null);

  app.addHook('onRequest', async (req: FastifyRequest) => {
    req.credentialContext = null;

    const credential = parseBearer(req.headers[CREDENTIAL_HEADER]);
    if (!credential) return;

    const data = await credentialStore.get(credential);
    if (!data) return;

    req.credentialContext = {
      credential,
      sessionId: data.sessionId,
      origin: data.origin,
    };
  });
}
