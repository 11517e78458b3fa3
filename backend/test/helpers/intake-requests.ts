import type { FastifyInstance } from 'fastify';
import type { SessionGrant } from '../../src/modules/intake/intake.types';

export function readJson<T>(res: { json: () => unknown }): T {
  return res.json() as T;
}

export function bearer(credential: string): Record<string, string> {
  return { authorization: `Bearer ${credential}` };
}

export async function createSession(
  app: FastifyInstance,
  body: Record<string, unknown> = {},
): Promise<SessionGrant> {
  const res = await app.inject({ method: 'POST', url: '/intake/sessions', payload: body });
  if (res.statusCode !== 201) {
    throw new Error(`create session failed: ${res.statusCode} ${res.body}`);
  }
  return readJson<SessionGrant>(res);
}

export function submitField(
  app: FastifyInstance,
  grant: SessionGrant,
  field: {
    fieldName: string;
    extractedValue: string;
    confidence?: number;
    needsClarification?: boolean;
  },
) {
  return app.inject({
    method: 'POST',
    url: `/intake/sessions/${grant.session.id}/fields`,
    headers: bearer(grant.credential.credential),
    payload: { confidence: 0.9, ...field },
  });
}

export function getProgress(app: FastifyInstance, sessionId: string, credential: string) {
  return app.inject({
    method: 'GET',
    url: `/intake/sessions/${sessionId}/progress`,
    headers: bearer(credential),
  });
}

export function postAction(
  app: FastifyInstance,
  grant: SessionGrant,
  action: 'status' | 'abandon' | 'recovery',
  payload?: Record<string, unknown>,
) {
  return app.inject({
    method: 'POST',
    url: `/intake/sessions/${grant.session.id}/${action}`,
    headers: bearer(grant.credential.credential),
    ...(payload ? { payload } : {}),
  });
}
