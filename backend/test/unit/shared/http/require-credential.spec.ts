import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import { requireSessionCredential } from '../../../../src/shared/http/require-credential';

const SESSION_ID = '6f1c2a34-5b6d-4e7f-8a9b-0c1d2e3f4a5b';

function makeReq(credentialContext: unknown): FastifyRequest {
  return { credentialContext } as unknown as FastifyRequest;
}

function captureError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(AppError);
    return err as AppError;
  }
  throw new Error('expected an AppError');
}

describe('requireSessionCredential', () => {
  it('throws 401 when no credential is present', () => {
    const e = captureError(() => requireSessionCredential(makeReq(null), SESSION_ID));

    expect(e.status).toBe(401);
    expect(e.message).toBe('Authentication required');
  });

  it('throws 403 when the credential belongs to another session', () => {
    const req = makeReq({ credential: 'test-credential', sessionId: 'other-session', origin: 'created' });
    const e = captureError(() => requireSessionCredential(req, SESSION_ID));

    expect(e.status).toBe(403);
    expect(e.message).toBe('Credential does not grant access to this session.');
  });

  it('returns the context when the credential matches', () => {
    const req = makeReq({ credential: 'test-credential', sessionId: SESSION_ID, origin: 'recovered' });

    expect(requireSessionCredential(req, SESSION_ID)).toEqual({
      credential: 'test-credential',
      sessionId: SESSION_ID,
      origin: 'recovered',
    });
  });
});
