import { describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildTestApp } from '../helpers/build-test-app';
import { createSession, getProgress, postAction, readJson, submitField } from '../helpers/intake-requests';
import type { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import type { SessionGrant } from '../../src/modules/intake/intake.types';

/**
 * E2E tests for session recovery:
 * - POST /intake/sessions/:sessionId/recovery  (send a one-time link to the contact email)
 * - POST /intake/recovery/redeem               (trade the token for a fresh credential)
 *
 * Contract:
 * - At most 3 link requests per contact identity per hour (sliding).
 * - A token works exactly once and only within 15 minutes.
 * - Redeeming never revokes credentials issued earlier for the same session.
 */

type ErrorBody = { error: { code: string; message: string } };

async function sessionWithContact(app: FastifyInstance, email = 'Parent@Example.com') {
  const grant = await createSession(app);
  const res = await submitField(app, grant, { fieldName: 'parentEmail', extractedValue: email });
  expect(res.statusCode).toBe(200);
  return grant;
}

function latestToken(queue: InMemQueue): string {
  const [message] = queue.drain().slice(-1);
  if (!message) throw new Error('no recovery message queued');
  return message.recoveryToken;
}

function redeem(app: FastifyInstance, token: string) {
  return app.inject({ method: 'POST', url: '/intake/recovery/redeem', payload: { token } });
}

describe('POST /intake/sessions/:sessionId/recovery', () => {
  it('needs a collected contact email', async () => {
    const { app, queue, close } = await buildTestApp();

    try {
      const grant = await createSession(app);
      const res = await postAction(app, grant, 'recovery');

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorBody>(res).error).toEqual({
        code: 'CONFLICT',
        message: 'No contact email has been collected for this session yet.',
      });
      expect(queue.drain()).toEqual([]);
    } finally {
      await close();
    }
  });

  it('queues a recovery email with a one-time link', async () => {
    const { app, queue, auditRepo, close } = await buildTestApp();

    try {
      const grant = await sessionWithContact(app);
      auditRepo.drain();

      const res = await postAction(app, grant, 'recovery');

      expect(res.statusCode).toBe(200);
      expect(readJson<{ message: string; expiresAt: string }>(res)).toEqual({
        message: 'A recovery link has been sent to the contact email on file.',
        expiresAt: '2026-03-02T09:15:00.000Z',
      });

      const messages = queue.drain();
      expect(messages).toHaveLength(1);

      const [message] = messages;
      expect(message).toMatchObject({
        type: 'intake.recovery-email',
        kind: 'recovery',
        sessionId: grant.session.id,
        email: 'Parent@Example.com',
        expiresAt: '2026-03-02T09:15:00.000Z',
      });
      expect(message?.recoveryUrl).toBe(
        `http://localhost:5173/recover-session?token=${message?.recoveryToken ?? ''}`,
      );

      // The raw token goes out by email only.
      expect(res.body).not.toContain(message?.recoveryToken ?? '');

      expect(auditRepo.drain().map((e) => [e.action, e.metadata])).toEqual([
        ['intake.recovery.requested', { outcome: 'sent' }],
      ]);
    } finally {
      await close();
    }
  });

  it('allows three requests per contact per hour', async () => {
    const { app, queue, auditRepo, close } = await buildTestApp();

    try {
      const grant = await sessionWithContact(app);
      auditRepo.drain();

      for (let i = 0; i < 3; i++) {
        expect((await postAction(app, grant, 'recovery')).statusCode).toBe(200);
      }

      const res = await postAction(app, grant, 'recovery');

      expect(res.statusCode).toBe(429);
      expect(res.headers['retry-after']).toBe('3600');
      expect(readJson<ErrorBody>(res).error).toEqual({
        code: 'RATE_LIMITED',
        message: 'Too many recovery requests. Please try again later.',
      });
      expect(queue.drain()).toHaveLength(3);
      expect(auditRepo.drain().map((e) => e.metadata)).toEqual([
        { outcome: 'sent' },
        { outcome: 'sent' },
        { outcome: 'sent' },
        { outcome: 'rate_limited' },
      ]);
    } finally {
      await close();
    }
  });

  it('counts the quota per person, across sessions and letter case', async () => {
    const { app, close } = await buildTestApp();

    try {
      const first = await sessionWithContact(app, 'Parent@Example.com');
      const second = await sessionWithContact(app, ' parent@example.com');

      for (let i = 0; i < 3; i++) await postAction(app, first, 'recovery');

      const res = await postAction(app, second, 'recovery');
      expect(res.statusCode).toBe(429);

      const stranger = await sessionWithContact(app, 'someone.else@example.com');
      expect((await postAction(app, stranger, 'recovery')).statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('is refused once the session is abandoned', async () => {
    const { app, close } = await buildTestApp();

    try {
      const grant = await sessionWithContact(app);
      await postAction(app, grant, 'abandon');

      const res = await postAction(app, grant, 'recovery');
      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorBody>(res).error.code).toBe('CONFLICT');
    } finally {
      await close();
    }
  });
});

describe('POST /intake/recovery/redeem', () => {
  it('returns the session with a new credential and keeps the old one valid', async () => {
    const { app, queue, clock, auditRepo, close } = await buildTestApp();

    try {
      const original = await sessionWithContact(app);
      await postAction(app, original, 'recovery');
      const token = latestToken(queue);
      auditRepo.drain();

      clock.advanceMinutes(5);
      const res = await redeem(app, token);

      expect(res.statusCode).toBe(200);
      const recovered = readJson<SessionGrant>(res);

      expect(recovered.session).toMatchObject({
        id: original.session.id,
        status: 'InProgress',
        completedFields: ['parentEmail'],
      });
      expect(recovered.credential.credential).not.toBe(original.credential.credential);
      expect(recovered.credential.expiresAt).toBe('2026-03-02T10:05:00.000Z');

      const viaOld = await getProgress(app, original.session.id, original.credential.credential);
      const viaNew = await getProgress(app, original.session.id, recovered.credential.credential);
      expect([viaOld.statusCode, viaNew.statusCode]).toEqual([200, 200]);

      expect(auditRepo.drain().map((e) => [e.action, e.sessionId, e.metadata])).toEqual([
        ['intake.recovery.completed', original.session.id, { status: 'InProgress' }],
      ]);
    } finally {
      await close();
    }
  });

  it('accepts each token only once', async () => {
    const { app, queue, auditRepo, close } = await buildTestApp();

    try {
      const grant = await sessionWithContact(app);
      await postAction(app, grant, 'recovery');
      const token = latestToken(queue);

      expect((await redeem(app, token)).statusCode).toBe(200);
      auditRepo.drain();

      const reuse = await redeem(app, token);

      expect(reuse.statusCode).toBe(400);
      expect(readJson<ErrorBody>(reuse).error).toEqual({
        code: 'TOKEN_INVALID',
        message: 'This recovery link is invalid or has expired. Please request a new one.',
      });
      expect(auditRepo.drain().map((e) => [e.action, e.sessionId, e.metadata])).toEqual([
        ['intake.recovery.failed', null, { reason: 'token_invalid' }],
      ]);
    } finally {
      await close();
    }
  });

  it('rejects a token after 15 minutes', async () => {
    const { app, queue, clock, close } = await buildTestApp();

    try {
      const grant = await sessionWithContact(app);
      await postAction(app, grant, 'recovery');
      const token = latestToken(queue);

      clock.advanceMinutes(16);

      const res = await redeem(app, token);
      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorBody>(res).error.code).toBe('TOKEN_INVALID');
    } finally {
      await close();
    }
  });

  it('keeps earlier tokens usable when a new link is requested', async () => {
    const { app, queue, close } = await buildTestApp();

    try {
      const grant = await sessionWithContact(app);
      await postAction(app, grant, 'recovery');
      await postAction(app, grant, 'recovery');

      const [first, second] = queue.drain();
      expect(first?.recoveryToken).not.toBe(second?.recoveryToken);

      expect((await redeem(app, first?.recoveryToken ?? '')).statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('refuses to resume an abandoned session', async () => {
    const { app, queue, auditRepo, close } = await buildTestApp();

    try {
      const grant = await sessionWithContact(app);
      await postAction(app, grant, 'recovery');
      const token = latestToken(queue);
      await postAction(app, grant, 'abandon');
      auditRepo.drain();

      const res = await redeem(app, token);

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorBody>(res).error).toEqual({
        code: 'CONFLICT',
        message: 'This intake session is no longer active.',
      });
      expect(auditRepo.drain().map((e) => [e.action, e.metadata])).toEqual([
        ['intake.recovery.failed', { reason: 'session_inactive' }],
      ]);
    } finally {
      await close();
    }
  });

  it('refuses to attach a device to a submitted session', async () => {
    const { app, queue, auditRepo, close } = await buildTestApp();

    try {
      const grant = await sessionWithContact(app);
      await postAction(app, grant, 'recovery');
      const token = latestToken(queue);

      for (const status of ['InsurancePending', 'AssessmentComplete', 'Submitted']) {
        expect((await postAction(app, grant, 'status', { status })).statusCode).toBe(200);
      }
      auditRepo.drain();

      const res = await redeem(app, token);

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorBody>(res).error).toEqual({
        code: 'CONFLICT',
        message: 'This intake session is no longer active.',
      });
      expect(auditRepo.drain().map((e) => [e.action, e.metadata])).toEqual([
        ['intake.recovery.failed', { reason: 'session_inactive' }],
      ]);

      // Same rule when asking for a new link.
      expect((await postAction(app, grant, 'recovery')).statusCode).toBe(409);
    } finally {
      await close();
    }
  });

  it('validates the token shape before touching the store', async () => {
    const { app, close } = await buildTestApp();

    try {
      const res = await redeem(app, 'short');

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorBody>(res).error.code).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });
});
