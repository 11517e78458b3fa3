/**
 * backend/src/modules/intake/recovery/recovery-credential.service.ts
 *
 * WHY:
 * - Issues and consumes one-time recovery tokens and enforces the per-identity quota.
 * - Store clients are constructor dependencies (Cache, RateLimiter) so tests swap in
 *   InMemCache without any shared global state.
 *
 * TOKEN LIFECYCLE:
 * - Issued → Consumed (consumeToken) or Issued → Expired (cache TTL). Never updated.
 * - Stored under recovery:token:{sha256(token)} → sessionId. The raw token only
 *   leaves this service inside the recovery message.
 * - consumeToken is a single GETDEL: two concurrent callers can never both succeed.
 *
 * RULES:
 * - issueToken does NOT check the quota; callers run requestRecovery first.
 * - Identity is normalized (trim + lowercase) and hashed before it becomes a key.
 * - Unknown, consumed and expired tokens all produce the same TokenInvalid result.
 * - No AppError here: results are typed, the orchestrator maps them.
 */

import type { Cache } from '../../../shared/cache/cache';
import type { Logger } from '../../../shared/logger/logger';
import type { RateLimiter } from '../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../shared/security/token-hasher';
import { generateSecureToken } from '../../../shared/security/token';

export const RECOVERY_TOKEN_KEY_PREFIX = 'recovery:token';
export const RECOVERY_IDENTITY_KEY_PREFIX = 'recovery:identity';

export type RecoveryPolicy = {
  tokenTtlSeconds: number;
  rateLimit: number;
  rateWindowSeconds: number;
};

export type RecoveryRequestResult =
  | { ok: true; attempt: number }
  | { ok: false; error: { kind: 'RateLimited'; retryAfterSeconds: number } };

export type ConsumeTokenResult =
  | { ok: true; sessionId: string }
  | { ok: false; error: { kind: 'TokenInvalid' } };

export type IssuedRecoveryToken = {
  token: string;
  expiresAt: Date;
};

export function normalizeIdentity(identity: string): string {
  return identity.trim().toLowerCase();
}

export class RecoveryCredentialService {
  constructor(
    private readonly deps: {
      cache: Cache;
      rateLimiter: RateLimiter;
      tokenHasher: TokenHasher;
      logger: Logger;
      policy: RecoveryPolicy;
      now?: () => Date;
    },
  ) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private tokenKey(token: string): string {
    return `${RECOVERY_TOKEN_KEY_PREFIX}:${this.deps.tokenHasher.hash(token)}`;
  }

  identityKey(identity: string): string {
    return `${RECOVERY_IDENTITY_KEY_PREFIX}:${this.deps.tokenHasher.hash(normalizeIdentity(identity))}`;
  }

  /**
   * Counts one recovery attempt for the identity (sliding window).
   * The session id is not part of the key: the quota follows the person, not the session.
   */
  async requestRecovery(identity: string, sessionId: string): Promise<RecoveryRequestResult> {
    const decision = await this.deps.rateLimiter.hit({
      key: this.identityKey(identity),
      limit: this.deps.policy.rateLimit,
      windowSeconds: this.deps.policy.rateWindowSeconds,
      sliding: true,
    });

    if (!decision.allowed) {
      this.deps.logger.warn({
        msg: 'intake.recovery.rate_limited',
        sessionId,
        attempt: decision.count,
        retryAfterSeconds: decision.retryAfterSeconds,
      });

      return {
        ok: false,
        error: { kind: 'RateLimited', retryAfterSeconds: decision.retryAfterSeconds },
      };
    }

    return { ok: true, attempt: decision.count };
  }

  async issueToken(sessionId: string): Promise<IssuedRecoveryToken> {
    const token = generateSecureToken();
    const ttlSeconds = this.deps.policy.tokenTtlSeconds;

    await this.deps.cache.set(this.tokenKey(token), sessionId, { ttlSeconds });

    return {
      token,
      expiresAt: new Date(this.now().getTime() + ttlSeconds * 1000),
    };
  }

  async consumeToken(token: string): Promise<ConsumeTokenResult> {
    if (!token) return { ok: false, error: { kind: 'TokenInvalid' } };

    const sessionId = await this.deps.cache.getDel(this.tokenKey(token));
    if (!sessionId) return { ok: false, error: { kind: 'TokenInvalid' } };

    return { ok: true, sessionId };
  }
}
