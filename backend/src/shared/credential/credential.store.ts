/**
 * src/shared/credential/credential.store.ts
 *
 * WHY:
 * - Server-side client credentials via Redis (through Cache interface).
 * - TTL enforced at Redis level (no expired credential can be read).
 *
 * LIFETIME:
 * - ttl = min(configured credential TTL, time left until the session's own expiry).
 *   The session's expiry is the upper bound for every credential issued for it.
 *
 * SLIDING:
 * - extend() pushes a live credential's expiry out to the same bound, measured from now.
 *   Flows call it on every accepted activity, so a client that keeps working never
 *   outlives its own credential while the session is still running.
 * - rotate() swaps a live credential for a fresh one (client-driven refresh).
 *
 * MULTI-DEVICE:
 * - issue() never touches credentials issued earlier for the same session.
 *   Recovering on a second device leaves the first device signed in.
 *
 * RULES:
 * - Depends only on Cache + TokenHasher (DIP).
 * - No HTTP concerns here (header parsing lives in credential.middleware.ts).
 */

import type { Cache } from '../cache/cache';
import type { TokenHasher } from '../security/token-hasher';
import { generateSecureToken } from '../security/token';
import type { CredentialData, IssuedCredential } from './credential.types';
import { CREDENTIAL_KEY_PREFIX, credentialDataSchema } from './credential.types';

export class CredentialStore {
  constructor(
    private readonly cache: Cache,
    private readonly tokenHasher: TokenHasher,
    private readonly ttlSeconds: number,
  ) {}

  private key(credential: string): string {
    return `${CREDENTIAL_KEY_PREFIX}:${this.tokenHasher.hash(credential)}`;
  }

  private lifetimeSeconds(opts: { now: Date; notAfter: Date }): number {
    const secondsUntilSessionExpiry = Math.floor(
      (opts.notAfter.getTime() - opts.now.getTime()) / 1000,
    );
    return Math.max(1, Math.min(this.ttlSeconds, secondsUntilSessionExpiry));
  }

  async issue(
    data: CredentialData,
    opts: { now: Date; notAfter: Date },
  ): Promise<IssuedCredential> {
    const credential = generateSecureToken();
    const ttlSeconds = this.lifetimeSeconds(opts);

    await this.cache.set(this.key(credential), JSON.stringify(data), { ttlSeconds });

    return {
      credential,
      expiresAt: new Date(opts.now.getTime() + ttlSeconds * 1000),
    };
  }

  /**
   * Returns null if expired, unknown, or corrupted.
   */
  async get(credential: string): Promise<CredentialData | null> {
    const raw = await this.cache.get(this.key(credential));
    if (!raw) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      await this.cache.del(this.key(credential));
      return null;
    }

    const parsed = credentialDataSchema.safeParse(decoded);
    if (!parsed.success) {
      await this.cache.del(this.key(credential));
      return null;
    }

    return parsed.data;
  }

  /**
   * Returns the new expiry, or null when the credential is no longer live
   * (an expired credential is never revived).
   */
  async extend(credential: string, opts: { now: Date; notAfter: Date }): Promise<Date | null> {
    const ttlSeconds = this.lifetimeSeconds(opts);

    const applied = await this.cache.expire(this.key(credential), ttlSeconds);
    if (!applied) return null;

    return new Date(opts.now.getTime() + ttlSeconds * 1000);
  }

  async revoke(credential: string): Promise<void> {
    await this.cache.del(this.key(credential));
  }

  /**
   * Issues the replacement first, then revokes the presented credential:
   * a failure in between leaves the client with two live credentials, never none.
   */
  async rotate(
    credential: string,
    data: CredentialData,
    opts: { now: Date; notAfter: Date },
  ): Promise<IssuedCredential> {
    const issued = await this.issue(data, opts);
    await this.revoke(credential);
    return issued;
  }
}
