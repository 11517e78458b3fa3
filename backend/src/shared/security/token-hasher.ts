/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Raw recovery tokens and credentials never become cache keys: a dump of Redis
 *   must not yield usable secrets.
 * - Contact identities (emails) are hashed the same way before they become
 *   rate-limit keys, so no PHI lands in infra keys.
 *
 * NOTE:
 * - Callers depend on this interface, not on the SHA-256 implementation.
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
