/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Token generation should be consistent and strong across the system.
 * - Recovery tokens and client credentials are both bearer secrets: 32 random bytes
 *   (256 bits of entropy) encoded so they are safe inside URLs.
 *
 * HOW TO USE:
 * - const token = generateSecureToken()
 * - Send token to the client (email link / response body), store only its hash.
 */

import { randomBytes } from 'node:crypto';

export const SECURE_TOKEN_BYTES = 32;

export function generateSecureToken(bytes: number = SECURE_TOKEN_BYTES): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
