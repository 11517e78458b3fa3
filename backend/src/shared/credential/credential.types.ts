/**
 * src/shared/credential/credential.types.ts
 *
 * WHY:
 * - Defines the server-side client credential model.
 * - A credential is an opaque bearer string that re-attaches a client (browser, phone)
 *   to one intake session. Several credentials may be live for the same session at once.
 *
 * RULES:
 * - Credential data must be JSON-serializable (stored in Redis as JSON string).
 * - Only the SHA-256 of the credential is used as a key.
 */

import { z } from 'zod';

export const credentialDataSchema = z.object({
  sessionId: z.string().min(1),
  origin: z.enum(['created', 'recovered', 'refreshed']),
  issuedAt: z.string(), // ISO string (JSON-safe)
});

export type CredentialData = z.infer<typeof credentialDataSchema>;

export type CredentialOrigin = CredentialData['origin'];

export type IssuedCredential = {
  credential: string;
  expiresAt: Date;
};

/**
 * Full key: `credential:{sha256(credential)}`.
 */
export const CREDENTIAL_KEY_PREFIX = 'credential';

export const CREDENTIAL_HEADER = 'authorization';
export const CREDENTIAL_SCHEME = 'Bearer';
