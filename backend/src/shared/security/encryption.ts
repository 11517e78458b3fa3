/**
 * src/shared/security/encryption.ts
 *
 * WHY:
 * - Collected intake values (names, dates of birth, contact email) are PHI and are
 *   stored encrypted in the session record.
 * - The intake module only sees the FieldCipher boundary; the algorithm is a
 *   deployment decision made in di.ts.
 *
 * FORMAT (EncryptionService):
 * - Stored as: base64(iv || authTag || ciphertext)
 * - iv: 12 bytes (GCM standard nonce size)
 * - authTag: 16 bytes (GCM authentication tag, ensures integrity)
 *
 * KEY:
 * - FIELD_ENCRYPTION_KEY_BASE64: base64-encoded 32-byte key.
 *   Generate with: openssl rand -base64 32
 *
 * RULES:
 * - A new random IV is generated for EVERY encryption call (never reuse IVs).
 * - No business logic here. No DB access.
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

export interface FieldCipher {
  encrypt(plaintext: string): string;
  decrypt(ciphertext: string): string;
}

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12; // bytes — GCM standard
const TAG_LENGTH = 16; // bytes — GCM auth tag

export class EncryptionService implements FieldCipher {
  private readonly key: Buffer;

  constructor(base64Key: string) {
    this.key = Buffer.from(base64Key, 'base64');

    if (this.key.length !== 32) {
      throw new Error(
        `EncryptionService: key must be 32 bytes (256 bits). Got ${this.key.length} bytes. ` +
          'Generate with: openssl rand -base64 32',
      );
    }
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });

    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return Buffer.concat([iv, authTag, encrypted]).toString('base64');
  }

  /**
   * Throws if the ciphertext has been tampered with (GCM auth tag mismatch).
   */
  decrypt(packed64: string): string {
    const packed = Buffer.from(packed64, 'base64');

    if (packed.length < IV_LENGTH + TAG_LENGTH) {
      throw new Error('EncryptionService: ciphertext too short to be valid');
    }

    const iv = packed.subarray(0, IV_LENGTH);
    const authTag = packed.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
    const ciphertext = packed.subarray(IV_LENGTH + TAG_LENGTH);

    const decipher = createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(authTag);

    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
  }
}
