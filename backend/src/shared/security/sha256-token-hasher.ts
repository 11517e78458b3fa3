/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * Concrete TokenHasher using SHA-256 (hex). Deterministic, so the same token
 * always maps to the same cache key.
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken).digest('hex');
  }
}
