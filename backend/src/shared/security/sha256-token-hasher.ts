/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * WHY:
 * - TokenHasher over SHA-256 (hex). Deterministic, so the hash doubles as a lookup key.
 */

import { createHash } from 'node:crypto';

import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken, 'utf8').digest('hex');
  }
}
