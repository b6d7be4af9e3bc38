/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Invitation documents live in the same database clients sync from; a raw token
 *   stored there would be usable by anyone who can read the document.
 * - Services depend on this interface so tests can swap the hash.
 *
 * HOW TO USE:
 * - Generate raw token -> hash it -> store the hash.
 * - When a token is presented -> hash -> look the hash up.
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
