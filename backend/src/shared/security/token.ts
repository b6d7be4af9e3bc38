/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Invitation tokens are bearer secrets; they must be unguessable and safe to paste into a link.
 *
 * HOW TO USE:
 * - const token = generateSecureToken()
 * - Hand the raw token to the inviter once; store only its hash.
 */

import { randomBytes } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
