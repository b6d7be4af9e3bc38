/**
 * backend/src/modules/invites/index.ts
 *
 * WHY:
 * - Public surface of the invites module.
 */

export { createInviteModule } from './invite.module';
export type { InviteModule } from './invite.module';
export { InviteService } from './invite.service';
export type { CreateInviteResult } from './invite.service';
export { InviteErrors } from './invite.errors';
export { toInviteView } from './invite.view';
export type { AcceptedInvite, Invite, InvitePreview, InviteStatus, InviteView } from './invite.types';
