/**
 * backend/src/modules/invites/invite.controller.ts
 *
 * WHY:
 * - Maps HTTP -> InviteService.
 * - Authenticated endpoints resolve tenant context first, like every gateway request,
 *   so accepting an invite on first contact bootstraps the user.
 *
 * RULES:
 * - No storage access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';

import { AppError } from '../../shared/http/errors';
import type { CallContext } from '../../shared/http/request-context';
import { externalToInternal, isInviteId } from '../identifiers';
import { IdentifierErrors } from '../identifiers/identifier.errors';
import { beginRequest, type TenantContextResolver } from '../virtual-tables';
import {
  CreateInviteSchema,
  InviteParamsSchema,
  InviteTokenSchema,
  ListInvitesQuerySchema,
  TenantInviteParamsSchema,
} from './invite.schemas';
import type { InviteService } from './invite.service';
import type { CreatedInvite } from './invite.types';
import { toInviteView } from './invite.view';

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError(`Invalid ${what}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

function inviteIdFrom(raw: string): string {
  if (!isInviteId(raw)) throw IdentifierErrors.malformed({ collection: 'invitation', id: raw });
  return raw;
}

export class InviteController {
  constructor(
    private readonly inviteService: InviteService,
    private readonly contexts: TenantContextResolver,
  ) {}

  async createInvite(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await beginRequest(this.contexts, req, reply);
    const { id } = parseInput(TenantInviteParamsSchema, req.params, 'params');
    const input = parseInput(CreateInviteSchema, req.body ?? {}, 'request body');

    const tenantId = externalToInternal('tenant', id);
    const { invite, token } = await this.inviteService.create(requester.userId, tenantId, input, ctx);

    const created: CreatedInvite = { ...toInviteView(invite), token };
    return reply.status(201).send(created);
  }

  async listInvites(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await beginRequest(this.contexts, req, reply);
    const { id } = parseInput(TenantInviteParamsSchema, req.params, 'params');
    const { status } = parseInput(ListInvitesQuerySchema, req.query, 'query');

    const tenantId = externalToInternal('tenant', id);
    const invites = await this.inviteService.list(requester.userId, tenantId, status, ctx);

    return reply.status(200).send({ total_rows: invites.length, docs: invites.map(toInviteView) });
  }

  async revokeInvite(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await beginRequest(this.contexts, req, reply);
    const { id, inviteId } = parseInput(InviteParamsSchema, req.params, 'params');

    const revoked = await this.inviteService.revoke(
      requester.userId,
      externalToInternal('tenant', id),
      inviteIdFrom(inviteId),
      ctx,
    );

    return reply.status(200).send(toInviteView(revoked));
  }

  /** Unauthenticated: the token is the credential. */
  async previewInvite(req: FastifyRequest, reply: FastifyReply) {
    const { token } = parseInput(InviteTokenSchema, req.body, 'request body');
    const ctx: CallContext = {
      requestId: req.requestContext.requestId,
      signal: req.requestContext.signal,
    };

    return reply.status(200).send(await this.inviteService.preview(token, ctx));
  }

  async acceptInvite(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await beginRequest(this.contexts, req, reply);
    const { token } = parseInput(InviteTokenSchema, req.body, 'request body');

    return reply.status(200).send(await this.inviteService.accept(requester.userId, token, ctx));
  }
}
