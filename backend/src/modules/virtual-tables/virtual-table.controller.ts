/**
 * backend/src/modules/virtual-tables/virtual-table.controller.ts
 *
 * WHY:
 * - Maps HTTP -> VirtualTableHandler for `__users`, `__tenants` and `__session`.
 * - Every request resolves its tenant context first (bootstrapping on first contact)
 *   and tells the client to refresh its token when that happened.
 *
 * RULES:
 * - No storage access here.
 * - No business rules here.
 * - Validate params/query with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { z } from 'zod';

import { AppError } from '../../shared/http/errors';
import { internalToExternal } from '../identifiers';
import { beginRequest, type RequestScope } from './request-scope';
import type { VirtualTableHandler } from './virtual-table.handler';
import { ChangesQuerySchema, DocParamsSchema, MemberParamsSchema, RevQuerySchema } from './virtual-table.schemas';

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError(`Invalid ${what}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

export class VirtualTableController {
  constructor(private readonly handler: VirtualTableHandler) {}

  private begin(req: FastifyRequest, reply: FastifyReply): Promise<RequestScope> {
    return beginRequest(this.handler, req, reply);
  }

  // ── session ──

  async session(req: FastifyRequest, reply: FastifyReply) {
    const { tenant } = await this.begin(req, reply);

    return reply.status(200).send({
      userId: internalToExternal(tenant.userId),
      activeTenantId: tenant.activeTenantId,
      bootstrapped: tenant.bootstrapped,
      source: tenant.source,
    });
  }

  // ── __users ──

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const { id } = parseInput(DocParamsSchema, req.params, 'params');

    return reply.status(200).send(await this.handler.getUser(requester, id, ctx));
  }

  async updateUser(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const { id } = parseInput(DocParamsSchema, req.params, 'params');

    return reply.status(201).send(await this.handler.updateUser(requester, id, req.body, ctx));
  }

  async deleteUser(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const { id } = parseInput(DocParamsSchema, req.params, 'params');
    const { rev } = parseInput(RevQuerySchema, req.query, 'query');

    return reply.status(200).send(await this.handler.deleteUser(requester, id, rev, ctx));
  }

  async userChanges(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const { since } = parseInput(ChangesQuerySchema, req.query, 'query');

    const page = await this.handler.userChanges(requester, since, ctx);
    return reply.status(200).send({ results: page.results, last_seq: page.lastSeq });
  }

  async bulkUsers(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);

    return reply.status(201).send(await this.handler.bulkUsers(requester, req.body, ctx));
  }

  // ── __tenants ──

  async listTenants(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const tenants = await this.handler.listTenants(requester, ctx);

    return reply.status(200).send({ total_rows: tenants.length, docs: tenants });
  }

  async createTenant(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);

    return reply.status(201).send(await this.handler.createTenant(requester, req.body, ctx));
  }

  async getTenant(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const { id } = parseInput(DocParamsSchema, req.params, 'params');

    return reply.status(200).send(await this.handler.getTenant(requester, id, ctx));
  }

  async updateTenant(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const { id } = parseInput(DocParamsSchema, req.params, 'params');

    return reply.status(201).send(await this.handler.updateTenant(requester, id, req.body, ctx));
  }

  async deleteTenant(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const { id } = parseInput(DocParamsSchema, req.params, 'params');
    const { rev } = parseInput(RevQuerySchema, req.query, 'query');

    return reply.status(200).send(await this.handler.deleteTenant(requester, id, rev, ctx));
  }

  async tenantChanges(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const { since } = parseInput(ChangesQuerySchema, req.query, 'query');

    const page = await this.handler.tenantChanges(requester, since, ctx);
    return reply.status(200).send({ results: page.results, last_seq: page.lastSeq });
  }

  async bulkTenants(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);

    return reply.status(201).send(await this.handler.bulkTenants(requester, req.body, ctx));
  }

  async addMember(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const { id, userId } = parseInput(MemberParamsSchema, req.params, 'params');

    return reply.status(200).send(await this.handler.addMember(requester, id, userId, ctx));
  }

  async removeMember(req: FastifyRequest, reply: FastifyReply) {
    const { requester, ctx } = await this.begin(req, reply);
    const { id, userId } = parseInput(MemberParamsSchema, req.params, 'params');

    return reply.status(200).send(await this.handler.removeMember(requester, id, userId, ctx));
  }
}
