// =============================================================
// File: server/routes/weight-pricing.ts
// Module: Pricing
// Description: Tier maintenance, weight quotes, breakdowns and
//              tier table analysis.
// =============================================================

import { FastifyInstance } from 'fastify';
import { authenticate, requestContext } from '../plugins/auth.plugin';
import { breakdownQuery, idParams, quoteQuery, tierBody, tierUpdateBody } from './schemas';

export async function weightPricingRoutes(server: FastifyInstance) {
  const { weightPricing } = server.services;

  // ──────────────────────────────────────────────────────────
  // GET /weight-pricing-tiers — All tiers for the company
  // ──────────────────────────────────────────────────────────
  server.get('/weight-pricing-tiers', { preHandler: [authenticate] }, async (request) => {
    const ctx = requestContext(request);
    const data = await weightPricing.listTiers(ctx.companyId);
    return { success: true, data };
  });

  server.post('/weight-pricing-tiers', { preHandler: [authenticate] }, async (request, reply) => {
    const body = tierBody.parse(request.body);
    const data = await weightPricing.createTier(requestContext(request), body);
    return reply.code(201).send({ success: true, data, message: `Tier "${data.tier_name}" created` });
  });

  server.put('/weight-pricing-tiers/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const body = tierUpdateBody.parse(request.body);
    const data = await weightPricing.updateTier(requestContext(request), id, body);
    return { success: true, data };
  });

  server.delete('/weight-pricing-tiers/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    await weightPricing.deleteTier(requestContext(request), id);
    return { success: true, message: 'Tier deleted' };
  });

  // ──────────────────────────────────────────────────────────
  // GET /weight-pricing/quote?weight= — Delivery charge for one weight
  // ──────────────────────────────────────────────────────────
  server.get('/weight-pricing/quote', { preHandler: [authenticate] }, async (request) => {
    const { weight } = quoteQuery.parse(request.query);
    const data = await weightPricing.priceForWeight(requestContext(request).companyId, weight);
    return { success: true, data };
  });

  // ?weights=1,2.5,7 or the sample table when omitted
  server.get('/weight-pricing/breakdown', { preHandler: [authenticate] }, async (request) => {
    const { weights } = breakdownQuery.parse(request.query);
    const companyId = requestContext(request).companyId;
    const data = weights
      ? await weightPricing.pricingBreakdown(companyId, weights)
      : await weightPricing.samplePricingTable(companyId);
    return { success: true, data };
  });

  server.get('/weight-pricing/analysis', { preHandler: [authenticate] }, async (request) => {
    const data = await weightPricing.analyzeTiers(requestContext(request).companyId);
    return { success: true, data };
  });
}
