// =============================================================
// File: server/routes/production.ts
// Module: Production
// Description: Print jobs and production stage transitions.
// =============================================================

import { FastifyInstance } from 'fastify';
import { authenticate, requestContext } from '../plugins/auth.plugin';
import {
  addStageBody,
  cancelBody,
  createPrintJobBody,
  idParams,
  jobStatusBody,
  progressBody,
  transitionBody,
} from './schemas';

export async function productionRoutes(server: FastifyInstance) {
  const { printJobs, stages } = server.services;

  // ──────────────────────────────────────────────────────────
  // Print jobs
  // ──────────────────────────────────────────────────────────
  server.post('/print-jobs', { preHandler: [authenticate] }, async (request, reply) => {
    const body = createPrintJobBody.parse(request.body);
    const data = await printJobs.createPrintJob(requestContext(request), body);
    return reply.code(201).send({ success: true, data, message: `Print job ${data.job.job_number} created` });
  });

  server.get('/print-jobs/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const data = await printJobs.getPrintJob(requestContext(request).companyId, id);
    return { success: true, data };
  });

  server.post('/print-jobs/:id/start', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const data = await printJobs.startProduction(requestContext(request), id);
    return { success: true, data };
  });

  server.post('/print-jobs/:id/progress', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const body = progressBody.parse(request.body);
    const data = await printJobs.updateProgress(requestContext(request), id, body.percentage, body.notes);
    return { success: true, data };
  });

  server.post('/print-jobs/:id/recompute', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const data = await printJobs.recomputeJobProgress(requestContext(request), id);
    return { success: true, data };
  });

  server.post('/print-jobs/:id/status', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const body = jobStatusBody.parse(request.body);
    const data = await printJobs.updateJobStatus(requestContext(request), id, body.status, body.notes);
    return { success: true, data };
  });

  server.post('/print-jobs/:id/cancel', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const body = cancelBody.parse(request.body);
    const data = await printJobs.cancel(requestContext(request), id, body.reason);
    return { success: true, data };
  });

  server.post('/print-jobs/:id/stages', { preHandler: [authenticate] }, async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const body = addStageBody.parse(request.body);
    const data = await stages.addStage(requestContext(request), id, body);
    return reply.code(201).send({ success: true, data });
  });

  // ──────────────────────────────────────────────────────────
  // Production stages
  // ──────────────────────────────────────────────────────────
  server.get('/production-stages/pending-approvals', { preHandler: [authenticate] }, async (request) => {
    const data = await stages.pendingApprovals(requestContext(request).companyId);
    return { success: true, data };
  });

  server.get('/production-stages/:id', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const companyId = requestContext(request).companyId;
    const [detail, next, previous] = await Promise.all([
      stages.getStage(companyId, id),
      stages.nextStage(companyId, id),
      stages.previousStage(companyId, id),
    ]);
    return { success: true, data: { ...detail, next_stage: next, previous_stage: previous } };
  });

  // ──────────────────────────────────────────────────────────
  // POST /production-stages/:id/transitions — { event, notes?, stage_data? }
  // ──────────────────────────────────────────────────────────
  server.post('/production-stages/:id/transitions', { preHandler: [authenticate] }, async (request) => {
    const { id } = idParams.parse(request.params);
    const body = transitionBody.parse(request.body);
    const result = await stages.transitionStage(requestContext(request), id, body.event, {
      notes: body.notes,
      stage_data: body.stage_data,
    });
    if (!result.ok) {
      throw result.error;
    }
    const { ok: _ok, ...data } = result;
    return { success: true, data };
  });
}
