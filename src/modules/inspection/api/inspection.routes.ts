/**
 * Inspection Routes
 *
 * POST /api/inspection/runs                  full evaluation run
 * GET  /api/inspection/runs/:runId/definition stored high-risk definition
 * POST /api/inspection/label                 ground-truth labeling only
 * POST /api/inspection/select/budgeted       follow-up selection only
 * POST /api/inspection/proxy                 cross-source plausibility
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { InspectionService } from '../runtime/inspection.service.js';

export async function registerInspectionRoutes(app: FastifyInstance, service: InspectionService): Promise<void> {
  const prefix = '/api/inspection';

  app.post(`${prefix}/runs`, async (request, reply) => {
    const run = await service.createRun(request.body);
    return reply.status(201).send({ ok: true, ...run });
  });

  app.get(
    `${prefix}/runs/:runId/definition`,
    async (request: FastifyRequest<{ Params: { runId: string } }>) => {
      const stored = await service.getDefinition(request.params.runId);
      return { ok: true, ...stored };
    }
  );

  app.post(`${prefix}/label`, async request => {
    const { mask, definition } = service.label(request.body);
    return {
      ok: true,
      definition,
      mask,
      highRiskCount: definition.k,
    };
  });

  app.post(`${prefix}/select/budgeted`, async request => {
    return { ok: true, ...service.selectBudgeted(request.body) };
  });

  app.post(`${prefix}/proxy`, async request => {
    return { ok: true, verdict: service.proxy(request.body) };
  });
}
