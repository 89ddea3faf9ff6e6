/**
 * Inspection Module Entry Point
 */

import type { FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { registerInspectionRoutes } from '../api/inspection.routes.js';
import { InMemoryDefinitionStore } from '../storage/definition.store.js';
import { defaultClock, defaultLogger, type InspectionHostDeps } from './inspection.host.deps.js';
import { InspectionService } from './inspection.service.js';

export async function registerInspectionModule(
  fastify: FastifyInstance,
  deps: Partial<InspectionHostDeps> = {}
): Promise<void> {
  const resolved: InspectionHostDeps = {
    logger: deps.logger ?? defaultLogger,
    clock: deps.clock ?? defaultClock,
    store: deps.store ?? new InMemoryDefinitionStore(),
    newRunId: deps.newRunId ?? (() => uuidv4()),
  };

  const service = new InspectionService(resolved);
  await fastify.register(async instance => registerInspectionRoutes(instance, service));

  resolved.logger.info({ store: resolved.store.constructor.name }, '[Inspection] Module registered');
}
