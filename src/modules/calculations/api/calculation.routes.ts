/**
 * CALCULATION API ROUTES (Fastify)
 * ================================
 *
 * GET    /api/calculations      - Browse own calculations (?skip, ?limit)
 * GET    /api/calculations/:id  - Read
 * POST   /api/calculations      - Add
 * PUT    /api/calculations/:id  - Edit (both fields)
 * PATCH  /api/calculations/:id  - Edit (either field)
 * DELETE /api/calculations/:id  - Delete
 *
 * All routes require a bearer access token.
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { requireUser } from '../../auth/auth.plugin.js';
import { BrowseQuerySchema, CalculationIdParamsSchema } from '../contracts/calculation.schemas.js';
import type { CalculationService } from '../services/calculation.service.js';

export interface CalculationRoutesOpts extends FastifyPluginOptions {
  service: CalculationService;
}

export async function calculationRoutes(app: FastifyInstance, opts: CalculationRoutesOpts): Promise<void> {
  const { service } = opts;

  app.addHook('preHandler', app.authenticate);

  app.get('/api/calculations', async (req) => {
    const user = requireUser(req);
    const page = req.parseQuery(BrowseQuerySchema);
    return service.browse(user.id, page);
  });

  app.get('/api/calculations/:id', async (req) => {
    const user = requireUser(req);
    const { id } = req.parseParams(CalculationIdParamsSchema);
    return service.read(id, user.id);
  });

  app.post('/api/calculations', async (req, reply) => {
    const user = requireUser(req);
    const created = await service.add(user.id, req.body ?? {});
    return reply.status(201).send(created);
  });

  app.put('/api/calculations/:id', async (req) => {
    const user = requireUser(req);
    const { id } = req.parseParams(CalculationIdParamsSchema);
    return service.replace(id, user.id, req.body ?? {});
  });

  app.patch('/api/calculations/:id', async (req) => {
    const user = requireUser(req);
    const { id } = req.parseParams(CalculationIdParamsSchema);
    return service.edit(id, user.id, req.body ?? {});
  });

  app.delete('/api/calculations/:id', async (req, reply) => {
    const user = requireUser(req);
    const { id } = req.parseParams(CalculationIdParamsSchema);
    await service.remove(id, user.id);
    return reply.status(204).send();
  });
}
