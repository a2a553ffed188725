/**
 * Calculations Module Index
 */

import type { FastifyInstance } from 'fastify';
import { calculationRoutes } from './api/calculation.routes.js';
import { CalculationService } from './services/calculation.service.js';
import type { CalculationRepository } from './storage/calculation.repository.js';

export * from './contracts/calculation.types.js';
export { createCalculation, resolveOperationKind } from './services/calculation.factory.js';
export { evaluate, tryEvaluate, hasZeroDivisor } from './services/calculation.evaluator.js';
export { CalculationService, toCalculationView } from './services/calculation.service.js';
export type { CalculationRepository } from './storage/calculation.repository.js';

export function createCalculationService(app: FastifyInstance, repo: CalculationRepository): CalculationService {
  return new CalculationService(repo, app.log);
}

/**
 * Register Calculation Routes
 */
export async function registerCalculationModule(
  app: FastifyInstance,
  service: CalculationService
): Promise<void> {
  await app.register(calculationRoutes, { service });
  app.log.info('[Calculations] Routes registered at /api/calculations/*');
}
