/**
 * Users Module Index
 */

import type { FastifyInstance } from 'fastify';
import { authRoutes, userRoutes } from './api/user.routes.js';
import { UserService, type OwnedCalculations } from './services/user.service.js';
import type { UserRepository } from './storage/user.repository.js';

export * from './contracts/user.types.js';
export { UserService } from './services/user.service.js';
export type { UserRepository } from './storage/user.repository.js';

export function createUserService(
  app: FastifyInstance,
  repo: UserRepository,
  calculations: OwnedCalculations
): UserService {
  return new UserService(repo, calculations, app.log);
}

/**
 * Register /auth/* and /users/me/* routes
 */
export async function registerUserModule(app: FastifyInstance, service: UserService): Promise<void> {
  await app.register(authRoutes, { service });
  await app.register(userRoutes, { service });
  app.log.info('[Users] Routes registered at /auth/*, /users/me/*');
}
