/**
 * USER & AUTH ROUTES (Fastify)
 * ============================
 *
 * POST   /auth/register       - Create account
 * POST   /auth/login          - JSON credentials -> token pair
 * POST   /auth/token          - Same, also accepts form-encoded credentials
 * POST   /auth/refresh        - Refresh token -> new token pair
 * POST   /auth/logout         - Revoke the current access token, and the
 *                                refresh token if the body carries one
 *
 * GET    /users/me            - Current user
 * PUT    /users/me/profile    - Update names / email / username
 * PUT    /users/me/password   - Change password
 * DELETE /users/me            - Delete account and its calculations
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import { requireClaims, requireUser } from '../../auth/auth.plugin.js';
import type { TokenResponse } from '../../auth/contracts/auth.types.js';
import { LoginSchema } from '../contracts/user.schemas.js';
import { toUserView, type User } from '../contracts/user.types.js';
import type { UserService } from '../services/user.service.js';

const RefreshSchema = z.object({
  refreshToken: z.string().min(1, 'Refresh token is required'),
});

const LogoutSchema = z.object({
  refreshToken: z.string().min(1, 'Refresh token must not be empty').optional(),
});

export interface UserRoutesOpts extends FastifyPluginOptions {
  service: UserService;
}

export async function authRoutes(app: FastifyInstance, opts: UserRoutesOpts): Promise<void> {
  const { service } = opts;

  const tokenResponse = (user: User): TokenResponse => ({
    ...app.tokens.issue(user.id),
    user: toUserView(user),
  });

  app.post('/auth/register', async (req, reply) => {
    const user = await service.register(req.body ?? {});
    return reply.status(201).send(toUserView(user));
  });

  app.post('/auth/login', async (req) => {
    const user = await service.authenticate(req.parseBody(LoginSchema));
    req.log.info({ userId: user.id }, '[Auth] login');
    return tokenResponse(user);
  });

  // form-encoded bodies are parsed by @fastify/formbody into the same shape
  app.post('/auth/token', async (req) => {
    const user = await service.authenticate(req.parseBody(LoginSchema));
    req.log.info({ userId: user.id }, '[Auth] token issued');
    return tokenResponse(user);
  });

  app.post('/auth/refresh', async (req) => {
    const { refreshToken } = req.parseBody(RefreshSchema);
    const { userId, tokens } = await app.tokens.refresh(refreshToken);
    const user = await service.getActiveUser(userId);
    return { ...tokens, user: toUserView(user) };
  });

  app.post('/auth/logout', { preHandler: app.authenticate }, async (req) => {
    const { refreshToken } = req.parseBody(LogoutSchema);
    const user = requireUser(req);

    if (refreshToken !== undefined) {
      await app.tokens.revokeRefresh(refreshToken, user.id);
    }
    await app.tokens.revoke(requireClaims(req));
    req.log.info({ userId: user.id, refreshRevoked: refreshToken !== undefined }, '[Auth] logout');
    return { ok: true, message: 'Successfully logged out' };
  });
}

export async function userRoutes(app: FastifyInstance, opts: UserRoutesOpts): Promise<void> {
  const { service } = opts;

  app.addHook('preHandler', app.authenticate);

  app.get('/users/me', async (req) => {
    return toUserView(requireUser(req));
  });

  app.put('/users/me/profile', async (req) => {
    const updated = await service.updateProfile(requireUser(req), req.body ?? {});
    return toUserView(updated);
  });

  app.put('/users/me/password', async (req) => {
    await service.changePassword(requireUser(req), req.body ?? {});
    return { ok: true, message: 'Password changed successfully' };
  });

  app.delete('/users/me', async (req, reply) => {
    const user = requireUser(req);
    await service.deleteAccount(user);
    await app.tokens.revoke(requireClaims(req));
    return reply.status(204).send();
  });
}
