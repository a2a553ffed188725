/**
 * Auth plugin
 *
 * Registers @fastify/jwt, exposes app.tokens, and an app.authenticate
 * preHandler that resolves the bearer token to an active user.
 */

import fp from 'fastify-plugin';
import fastifyJwt from '@fastify/jwt';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import { UnauthorizedError } from '../../common/errors.js';
import type { User } from '../users/contracts/user.types.js';
import type { TokenClaims, VerifiedClaims } from './contracts/auth.types.js';
import { TokenService, type TokenSettings } from './services/token.service.js';
import type { TokenBlacklist } from './storage/token-blacklist.js';

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: TokenClaims;
    user: TokenClaims;
  }
}

declare module 'fastify' {
  interface FastifyInstance {
    tokens: TokenService;
    authenticate(req: FastifyRequest): Promise<void>;
  }

  interface FastifyRequest {
    currentUser: User | null;
    tokenClaims: VerifiedClaims | null;
  }
}

export interface ActiveUserLookup {
  getActiveUser(id: string): Promise<User>;
}

export interface AuthPluginOptions {
  secret: string;
  settings: TokenSettings;
  blacklist: TokenBlacklist;
  users: ActiveUserLookup;
}

export function bearerToken(req: FastifyRequest): string {
  const header = req.headers.authorization;
  if (!header) {
    throw new UnauthorizedError('Not authenticated');
  }

  const [scheme, token] = header.split(' ');
  if (scheme.toLowerCase() !== 'bearer' || !token) {
    throw new UnauthorizedError('Invalid authorization header');
  }
  return token;
}

/**
 * For handlers behind app.authenticate.
 */
export function requireUser(req: FastifyRequest): User {
  if (!req.currentUser) {
    throw new UnauthorizedError('Not authenticated');
  }
  return req.currentUser;
}

export function requireClaims(req: FastifyRequest): VerifiedClaims {
  if (!req.tokenClaims) {
    throw new UnauthorizedError('Not authenticated');
  }
  return req.tokenClaims;
}

async function auth(app: FastifyInstance, opts: AuthPluginOptions): Promise<void> {
  await app.register(fastifyJwt, { secret: opts.secret });

  const tokens = new TokenService(app.jwt, opts.blacklist, opts.settings);

  app.decorate('tokens', tokens);
  app.decorateRequest('currentUser', null);
  app.decorateRequest('tokenClaims', null);

  app.decorate('authenticate', async function authenticate(req: FastifyRequest): Promise<void> {
    const claims = await tokens.verify(bearerToken(req), 'access');
    req.tokenClaims = claims;
    req.currentUser = await opts.users.getActiveUser(claims.sub);
  });
}

export const authPlugin = fp(auth, { name: 'auth' });
