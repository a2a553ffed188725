/**
 * TOKEN SERVICE
 *
 * Issues access/refresh pairs, verifies them, and revokes them on logout
 * or refresh rotation. Signing is done by @fastify/jwt (HS256).
 */

import type { JWT } from '@fastify/jwt';
import { v4 as uuidv4 } from 'uuid';
import { UnauthorizedError } from '../../../common/errors.js';
import type { TokenBlacklist } from '../storage/token-blacklist.js';
import {
  VerifiedClaimsSchema,
  type IssuedTokens,
  type TokenType,
  type VerifiedClaims,
} from '../contracts/auth.types.js';

export interface TokenSettings {
  accessTokenMinutes: number;
  refreshTokenDays: number;
}

const MINUTE_MS = 60 * 1000;

export class TokenService {
  constructor(
    private readonly jwt: JWT,
    private readonly blacklist: TokenBlacklist,
    private readonly settings: TokenSettings,
    private readonly now: () => number = Date.now
  ) {}

  issue(userId: string): IssuedTokens {
    const { accessTokenMinutes, refreshTokenDays } = this.settings;

    const accessToken = this.jwt.sign(
      { sub: userId, type: 'access', jti: uuidv4() },
      { expiresIn: `${accessTokenMinutes}m` }
    );
    const refreshToken = this.jwt.sign(
      { sub: userId, type: 'refresh', jti: uuidv4() },
      { expiresIn: `${refreshTokenDays}d` }
    );

    return {
      accessToken,
      refreshToken,
      tokenType: 'bearer',
      expiresAt: new Date(this.now() + accessTokenMinutes * MINUTE_MS).toISOString(),
    };
  }

  /**
   * @throws UnauthorizedError for a bad signature, expiry, wrong type or revoked jti
   */
  async verify(token: string, expected: TokenType): Promise<VerifiedClaims> {
    let decoded: unknown;
    try {
      decoded = this.jwt.verify(token);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new UnauthorizedError(`Could not validate credentials: ${reason}`);
    }

    const parsed = VerifiedClaimsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new UnauthorizedError('Could not validate credentials');
    }

    const claims = parsed.data;
    if (claims.type !== expected) {
      throw new UnauthorizedError(`Expected ${expected} token`);
    }
    if (await this.blacklist.isRevoked(claims.jti)) {
      throw new UnauthorizedError('Token has been revoked', 'TOKEN_REVOKED');
    }

    return claims;
  }

  async revoke(claims: VerifiedClaims): Promise<void> {
    await this.blacklist.revoke(claims.jti, new Date(claims.exp * 1000));
  }

  /**
   * Logout: end a refresh token from the caller's own session.
   */
  async revokeRefresh(refreshToken: string, userId: string): Promise<void> {
    const claims = await this.verify(refreshToken, 'refresh');
    if (claims.sub !== userId) {
      throw new UnauthorizedError('Refresh token belongs to another user');
    }
    await this.revoke(claims);
  }

  /**
   * Exchange a refresh token for a new pair. The old refresh token is revoked.
   */
  async refresh(refreshToken: string): Promise<{ userId: string; tokens: IssuedTokens }> {
    const claims = await this.verify(refreshToken, 'refresh');
    await this.revoke(claims);
    return { userId: claims.sub, tokens: this.issue(claims.sub) };
  }
}
