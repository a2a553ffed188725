/**
 * Auth Types
 */

import { z } from 'zod';
import type { UserView } from '../../users/contracts/user.types.js';

export const TOKEN_TYPES = ['access', 'refresh'] as const;
export type TokenType = (typeof TOKEN_TYPES)[number];

/**
 * What we sign. `sub` is the user id; `jti` identifies the token for revocation.
 */
export interface TokenClaims {
  sub: string;
  type: TokenType;
  jti: string;
}

/**
 * Claims as they come back out of a verified token.
 */
export const VerifiedClaimsSchema = z.object({
  sub: z.string().min(1),
  type: z.enum(TOKEN_TYPES),
  jti: z.string().min(1),
  exp: z.number(),
});

export type VerifiedClaims = z.output<typeof VerifiedClaimsSchema>;

export interface IssuedTokens {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
  expiresAt: string;
}

export interface TokenResponse extends IssuedTokens {
  user: UserView;
}
