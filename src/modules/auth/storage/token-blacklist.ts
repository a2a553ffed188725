/**
 * TOKEN BLACKLIST
 *
 * Logout writes the token's jti here; authenticated requests check it.
 */

import { RevokedTokenModel } from './revoked-token.model.js';

export interface TokenBlacklist {
  revoke(jti: string, expiresAt: Date): Promise<void>;
  isRevoked(jti: string): Promise<boolean>;
}

export class MongoTokenBlacklist implements TokenBlacklist {
  async revoke(jti: string, expiresAt: Date): Promise<void> {
    await RevokedTokenModel.updateOne({ _id: jti }, { $set: { expiresAt } }, { upsert: true }).exec();
  }

  async isRevoked(jti: string): Promise<boolean> {
    const found = await RevokedTokenModel.exists({ _id: jti }).exec();
    return found !== null;
  }
}

export class MemoryTokenBlacklist implements TokenBlacklist {
  private readonly entries = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  async revoke(jti: string, expiresAt: Date): Promise<void> {
    this.entries.set(jti, expiresAt.getTime());
  }

  async isRevoked(jti: string): Promise<boolean> {
    const expiresAt = this.entries.get(jti);
    if (expiresAt === undefined) return false;

    if (expiresAt <= this.now()) {
      this.entries.delete(jti);
      return false;
    }
    return true;
  }
}
