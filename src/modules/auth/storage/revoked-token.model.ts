/**
 * REVOKED TOKEN MONGO MODEL
 *
 * TTL index drops an entry once the token it blocks has expired anyway.
 */

import mongoose, { Schema } from 'mongoose';

export interface RevokedTokenDocument {
  _id: string;
  expiresAt: Date;
}

const RevokedTokenSchema = new Schema<RevokedTokenDocument>(
  {
    _id: { type: String },
    expiresAt: { type: Date, required: true },
  },
  { collection: 'revoked_tokens', versionKey: false }
);

RevokedTokenSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const RevokedTokenModel = mongoose.model<RevokedTokenDocument>('RevokedToken', RevokedTokenSchema);
