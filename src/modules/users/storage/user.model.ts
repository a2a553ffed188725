/**
 * USER MONGO MODEL
 */

import mongoose, { Schema } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';

export interface UserDocument {
  _id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  isActive: boolean;
  isVerified: boolean;
  lastLogin: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<UserDocument>(
  {
    _id: { type: String, default: () => uuidv4() },
    username: { type: String, required: true, unique: true, lowercase: true, trim: true },
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    firstName: { type: String, required: true },
    lastName: { type: String, required: true },
    passwordHash: { type: String, required: true },
    isActive: { type: Boolean, default: true },
    isVerified: { type: Boolean, default: false },
    lastLogin: { type: Date, default: null },
  },
  { timestamps: true, collection: 'users', versionKey: false }
);

export const UserModel = mongoose.model<UserDocument>('User', UserSchema);
