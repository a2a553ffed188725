/**
 * USER REPOSITORY
 *
 * Usernames and emails are stored lowercase; lookups expect lowercase keys.
 * Both are unique: create and update reject a value another user holds,
 * whatever the service checked beforehand.
 */

import { BadRequestError } from '../../../common/errors.js';
import type { NewUser, User, UserChanges } from '../contracts/user.types.js';
import { UserModel, type UserDocument } from './user.model.js';

export type UniqueUserField = 'username' | 'email';

export function userExistsError(): BadRequestError {
  return new BadRequestError('USER_EXISTS', 'Username or email already exists');
}

export function fieldTakenError(field: UniqueUserField): BadRequestError {
  return field === 'email'
    ? new BadRequestError('EMAIL_TAKEN', 'Email already registered')
    : new BadRequestError('USERNAME_TAKEN', 'Username already taken');
}

export interface UserRepository {
  /** @throws BadRequestError USER_EXISTS */
  create(user: NewUser): Promise<User>;
  findById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  /** Matches either username or email. */
  findByLogin(identifier: string): Promise<User | null>;
  /** @throws BadRequestError EMAIL_TAKEN / USERNAME_TAKEN */
  update(id: string, changes: UserChanges): Promise<User | null>;
  deleteById(id: string): Promise<boolean>;
}

// ═══════════════════════════════════════════════════════════════
// MONGO
// ═══════════════════════════════════════════════════════════════

function fromDocument(doc: UserDocument): User {
  return {
    id: doc._id,
    username: doc.username,
    email: doc.email,
    firstName: doc.firstName,
    lastName: doc.lastName,
    passwordHash: doc.passwordHash,
    isActive: doc.isActive,
    isVerified: doc.isVerified,
    lastLogin: doc.lastLogin ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

const DUPLICATE_KEY = 11000;

/**
 * The unique field a Mongo duplicate-key error tripped, or null for any
 * other error.
 */
export function duplicateKeyField(err: unknown): UniqueUserField | 'unknown' | null {
  if (typeof err !== 'object' || err === null || !('code' in err) || err.code !== DUPLICATE_KEY) {
    return null;
  }

  const pattern = 'keyPattern' in err ? err.keyPattern : undefined;
  if (typeof pattern === 'object' && pattern !== null) {
    if ('email' in pattern) return 'email';
    if ('username' in pattern) return 'username';
  }
  return 'unknown';
}

export class MongoUserRepository implements UserRepository {
  async create(user: NewUser): Promise<User> {
    try {
      const created = await UserModel.create(user);
      return fromDocument(created.toObject());
    } catch (err) {
      if (duplicateKeyField(err) !== null) {
        throw userExistsError();
      }
      throw err;
    }
  }

  async findById(id: string): Promise<User | null> {
    const doc = await UserModel.findById(id).lean<UserDocument>().exec();
    return doc ? fromDocument(doc) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const doc = await UserModel.findOne({ username }).lean<UserDocument>().exec();
    return doc ? fromDocument(doc) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    const doc = await UserModel.findOne({ email }).lean<UserDocument>().exec();
    return doc ? fromDocument(doc) : null;
  }

  async findByLogin(identifier: string): Promise<User | null> {
    const key = identifier.trim().toLowerCase();
    const doc = await UserModel.findOne({ $or: [{ username: key }, { email: key }] })
      .lean<UserDocument>()
      .exec();
    return doc ? fromDocument(doc) : null;
  }

  async update(id: string, changes: UserChanges): Promise<User | null> {
    try {
      const doc = await UserModel.findByIdAndUpdate(id, { $set: changes }, { new: true, runValidators: true })
        .lean<UserDocument>()
        .exec();
      return doc ? fromDocument(doc) : null;
    } catch (err) {
      const field = duplicateKeyField(err);
      if (field === 'email' || field === 'username') {
        throw fieldTakenError(field);
      }
      if (field === 'unknown') {
        throw userExistsError();
      }
      throw err;
    }
  }

  async deleteById(id: string): Promise<boolean> {
    const result = await UserModel.deleteOne({ _id: id }).exec();
    return result.deletedCount > 0;
  }
}

// ═══════════════════════════════════════════════════════════════
// IN-MEMORY
// ═══════════════════════════════════════════════════════════════

export class MemoryUserRepository implements UserRepository {
  private readonly rows = new Map<string, User>();

  constructor(private readonly newId: () => string) {}

  async create(user: NewUser): Promise<User> {
    const username = user.username.toLowerCase();
    const email = user.email.toLowerCase();
    if (this.holder('username', username) || this.holder('email', email)) {
      throw userExistsError();
    }

    const now = new Date();
    const row: User = {
      ...user,
      username,
      email,
      id: this.newId(),
      lastLogin: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async findById(id: string): Promise<User | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findWhere((row) => row.username === username);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findWhere((row) => row.email === email);
  }

  async findByLogin(identifier: string): Promise<User | null> {
    const key = identifier.trim().toLowerCase();
    return this.findWhere((row) => row.username === key || row.email === key);
  }

  async update(id: string, changes: UserChanges): Promise<User | null> {
    const row = this.rows.get(id);
    if (!row) return null;

    for (const field of ['email', 'username'] as const) {
      const value = changes[field];
      if (value === undefined) continue;
      const holder = this.holder(field, value.toLowerCase());
      if (holder && holder.id !== id) {
        throw fieldTakenError(field);
      }
    }

    const updated: User = { ...row, ...changes, updatedAt: new Date() };
    this.rows.set(id, updated);
    return { ...updated };
  }

  async deleteById(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }

  private holder(field: UniqueUserField, value: string): User | undefined {
    for (const row of this.rows.values()) {
      if (row[field] === value) return row;
    }
    return undefined;
  }

  private findWhere(match: (row: User) => boolean): User | null {
    for (const row of this.rows.values()) {
      if (match(row)) return { ...row };
    }
    return null;
  }
}
