/**
 * USER SERVICE
 * ============
 *
 * Registration, credential checks, profile and password changes, and
 * account deletion. The lookups before a write give the usual error early;
 * the repository still rejects a duplicate that slips past them.
 * Deleting an account deletes the owner's calculations first, then the user.
 */

import { BadRequestError, UnauthorizedError } from '../../../common/errors.js';
import type { ServiceLogger } from '../../../common/logger.js';
import { parseWith } from '../../../common/validation.js';
import {
  PasswordChangeSchema,
  ProfileUpdateSchema,
  RegisterSchema,
  type LoginInput,
} from '../contracts/user.schemas.js';
import type { User, UserChanges } from '../contracts/user.types.js';
import { fieldTakenError, userExistsError, type UserRepository } from '../storage/user.repository.js';
import { hashPassword, verifyPassword } from './password.hasher.js';

/**
 * The part of the calculations module account deletion needs.
 */
export interface OwnedCalculations {
  removeAllForOwner(ownerId: string): Promise<number>;
}

export class UserService {
  constructor(
    private readonly users: UserRepository,
    private readonly calculations: OwnedCalculations,
    private readonly logger: ServiceLogger
  ) {}

  async register(body: unknown): Promise<User> {
    const input = parseWith(RegisterSchema, body);

    const [byUsername, byEmail] = await Promise.all([
      this.users.findByUsername(input.username),
      this.users.findByEmail(input.email),
    ]);
    if (byUsername || byEmail) {
      throw userExistsError();
    }

    const user = await this.users.create({
      username: input.username,
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      passwordHash: await hashPassword(input.password),
      isActive: true,
      isVerified: false,
    });

    this.logger.info({ userId: user.id }, '[Users] registered');
    return user;
  }

  async authenticate({ username, password }: LoginInput): Promise<User> {
    const user = await this.users.findByLogin(username);
    if (!user || !(await verifyPassword(password, user.passwordHash))) {
      throw new UnauthorizedError('Incorrect username or password', 'INVALID_CREDENTIALS');
    }
    if (!user.isActive) {
      throw new BadRequestError('INACTIVE_USER', 'User is not active');
    }

    const updated = await this.users.update(user.id, { lastLogin: new Date() });
    return updated ?? user;
  }

  /**
   * Resolve the user behind a verified token.
   */
  async getActiveUser(id: string): Promise<User> {
    const user = await this.users.findById(id);
    if (!user) {
      throw new UnauthorizedError('User not found');
    }
    if (!user.isActive) {
      throw new BadRequestError('INACTIVE_USER', 'Inactive user');
    }
    return user;
  }

  async updateProfile(user: User, body: unknown): Promise<User> {
    const update = parseWith(ProfileUpdateSchema, body);
    const changes: UserChanges = {};

    if (update.email !== undefined && update.email !== user.email) {
      if (await this.users.findByEmail(update.email)) {
        throw fieldTakenError('email');
      }
      changes.email = update.email;
    }

    if (update.username !== undefined && update.username !== user.username) {
      if (await this.users.findByUsername(update.username)) {
        throw fieldTakenError('username');
      }
      changes.username = update.username;
    }

    if (update.firstName !== undefined) changes.firstName = update.firstName;
    if (update.lastName !== undefined) changes.lastName = update.lastName;

    if (Object.keys(changes).length === 0) {
      return user;
    }

    const updated = await this.users.update(user.id, changes);
    if (!updated) {
      throw new UnauthorizedError('User not found');
    }

    this.logger.info({ userId: user.id, fields: Object.keys(changes) }, '[Users] profile updated');
    return updated;
  }

  async changePassword(user: User, body: unknown): Promise<void> {
    const change = parseWith(PasswordChangeSchema, body);

    if (!(await verifyPassword(change.currentPassword, user.passwordHash))) {
      throw new BadRequestError('INVALID_PASSWORD', 'Current password is incorrect');
    }

    await this.users.update(user.id, { passwordHash: await hashPassword(change.newPassword) });
    this.logger.info({ userId: user.id }, '[Users] password changed');
  }

  async deleteAccount(user: User): Promise<void> {
    const calculations = await this.calculations.removeAllForOwner(user.id);
    await this.users.deleteById(user.id);
    this.logger.info({ userId: user.id, calculations }, '[Users] account deleted');
  }
}
