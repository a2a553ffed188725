/**
 * User Service Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { BadRequestError, UnauthorizedError, ValidationFailedError } from '../../../common/errors.js';
import { UserService } from '../services/user.service.js';
import { MemoryUserRepository } from '../storage/user.repository.js';

const PASSWORD = 'Password123!';

function registration(username: string, email = `${username}@example.com`) {
  return {
    firstName: 'Test',
    lastName: 'User',
    email,
    username,
    password: PASSWORD,
    confirmPassword: PASSWORD,
  };
}

describe('UserService', () => {
  let repo: MemoryUserRepository;
  let service: UserService;
  const calculations = {
    removeAllForOwner: vi.fn(async () => 3),
  };
  const mockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
    let next = 0;
    repo = new MemoryUserRepository(() => `user-${++next}`);
    service = new UserService(repo, calculations, mockLogger);
  });

  describe('register', () => {
    it('should create an active, unverified user with a hashed password', async () => {
      const user = await service.register(registration('Alice'));

      expect(user).toMatchObject({
        id: 'user-1',
        username: 'alice',
        email: 'alice@example.com',
        isActive: true,
        isVerified: false,
        lastLogin: null,
      });
      expect(user.passwordHash).not.toContain(PASSWORD);
      expect(mockLogger.info).toHaveBeenCalledWith({ userId: 'user-1' }, '[Users] registered');
    });

    it('should reject a taken username or email', async () => {
      await service.register(registration('alice'));

      await expect(service.register(registration('alice', 'other@example.com'))).rejects.toThrow(
        new BadRequestError('USER_EXISTS', 'Username or email already exists')
      );
      await expect(service.register(registration('alice2', 'ALICE@example.com'))).rejects.toMatchObject({
        code: 'USER_EXISTS',
      });
    });

    it('should reject an invalid body', async () => {
      await expect(service.register({ username: 'alice' })).rejects.toBeInstanceOf(ValidationFailedError);
    });
  });

  describe('authenticate', () => {
    beforeEach(async () => {
      await service.register(registration('alice'));
    });

    it('should accept the username or the email', async () => {
      expect((await service.authenticate({ username: 'alice', password: PASSWORD })).id).toBe('user-1');
      expect((await service.authenticate({ username: 'Alice@Example.com', password: PASSWORD })).id).toBe('user-1');
    });

    it('should record the login time', async () => {
      const user = await service.authenticate({ username: 'alice', password: PASSWORD });
      expect(user.lastLogin).toBeInstanceOf(Date);
    });

    it('should reject a wrong password and an unknown user the same way', async () => {
      const expected = new UnauthorizedError('Incorrect username or password', 'INVALID_CREDENTIALS');

      await expect(service.authenticate({ username: 'alice', password: 'Wrong123!' })).rejects.toThrow(expected);
      await expect(service.authenticate({ username: 'nobody', password: PASSWORD })).rejects.toThrow(expected);
    });
  });

  describe('updateProfile', () => {
    it('should update the given fields only', async () => {
      const user = await service.register(registration('alice'));

      const updated = await service.updateProfile(user, { firstName: 'Alicia' });

      expect(updated.firstName).toBe('Alicia');
      expect(updated.lastName).toBe('User');
      expect(updated.email).toBe('alice@example.com');
    });

    it('should reject an email held by another user', async () => {
      const alice = await service.register(registration('alice'));
      await service.register(registration('bob'));

      await expect(service.updateProfile(alice, { email: 'bob@example.com' })).rejects.toThrow(
        new BadRequestError('EMAIL_TAKEN', 'Email already registered')
      );
    });

    it('should reject a username held by another user', async () => {
      const alice = await service.register(registration('alice'));
      await service.register(registration('bob'));

      await expect(service.updateProfile(alice, { username: 'BOB' })).rejects.toMatchObject({
        code: 'USERNAME_TAKEN',
      });
    });

    it('should allow re-submitting the current email', async () => {
      const alice = await service.register(registration('alice'));

      const updated = await service.updateProfile(alice, { email: 'alice@example.com' });
      expect(updated).toEqual(alice);
    });
  });

  describe('changePassword', () => {
    it('should replace the hash when the current password matches', async () => {
      const user = await service.register(registration('alice'));

      await service.changePassword(user, {
        currentPassword: PASSWORD,
        newPassword: 'NewPassword456!',
        confirmNewPassword: 'NewPassword456!',
      });

      await expect(service.authenticate({ username: 'alice', password: PASSWORD })).rejects.toBeInstanceOf(
        UnauthorizedError
      );
      expect((await service.authenticate({ username: 'alice', password: 'NewPassword456!' })).id).toBe(user.id);
    });

    it('should reject a wrong current password', async () => {
      const user = await service.register(registration('alice'));

      await expect(
        service.changePassword(user, {
          currentPassword: 'Wrong123!',
          newPassword: 'NewPassword456!',
          confirmNewPassword: 'NewPassword456!',
        })
      ).rejects.toThrow(new BadRequestError('INVALID_PASSWORD', 'Current password is incorrect'));
    });
  });

  describe('deleteAccount', () => {
    it("should delete the user's calculations, then the user", async () => {
      const user = await service.register(registration('alice'));

      await service.deleteAccount(user);

      expect(calculations.removeAllForOwner).toHaveBeenCalledWith('user-1');
      expect(await repo.findById('user-1')).toBeNull();
      await expect(service.getActiveUser('user-1')).rejects.toBeInstanceOf(UnauthorizedError);
      expect(mockLogger.info).toHaveBeenCalledWith(
        { userId: 'user-1', calculations: 3 },
        '[Users] account deleted'
      );
    });
  });
});
