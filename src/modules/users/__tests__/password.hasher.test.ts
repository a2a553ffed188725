/**
 * Password hasher tests
 */

import { describe, it, expect } from 'vitest';
import { hashPassword, verifyPassword } from '../services/password.hasher.js';

describe('password hasher', () => {
  it('should verify the password it hashed', async () => {
    const stored = await hashPassword('Password123!');

    expect(stored.startsWith('scrypt$')).toBe(true);
    expect(await verifyPassword('Password123!', stored)).toBe(true);
    expect(await verifyPassword('Password123?', stored)).toBe(false);
  });

  it('should salt every hash', async () => {
    const first = await hashPassword('Password123!');
    const second = await hashPassword('Password123!');

    expect(first).not.toBe(second);
  });

  it('should reject a malformed stored value', async () => {
    expect(await verifyPassword('Password123!', 'plaintext')).toBe(false);
    expect(await verifyPassword('Password123!', 'bcrypt$00$11')).toBe(false);
    expect(await verifyPassword('Password123!', 'scrypt$00$')).toBe(false);
  });
});
