/**
 * Token Blacklist Tests (in-memory)
 */

import { describe, it, expect } from 'vitest';
import { MemoryTokenBlacklist } from '../storage/token-blacklist.js';

describe('MemoryTokenBlacklist', () => {
  it('should report revoked ids until they expire', async () => {
    let now = 1_000;
    const blacklist = new MemoryTokenBlacklist(() => now);

    await blacklist.revoke('jti-1', new Date(5_000));

    expect(await blacklist.isRevoked('jti-1')).toBe(true);
    expect(await blacklist.isRevoked('jti-2')).toBe(false);

    now = 5_000;
    expect(await blacklist.isRevoked('jti-1')).toBe(false);
  });

  it('should forget an expired entry for good', async () => {
    let now = 10_000;
    const blacklist = new MemoryTokenBlacklist(() => now);
    await blacklist.revoke('jti-1', new Date(9_000));

    expect(await blacklist.isRevoked('jti-1')).toBe(false);

    now = 0;
    expect(await blacklist.isRevoked('jti-1')).toBe(false);
  });
});
