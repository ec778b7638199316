import { describe, expect, it } from 'vitest';
import { hashPassword, verifyPassword } from '../../../src/lib/password.js';

describe('password hashing', () => {
  it('produces_salted_scrypt_hashes', async () => {
    const first = (await hashPassword('test-password'))._unsafeUnwrap();
    const second = (await hashPassword('test-password'))._unsafeUnwrap();

    expect(first).toMatch(/^scrypt\$[0-9a-f]{32}\$[0-9a-f]{128}$/);
    expect(first).not.toBe(second);
  });

  it('verifies_the_matching_password_only', async () => {
    const stored = (await hashPassword('test-password'))._unsafeUnwrap();

    expect((await verifyPassword('test-password', stored))._unsafeUnwrap()).toBe(true);
    expect((await verifyPassword('wrong-password', stored))._unsafeUnwrap()).toBe(false);
  });

  it('treats_malformed_hashes_as_mismatch', async () => {
    expect((await verifyPassword('test-password', 'plaintext'))._unsafeUnwrap()).toBe(false);
    expect((await verifyPassword('test-password', 'scrypt$00$00'))._unsafeUnwrap()).toBe(false);
  });
});
