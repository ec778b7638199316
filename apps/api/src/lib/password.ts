import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import { type ResultAsync, okAsync } from 'neverthrow';
import { type ApiError, ErrorCode } from '../core/errors.js';
import { resultFrom } from './result.js';

const KEY_LENGTH = 64;
const SALT_BYTES = 16;
const SCHEME = 'scrypt';

const deriveKey = (password: string, salt: Buffer): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    scrypt(password.normalize('NFKC'), salt, KEY_LENGTH, (error, key) => {
      if (error) reject(error);
      else resolve(key);
    });
  });

/**
 * Produces `scrypt$<salt hex>$<key hex>`.
 */
export const hashPassword = (password: string): ResultAsync<string, ApiError> => {
  const salt = randomBytes(SALT_BYTES);
  return resultFrom(
    deriveKey(password, salt),
    ErrorCode.InternalError,
    (error) => `Password hashing failed: ${String(error)}`
  ).map((key) => `${SCHEME}$${salt.toString('hex')}$${key.toString('hex')}`);
};

export const verifyPassword = (password: string, stored: string): ResultAsync<boolean, ApiError> => {
  const [scheme, saltHex, keyHex] = stored.split('$');
  if (scheme !== SCHEME || !saltHex || !keyHex) {
    return okAsync(false);
  }

  const expected = Buffer.from(keyHex, 'hex');
  if (expected.length !== KEY_LENGTH) {
    return okAsync(false);
  }

  return resultFrom(
    deriveKey(password, Buffer.from(saltHex, 'hex')),
    ErrorCode.InternalError,
    (error) => `Password verification failed: ${String(error)}`
  ).map((actual) => timingSafeEqual(actual, expected));
};
