import { type Result, type ResultAsync, err, errAsync, ok } from 'neverthrow';
import { type Username, createUsername } from '../../core/branded-types.js';
import { type ApiError, ErrorCode, createError } from '../../core/errors.js';
import { hashPassword, verifyPassword } from '../../lib/password.js';
import type { Store } from '../../store/types.js';
import type { Credentials } from './schemas.js';

// Unknown user and wrong password share one message
const invalidCredentials = (): ApiError =>
  createError(ErrorCode.Unauthorized, 'Invalid username or password');

export function registerUser(store: Store, credentials: Credentials): ResultAsync<Username, ApiError> {
  const id = createUsername(credentials.username);

  return hashPassword(credentials.password)
    .andThen((passwordHash) => store.users.insert({ id, passwordHash }))
    .map((account) => account.id);
}

export function authenticateUser(store: Store, credentials: Credentials): ResultAsync<Username, ApiError> {
  const id = createUsername(credentials.username);

  return store.users.findOne(id).andThen((account): ResultAsync<Username, ApiError> => {
    if (account === null) {
      return errAsync(invalidCredentials());
    }

    return verifyPassword(credentials.password, account.passwordHash).andThen(
      (valid): Result<Username, ApiError> => (valid ? ok(account.id) : err(invalidCredentials()))
    );
  });
}
