import { ResultAsync } from 'neverthrow';
import { type ApiError, type ErrorCode, createError } from '../core/errors.js';

/**
 * Creates a ResultAsync from a Promise with consistent error handling
 */
export const resultFrom = <T>(
  promise: Promise<T>,
  code: ErrorCode,
  msgFn: (error: unknown) => string
): ResultAsync<T, ApiError> =>
  ResultAsync.fromPromise(promise, (error) => createError(code, msgFn(error)));

/**
 * Maps unknown errors to ApiError with specified error code
 */
export const mapUnknownErrorToApiError =
  (code: ErrorCode) =>
  (error: unknown): ApiError =>
    createError(code, errorMessage(error));

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
