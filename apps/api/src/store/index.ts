import { type ResultAsync, errAsync, okAsync } from 'neverthrow';
import { type ApiError, ErrorCode, createError } from '../core/errors.js';
import type { AppConfig } from '../lib/config.js';
import { MemoryStore } from './memory.js';
import { MongoStore } from './mongo.js';
import type { Store } from './types.js';

export type { Store } from './types.js';

export function createStore(
  config: Pick<AppConfig, 'storeBackend' | 'mongoUri' | 'mongoDbName'>
): ResultAsync<Store, ApiError> {
  if (config.storeBackend === 'memory') {
    return okAsync<Store, ApiError>(new MemoryStore());
  }

  if (!config.mongoUri) {
    return errAsync(createError(ErrorCode.InternalError, 'MONGODB_URI is not set'));
  }

  return MongoStore.connect(config.mongoUri, config.mongoDbName).map((store): Store => store);
}

export const isStoreReachable = (store: Store): Promise<boolean> =>
  store.ping().match(
    () => true,
    () => false
  );
