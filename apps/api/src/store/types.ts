import type { ResultAsync } from 'neverthrow';
import type { Username } from '../core/branded-types.js';
import type { ApiError } from '../core/errors.js';
import type { HistoryRecord, UserAccount } from '../core/types.js';

export interface UserCollection {
  /** Fails with CONFLICT when the username is taken. */
  insert(user: UserAccount): ResultAsync<UserAccount, ApiError>;
  findOne(id: Username): ResultAsync<UserAccount | null, ApiError>;
}

export interface HistoryCollection {
  insert(record: HistoryRecord): ResultAsync<HistoryRecord, ApiError>;
  /** Newest first. */
  findByUser(user: Username): ResultAsync<HistoryRecord[], ApiError>;
}

export interface Store {
  readonly kind: 'memory' | 'mongo';
  readonly users: UserCollection;
  readonly history: HistoryCollection;
  ping(): ResultAsync<void, ApiError>;
  close(): Promise<void>;
}
