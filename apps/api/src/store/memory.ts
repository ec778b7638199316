import { type ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { Username } from '../core/branded-types.js';
import { type ApiError, ErrorCode, createError } from '../core/errors.js';
import type { HistoryRecord, UserAccount } from '../core/types.js';
import type { HistoryCollection, Store, UserCollection } from './types.js';

const freezeRecord = (record: HistoryRecord): HistoryRecord =>
  Object.freeze({
    ...record,
    result: Object.freeze({ ...record.result }),
    timestamp: new Date(record.timestamp),
  });

class MemoryUsers implements UserCollection {
  private readonly users = new Map<Username, UserAccount>();

  insert(user: UserAccount): ResultAsync<UserAccount, ApiError> {
    if (this.users.has(user.id)) {
      return errAsync(createError(ErrorCode.Conflict, 'Username already exists'));
    }
    this.users.set(user.id, { ...user });
    return okAsync(user);
  }

  findOne(id: Username): ResultAsync<UserAccount | null, ApiError> {
    const user = this.users.get(id);
    return okAsync(user ? { ...user } : null);
  }
}

class MemoryHistory implements HistoryCollection {
  private readonly records: HistoryRecord[] = [];

  insert(record: HistoryRecord): ResultAsync<HistoryRecord, ApiError> {
    const stored = freezeRecord(record);
    this.records.push(stored);
    return okAsync(stored);
  }

  findByUser(user: Username): ResultAsync<HistoryRecord[], ApiError> {
    const own = this.records
      .map((record, index) => ({ record, index }))
      .filter(({ record }) => record.user === user)
      // Newest first; insertion order breaks timestamp ties
      .sort(
        (a, b) => b.record.timestamp.getTime() - a.record.timestamp.getTime() || b.index - a.index
      )
      .map(({ record }) => record);
    return okAsync(own);
  }
}

/**
 * Process-local store; contents are lost on restart.
 */
export class MemoryStore implements Store {
  readonly kind = 'memory' as const;
  readonly users: UserCollection = new MemoryUsers();
  readonly history: HistoryCollection = new MemoryHistory();

  ping(): ResultAsync<void, ApiError> {
    return okAsync(undefined);
  }

  async close(): Promise<void> {}
}
