import { type Collection, MongoClient, MongoServerError } from 'mongodb';
import { ResultAsync } from 'neverthrow';
import { type Username, createUsername } from '../core/branded-types.js';
import { type ApiError, ErrorCode, createError } from '../core/errors.js';
import type { HistoryRecord, UserAccount } from '../core/types.js';
import { errorMessage, mapUnknownErrorToApiError } from '../lib/result.js';
import type { HistoryCollection, Store, UserCollection } from './types.js';

export interface UserDocument {
  username: string;
  password_hash: string;
  created_at: Date;
}

// One document per completed analysis, flat as the history view reads it
export interface LinkDocument {
  user: string;
  url: string;
  analyzer_type: string;
  model: string | null;
  left: number;
  right: number;
  message: string;
  explanation: string;
  date: Date;
}

const DUPLICATE_KEY = 11000;

export const toUserDocument = (user: UserAccount, createdAt = new Date()): UserDocument => ({
  username: user.id,
  password_hash: user.passwordHash,
  created_at: createdAt,
});

export const fromUserDocument = (doc: UserDocument): UserAccount => ({
  id: createUsername(doc.username),
  passwordHash: doc.password_hash,
});

export const toLinkDocument = (record: HistoryRecord): LinkDocument => ({
  user: record.user,
  url: record.url,
  analyzer_type: record.analyzerKind,
  model: record.model,
  left: record.result.left,
  right: record.result.right,
  message: record.result.message,
  explanation: record.result.explanation,
  date: record.timestamp,
});

export const fromLinkDocument = (doc: LinkDocument): HistoryRecord => ({
  user: createUsername(doc.user),
  url: doc.url,
  analyzerKind: doc.analyzer_type,
  model: doc.model ?? null,
  result: {
    left: doc.left,
    right: doc.right,
    message: doc.message,
    explanation: doc.explanation,
  },
  timestamp: doc.date,
});

const persistenceError = mapUnknownErrorToApiError(ErrorCode.PersistenceError);

class MongoUsers implements UserCollection {
  constructor(private readonly collection: Collection<UserDocument>) {}

  insert(user: UserAccount): ResultAsync<UserAccount, ApiError> {
    return ResultAsync.fromPromise(this.collection.insertOne(toUserDocument(user)), (error) =>
      error instanceof MongoServerError && error.code === DUPLICATE_KEY
        ? createError(ErrorCode.Conflict, 'Username already exists')
        : persistenceError(error)
    ).map(() => user);
  }

  findOne(id: Username): ResultAsync<UserAccount | null, ApiError> {
    return ResultAsync.fromPromise(
      this.collection.findOne({ username: id }, { projection: { _id: 0 } }),
      persistenceError
    ).map((doc) => (doc ? fromUserDocument(doc) : null));
  }
}

class MongoHistory implements HistoryCollection {
  constructor(private readonly collection: Collection<LinkDocument>) {}

  insert(record: HistoryRecord): ResultAsync<HistoryRecord, ApiError> {
    return ResultAsync.fromPromise(
      this.collection.insertOne(toLinkDocument(record)),
      persistenceError
    ).map(() => record);
  }

  findByUser(user: Username): ResultAsync<HistoryRecord[], ApiError> {
    return ResultAsync.fromPromise(
      this.collection
        .find({ user }, { projection: { _id: 0 } })
        .sort({ date: -1, _id: -1 })
        .toArray(),
      persistenceError
    ).map((docs) => docs.map(fromLinkDocument));
  }
}

export class MongoStore implements Store {
  readonly kind = 'mongo' as const;
  readonly users: UserCollection;
  readonly history: HistoryCollection;

  private constructor(
    private readonly client: MongoClient,
    private readonly dbName: string
  ) {
    const db = client.db(dbName);
    this.users = new MongoUsers(db.collection<UserDocument>('users'));
    this.history = new MongoHistory(db.collection<LinkDocument>('links'));
  }

  /**
   * Connects and ensures indexes. Fails instead of degrading to memory.
   */
  static connect(uri: string, dbName: string): ResultAsync<MongoStore, ApiError> {
    const client = new MongoClient(uri, { ignoreUndefined: true });

    return ResultAsync.fromPromise(
      (async () => {
        await client.connect();
        const db = client.db(dbName);
        await db.collection<UserDocument>('users').createIndex({ username: 1 }, { unique: true });
        await db.collection<LinkDocument>('links').createIndex({ user: 1, date: -1 });
        return new MongoStore(client, dbName);
      })(),
      (error) =>
        createError(ErrorCode.ServiceUnavailable, `MongoDB connection failed: ${errorMessage(error)}`)
    );
  }

  ping(): ResultAsync<void, ApiError> {
    return ResultAsync.fromPromise(
      this.client.db(this.dbName).command({ ping: 1 }),
      persistenceError
    ).map(() => undefined);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
