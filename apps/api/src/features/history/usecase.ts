import type { ResultAsync } from 'neverthrow';
import type { Username } from '../../core/branded-types.js';
import type { ApiError } from '../../core/errors.js';
import type { HistoryItem, HistoryRecord } from '../../core/types.js';
import type { HistoryCollection } from '../../store/types.js';

export const toHistoryItem = (record: HistoryRecord): HistoryItem => ({
  url: record.url,
  analyzer_type: record.analyzerKind,
  model: record.model,
  left: record.result.left,
  right: record.result.right,
  message: record.result.message,
  explanation: record.result.explanation,
  date: record.timestamp.toISOString(),
});

export const listHistory = (history: HistoryCollection, user: Username): ResultAsync<HistoryItem[], ApiError> =>
  history.findByUser(user).map((records) => records.map(toHistoryItem));
