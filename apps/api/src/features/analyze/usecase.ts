import { type ResultAsync, errAsync } from 'neverthrow';
import { type AnalyzerInvoker, unknownAnalyzerKind } from '../../clients/analyzer.js';
import type { Username } from '../../core/branded-types.js';
import { type ApiError, ErrorCode } from '../../core/errors.js';
import {
  type AnalysisRequest,
  type AnalyzeResponse,
  type ExtractedText,
  ExtractionOutcome,
  type HistoryRecord,
} from '../../core/types.js';
import { trackHistoryRecord } from '../../lib/metrics.js';
import { errorMessage, resultFrom } from '../../lib/result.js';
import type { HistoryCollection } from '../../store/types.js';
import type { TextExtractor } from '../extract/usecase.js';

export interface AnalyzeDependencies {
  extractor: TextExtractor;
  analyzer: AnalyzerInvoker;
  history: HistoryCollection;
  now?: () => Date;
}

export const consoleMessage = (url: string, extracted: ExtractedText): string =>
  extracted.outcome === ExtractionOutcome.Article
    ? `Successfully analyzed article from ${url}`
    : `Text extraction failed for ${url}; analyzed fallback text`;

/**
 * Extract, score, then persist. An unknown analyzer kind is rejected before
 * the URL is fetched. Extraction never fails the request: its
 * user-facing message is scored in place of article text. A failed analyzer
 * run or store write short-circuits and nothing is recorded.
 */
export function analyzeArticle(
  deps: AnalyzeDependencies,
  user: Username,
  request: AnalysisRequest
): ResultAsync<AnalyzeResponse, ApiError> {
  const now = deps.now ?? (() => new Date());

  if (!deps.analyzer.knows(request.analyzerKind)) {
    return errAsync(unknownAnalyzerKind(request.analyzerKind, deps.analyzer.kinds()));
  }

  return resultFrom(
    deps.extractor.extractArticle(request.url),
    ErrorCode.InternalError,
    (error) => `Text extraction crashed: ${errorMessage(error)}`
  )
    .andThen((extracted) =>
      deps.analyzer
        .invoke({ kind: request.analyzerKind, text: extracted.text, model: request.model })
        .map((result) => ({ extracted, result }))
    )
    .andThen(({ extracted, result }) => {
      const record: HistoryRecord = {
        user,
        url: request.url,
        analyzerKind: request.analyzerKind,
        model: deps.analyzer.acceptsModel(request.analyzerKind) ? (request.model ?? null) : null,
        result,
        timestamp: now(),
      };

      return deps.history.insert(record).map(
        (): AnalyzeResponse => ({
          results: result,
          console_message: consoleMessage(request.url, extracted),
        })
      );
    })
    .andTee(() => {
      trackHistoryRecord();
    });
}
