import { Result, err, ok } from 'neverthrow';
import { z } from 'zod';
import { type ApiError, ErrorCode, createError } from '../core/errors.js';
import type { AnalysisResult } from '../core/types.js';

export const DEFAULT_SCORE = 50.0;
export const DEFAULT_MESSAGE = 'Analysis complete';
export const NO_EXPLANATION = 'No explanation provided';

// Numbers, or numeric strings as some analyzers print them
const scoreSchema = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number());

export const analyzerOutputSchema = z.object({
  left: scoreSchema.nullish(),
  right: scoreSchema.nullish(),
  message: z.string().nullish(),
  explanation: z.string().nullish(),
});

const safeJsonParse = Result.fromThrowable(
  (raw: string): unknown => JSON.parse(raw),
  () => 'invalid JSON'
);

const clampScore = (value: number): number => Math.min(100, Math.max(0, value));

const snippet = (raw: string): string => (raw.length > 200 ? `${raw.slice(0, 200)}...` : raw);

export function normalizeAnalyzerOutput(raw: unknown): Result<AnalysisResult, ApiError> {
  const parsed = analyzerOutputSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      createError(ErrorCode.MalformedAnalyzerOutput, 'Analyzer returned an unexpected JSON shape', {
        issues: parsed.error.issues.map((issue) => issue.message),
      })
    );
  }

  const { left, right, message, explanation } = parsed.data;
  const normalizedMessage = message ?? DEFAULT_MESSAGE;
  const normalizedExplanation = explanation ?? normalizedMessage;

  return ok({
    left: clampScore(left ?? DEFAULT_SCORE),
    right: clampScore(right ?? DEFAULT_SCORE),
    message: normalizedMessage,
    explanation: normalizedExplanation.trim() ? normalizedExplanation : NO_EXPLANATION,
  });
}

/**
 * Parses the analyzer's stdout as exactly one JSON document and normalizes it.
 */
export function parseAnalyzerOutput(stdout: string): Result<AnalysisResult, ApiError> {
  const trimmed = stdout.trim();
  return safeJsonParse(trimmed)
    .mapErr(() =>
      createError(
        ErrorCode.MalformedAnalyzerOutput,
        `Analyzer returned invalid JSON: ${snippet(trimmed) || '(empty output)'}`
      )
    )
    .andThen(normalizeAnalyzerOutput);
}
