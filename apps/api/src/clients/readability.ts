import { Readability, isProbablyReaderable } from '@mozilla/readability';
import { JSDOM } from 'jsdom';
import { type Result, type ResultAsync, err, ok } from 'neverthrow';
import { type ApiError, ErrorCode, createError } from '../core/errors.js';
import type { ReadabilityResult } from '../core/types.js';
import { resultFrom } from '../lib/result.js';

export interface ArticleReader {
  extract(html: string, baseUrl?: string): ResultAsync<ReadabilityResult, ApiError>;
}

const notReadable = (reason: string): ApiError =>
  createError(ErrorCode.InternalError, `Failed to parse content with Readability: ${reason}`);

function parseDocument(html: string, baseUrl: string): Result<ReadabilityResult, ApiError> {
  const dom = new JSDOM(html, { url: baseUrl });
  try {
    const document = dom.window.document;
    if (!isProbablyReaderable(document)) {
      return err(notReadable('page has no article-like content'));
    }

    const article = new Readability(document).parse();
    if (!article?.textContent) {
      return err(notReadable('no text content'));
    }

    return ok({ title: article.title?.trim() ?? '', text: article.textContent });
  } finally {
    dom.window.close();
  }
}

/**
 * Mozilla Readability over a jsdom document. Pages the readerability heuristic
 * rejects are never parsed, which leaves them to the selector stage.
 */
class ReadabilityReader implements ArticleReader {
  extract(html: string, baseUrl = 'about:blank'): ResultAsync<ReadabilityResult, ApiError> {
    return resultFrom(
      Promise.resolve().then(() => parseDocument(html, baseUrl)),
      ErrorCode.InternalError,
      (error) => `Readability processing failed: ${String(error)}`
    ).andThen((parsed) => parsed);
  }
}

export const readabilityExtractor: ArticleReader = new ReadabilityReader();
