import type { FastifyBaseLogger } from 'fastify';
import { Result, ResultAsync, errAsync, okAsync } from 'neverthrow';
import { type ArticleReader, readabilityExtractor } from '../../clients/readability.js';
import { createCacheKey } from '../../core/branded-types.js';
import { type ApiError, ErrorCode, createError } from '../../core/errors.js';
import { type ExtractedText, ExtractionOutcome, ExtractionStrategy } from '../../core/types.js';
import type { ExtractionCache } from '../../lib/cache.js';
import {
  BROWSER_HEADERS,
  SERVICE_HEADERS,
  createTimeoutSignal,
  isHtmlContentType,
} from '../../lib/http-utils.js';
import { trackExtractionAttempt, trackExtractionOutcome } from '../../lib/metrics.js';
import { mapUnknownErrorToApiError } from '../../lib/result.js';
import type { UrlGuard } from '../../lib/ssrf-guard.js';
import { collapseWhitespace, isDownloadLink, truncateText } from '../../lib/text-utils.js';
import { type SelectedContent, selectMainContent } from './content-selector.js';

export const MIN_ARTICLE_LENGTH = 100;

type FailureOutcome = Exclude<ExtractionOutcome, ExtractionOutcome.Article>;

export const EXTRACTION_MESSAGES: Readonly<Record<FailureOutcome, string>> = {
  [ExtractionOutcome.DownloadLink]:
    'This URL points to a file download, not an article. Please provide a link to a web page.',
  [ExtractionOutcome.Blocked]: 'Could not extract text: this URL is not allowed.',
  [ExtractionOutcome.NotFound]: 'Could not extract text: the page was not found (HTTP 404).',
  [ExtractionOutcome.Forbidden]:
    'Could not extract text: access to the page was forbidden (HTTP 403). The site may be blocking automated requests.',
  [ExtractionOutcome.Failed]:
    'Could not extract text from this URL. The article may be behind a paywall or the site may be blocking automated access.',
};

export interface FetchInit {
  headers: Record<string, string>;
  signal: AbortSignal;
  redirect: 'manual';
}

export interface HttpResponse {
  status: number;
  statusText: string;
  ok: boolean;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export type HttpFetch = (url: string, init: FetchInit) => Promise<HttpResponse>;

export interface TextExtractor {
  extract(url: string): Promise<string>;
  extractArticle(url: string): Promise<ExtractedText>;
}

export interface ArticleExtractorOptions {
  fetchTimeoutMs: number;
  fallbackFetchTimeoutMs: number;
  maxHtmlBytes: number;
  maxRedirectFollows: number;
  maxTextLength: number;
  guard: UrlGuard;
  fetch: HttpFetch;
  reader?: ArticleReader;
  cache?: ExtractionCache;
  logger?: FastifyBaseLogger;
}

type SoftFailure = ExtractedText;

export class ArticleExtractor implements TextExtractor {
  private readonly reader: ArticleReader;

  constructor(private readonly options: ArticleExtractorOptions) {
    this.reader = options.reader ?? readabilityExtractor;
  }

  async extract(url: string): Promise<string> {
    const extracted = await this.extractArticle(url);
    return extracted.text;
  }

  async extractArticle(url: string): Promise<ExtractedText> {
    const extracted = await this.runChain(url).match(
      (article) => article,
      (failure) => failure
    );

    trackExtractionOutcome(extracted.outcome);
    return extracted;
  }

  private runChain(url: string): ResultAsync<ExtractedText, SoftFailure> {
    if (isDownloadLink(url)) {
      return errAsync(softFailure(ExtractionOutcome.DownloadLink));
    }

    const validation = this.options.guard.validateUrl(url);
    if (validation.isErr()) {
      this.options.logger?.info({ url, reason: validation.error }, 'Rejected URL for extraction');
      return errAsync(softFailure(ExtractionOutcome.Blocked));
    }

    const target = validation.value.toString();
    const cacheKey = createCacheKey(target);
    const cached = this.options.cache?.get(cacheKey);
    if (cached) {
      return okAsync(cached);
    }

    return this.options.guard
      .validateUrlSecurity(validation.value)
      .mapErr((reason) => {
        this.options.logger?.info({ url, reason }, 'Rejected URL for extraction');
        return softFailure(ExtractionOutcome.Blocked);
      })
      .andThen(() =>
        this.readabilityStage(target).orElse((error) => {
          this.options.logger?.debug(
            { url, reason: error.message },
            'Readability stage failed, trying content selectors'
          );
          return this.contentSelectorStage(target);
        })
      )
      .andTee((article) => {
        this.options.cache?.set(cacheKey, article);
      });
  }

  private readabilityStage(url: string): ResultAsync<ExtractedText, ApiError> {
    const startTime = Date.now();
    return this.fetchHtml(url, SERVICE_HEADERS, this.options.fetchTimeoutMs, true)
      .andThen((html) => this.reader.extract(html, url))
      .andThen((readable) => {
        const text = collapseWhitespace(readable.text);
        return text.length > MIN_ARTICLE_LENGTH
          ? okAsync(this.article(text, ExtractionStrategy.Readability))
          : errAsync(
              createError(
                ErrorCode.InternalError,
                `Readability text too short: ${text.length} characters`
              )
            );
      })
      .map((article) => {
        trackExtractionAttempt(ExtractionStrategy.Readability, true, Date.now() - startTime);
        return article;
      })
      .mapErr((error) => {
        trackExtractionAttempt(ExtractionStrategy.Readability, false, Date.now() - startTime);
        return error;
      });
  }

  private contentSelectorStage(url: string): ResultAsync<ExtractedText, SoftFailure> {
    const startTime = Date.now();
    return this.fetchHtml(url, BROWSER_HEADERS, this.options.fallbackFetchTimeoutMs, false)
      .mapErr((error) => {
        trackExtractionAttempt(ExtractionStrategy.ContentSelector, false, Date.now() - startTime);
        this.options.logger?.debug({ url, reason: error.message }, 'Fallback fetch failed');
        return softFailure(outcomeForFetchError(error));
      })
      .andThen((html) => {
        const selected = safeSelectMainContent(html);
        const duration = Date.now() - startTime;

        if (selected.isOk() && selected.value.text.length > MIN_ARTICLE_LENGTH) {
          trackExtractionAttempt(selected.value.strategy, true, duration);
          return okAsync(this.article(selected.value.text, selected.value.strategy));
        }

        trackExtractionAttempt(ExtractionStrategy.ContentSelector, false, duration);
        return errAsync(softFailure(ExtractionOutcome.Failed));
      });
  }

  private article(text: string, strategy: ExtractionStrategy): ExtractedText {
    return {
      text: truncateText(text, this.options.maxTextLength),
      outcome: ExtractionOutcome.Article,
      strategy,
      cached: false,
    };
  }

  private fetchHtml(
    url: string,
    headers: Readonly<Record<string, string>>,
    timeoutMs: number,
    requireHtml: boolean
  ): ResultAsync<string, ApiError> {
    return this.fetchOk(url, headers, timeoutMs)
      .andThen((res) => (requireHtml ? validateContentType(res) : okAsync(res)))
      .andThen((res) => this.readTextWithLimit(res));
  }

  private fetchOk(
    url: string,
    headers: Readonly<Record<string, string>>,
    timeoutMs: number,
    followCount = 0
  ): ResultAsync<HttpResponse, ApiError> {
    return ResultAsync.fromPromise(
      this.options.fetch(url, {
        ...createTimeoutSignal(timeoutMs),
        redirect: 'manual',
        headers: { ...headers },
      }),
      mapUnknownErrorToApiError(ErrorCode.ServiceUnavailable)
    ).andThen((res) => {
      // Handle redirects manually with SSRF validation
      if (res.status >= 300 && res.status < 400) {
        if (followCount >= this.options.maxRedirectFollows) {
          return errAsync(createError(ErrorCode.ServiceUnavailable, 'Too many redirects'));
        }

        const location = res.headers.get('location');
        if (!location) {
          return errAsync(
            createError(ErrorCode.ServiceUnavailable, 'Redirect without Location header')
          );
        }

        return safeResolveUrl(location, url)
          .asyncAndThen((nextUrl) => this.options.guard.validateUrlSecurity(nextUrl))
          .mapErr(mapUnknownErrorToApiError(ErrorCode.Forbidden))
          .andThen((nextUrl) =>
            this.fetchOk(nextUrl.toString(), headers, timeoutMs, followCount + 1)
          );
      }

      return res.ok
        ? okAsync<HttpResponse, ApiError>(res)
        : errAsync(
            createError(ErrorCode.UpstreamHttpError, `HTTP ${res.status}: ${res.statusText}`, {
              status: res.status,
            })
          );
    });
  }

  private readTextWithLimit(res: HttpResponse): ResultAsync<string, ApiError> {
    const { maxHtmlBytes } = this.options;
    const contentLength = Number(res.headers.get('content-length') || 0);
    if (contentLength && contentLength > maxHtmlBytes) {
      return errAsync(
        createError(
          ErrorCode.ServiceUnavailable,
          `Content too large: ${contentLength} > ${maxHtmlBytes} bytes`
        )
      );
    }

    return ResultAsync.fromPromise(
      res.text(),
      mapUnknownErrorToApiError(ErrorCode.ServiceUnavailable)
    ).andThen((html) =>
      Buffer.byteLength(html) > maxHtmlBytes
        ? errAsync(createError(ErrorCode.ServiceUnavailable, `Content exceeded ${maxHtmlBytes} bytes`))
        : okAsync(html)
    );
  }
}

const validateContentType = (response: HttpResponse): ResultAsync<HttpResponse, ApiError> => {
  const contentType = response.headers.get('content-type') || '';

  return isHtmlContentType(contentType)
    ? okAsync(response)
    : errAsync(
        createError(
          ErrorCode.ValidationError,
          `Invalid content type for extraction: ${contentType || 'none'}`
        )
      );
};

const safeResolveUrl = Result.fromThrowable(
  (location: string, base: string) => new URL(location, base),
  (error) => `Invalid redirect location: ${String(error)}`
);

const safeSelectMainContent = Result.fromThrowable(
  (html: string): SelectedContent => selectMainContent(html),
  mapUnknownErrorToApiError(ErrorCode.InternalError)
);

const outcomeForFetchError = (error: ApiError): FailureOutcome => {
  const status = error.details?.status;
  if (status === 404) return ExtractionOutcome.NotFound;
  if (status === 403) return ExtractionOutcome.Forbidden;
  return ExtractionOutcome.Failed;
};

const softFailure = (outcome: FailureOutcome): SoftFailure => ({
  text: EXTRACTION_MESSAGES[outcome],
  outcome,
  cached: false,
});
