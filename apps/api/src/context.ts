import type { FastifyBaseLogger } from 'fastify';
import type { Result } from 'neverthrow';
import { fetch as undiciFetch } from 'undici';
import { loadAnalyzerCatalog } from './clients/analyzer-catalog.js';
import { type AnalyzerInvoker, ProcessAnalyzerInvoker } from './clients/analyzer.js';
import { ArticleExtractor, type HttpFetch, type TextExtractor } from './features/extract/usecase.js';
import { ExtractionCache } from './lib/cache.js';
import type { AppConfig } from './lib/config.js';
import { createUrlGuard } from './lib/ssrf-guard.js';
import type { Store } from './store/types.js';

/**
 * Long-lived collaborators built once at startup and handed to every route.
 */
export interface AppContext {
  config: AppConfig;
  logger: FastifyBaseLogger;
  store: Store;
  extractor: TextExtractor;
  analyzer: AnalyzerInvoker;
}

const httpFetch: HttpFetch = (url, init) => undiciFetch(url, init);

export function createAppContext(
  config: AppConfig,
  logger: FastifyBaseLogger,
  store: Store
): Result<AppContext, string> {
  return loadAnalyzerCatalog(config.analyzersFile).map((catalog) => {
    const extractor = new ArticleExtractor({
      fetchTimeoutMs: config.fetchTimeoutMs,
      fallbackFetchTimeoutMs: config.fallbackFetchTimeoutMs,
      maxHtmlBytes: config.maxHtmlBytes,
      maxRedirectFollows: config.maxRedirectFollows,
      maxTextLength: config.maxTextLength,
      guard: createUrlGuard({
        blockedPorts: config.blockedPorts,
        allowDnsFailure: config.allowDnsFailure,
      }),
      fetch: httpFetch,
      cache: new ExtractionCache({
        maxSize: config.extractCacheMaxSize,
        ttlSeconds: config.extractCacheTtlSec,
      }),
      logger: logger.child({ component: 'extractor' }),
    });

    const analyzer = new ProcessAnalyzerInvoker({
      catalog,
      workdir: config.analyzerWorkdir,
      timeoutMs: config.analyzerTimeoutMs,
      maxInputLength: config.maxTextLength,
      logger: logger.child({ component: 'analyzer' }),
    });

    return { config, logger, store, extractor, analyzer };
  });
}
