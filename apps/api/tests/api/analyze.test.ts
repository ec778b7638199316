import { err } from 'neverthrow';
import { afterEach, describe, expect, it } from 'vitest';
import { ProcessAnalyzerInvoker } from '../../src/clients/analyzer.js';
import { ErrorCode, createError } from '../../src/core/errors.js';
import type { ApiServer } from '../../src/core/http.js';
import { ExtractionOutcome } from '../../src/core/types.js';
import { ANALYZER_FIXTURES_DIR, analyzerScript } from '../helpers/fixtures.js';
import { StubAnalyzer, StubExtractor, buildTestServer, loginAs } from '../helpers/test-server.js';
import { parseJson } from '../helpers/testing.js';

const ARTICLE_URL = 'http://example.com/article';

interface ErrorBody {
  error: { code: string; message: string; statusCode: number; details?: Record<string, unknown> };
}

describe('POST /analyze', () => {
  let server: ApiServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  const analyze = (app: ApiServer, payload: Record<string, unknown>, cookie?: string) =>
    app.inject({
      method: 'POST',
      url: '/analyze',
      payload,
      headers: cookie ? { cookie } : {},
    });

  describe('authentication', () => {
    it('returns_401_and_does_no_work_without_a_session', async () => {
      const extractor = new StubExtractor();
      const analyzer = new StubAnalyzer();
      const built = await buildTestServer({ extractor, analyzer });
      server = built.server;

      const response = await analyze(server, { url: ARTICLE_URL });

      expect(response.statusCode).toBe(401);
      expect(extractor.calls).toEqual([]);
      expect(analyzer.invocations).toEqual([]);
    });

    it('checks_the_session_before_the_body', async () => {
      ({ server } = await buildTestServer());

      const response = await analyze(server, {});

      expect(response.statusCode).toBe(401);
    });
  });

  describe('with a session', () => {
    it('returns_results_and_console_message', async () => {
      ({ server } = await buildTestServer());
      const cookie = await loginAs(server, 'alice');

      const response = await analyze(server, { url: ARTICLE_URL }, cookie);

      expect(response.statusCode).toBe(200);
      expect(parseJson(response)).toEqual({
        results: { left: 60, right: 40, message: 'ok', explanation: 'ok' },
        console_message: 'Successfully analyzed article from http://example.com/article',
      });
    });

    it('defaults_to_the_lexicon_analyzer', async () => {
      const analyzer = new StubAnalyzer();
      ({ server } = await buildTestServer({ analyzer }));
      const cookie = await loginAs(server, 'alice');

      await analyze(server, { url: ARTICLE_URL, model: 'phi-2' }, cookie);

      expect(analyzer.invocations).toEqual([
        { kind: 'lexicon', text: `Article body for ${ARTICLE_URL}`, model: 'phi-2' },
      ]);
    });

    it('returns_400_when_url_is_missing_or_blank', async () => {
      ({ server } = await buildTestServer());
      const cookie = await loginAs(server, 'alice');

      const missing = await analyze(server, {}, cookie);
      const blank = await analyze(server, { url: '   ' }, cookie);

      expect(missing.statusCode).toBe(400);
      expect(parseJson<ErrorBody>(missing).error.code).toBe('VALIDATION_ERROR');
      expect(blank.statusCode).toBe(400);
    });

    it('analyzes_fallback_text_when_extraction_fails', async () => {
      const extractor = new StubExtractor(() => ({
        text: 'Could not extract text: the page was not found (HTTP 404).',
        outcome: ExtractionOutcome.NotFound,
        cached: false,
      }));
      ({ server } = await buildTestServer({ extractor }));
      const cookie = await loginAs(server, 'alice');

      const response = await analyze(server, { url: 'http://example.com/missing' }, cookie);

      expect(response.statusCode).toBe(200);
      expect(parseJson<{ console_message: string }>(response).console_message).toBe(
        'Text extraction failed for http://example.com/missing; analyzed fallback text'
      );
    });

    it('returns_the_analyzer_error_and_records_nothing', async () => {
      const analyzer = new StubAnalyzer(
        err(createError(ErrorCode.AnalyzerExecutionError, 'Analyzer exited with 1: boom'))
      );
      ({ server } = await buildTestServer({ analyzer }));
      const cookie = await loginAs(server, 'alice');

      const response = await analyze(server, { url: ARTICLE_URL }, cookie);
      const history = await server.inject({ method: 'GET', url: '/history', headers: { cookie } });

      expect(response.statusCode).toBe(500);
      expect(parseJson(response)).toEqual({
        error: {
          code: 'ANALYZER_EXECUTION_ERROR',
          message: 'Analyzer exited with 1: boom',
          statusCode: 500,
        },
      });
      expect(parseJson(history)).toEqual([]);
    });
  });

  describe('with external analyzer programs', () => {
    const buildWithPrograms = (extractor: StubExtractor = new StubExtractor()) =>
      buildTestServer({
        extractor,
        analyzer: new ProcessAnalyzerInvoker({
          catalog: {
            lexicon: {
              command: process.execPath,
              args: [analyzerScript('score.mjs')],
              acceptsModel: false,
            },
            transformer: {
              command: process.execPath,
              args: [analyzerScript('args.mjs')],
              acceptsModel: true,
            },
          },
          workdir: ANALYZER_FIXTURES_DIR,
          timeoutMs: 10000,
          maxInputLength: 5000,
        }),
      });

    it('scores_through_the_configured_program', async () => {
      ({ server } = await buildWithPrograms());
      const cookie = await loginAs(server, 'alice');

      const response = await analyze(server, { url: ARTICLE_URL, analyzer_type: 'lexicon' }, cookie);

      expect(parseJson(response)).toEqual({
        results: { left: 70, right: 30, message: 'ok', explanation: 'chars=43' },
        console_message: 'Successfully analyzed article from http://example.com/article',
      });
    });

    it('passes_and_records_the_model_for_the_transformer', async () => {
      ({ server } = await buildWithPrograms());
      const cookie = await loginAs(server, 'alice');

      const response = await analyze(
        server,
        { url: ARTICLE_URL, analyzer_type: 'transformer', model: 'phi-2' },
        cookie
      );
      const history = await server.inject({ method: 'GET', url: '/history', headers: { cookie } });

      expect(parseJson<{ results: { message: string } }>(response).results.message).toBe(
        '--model phi-2'
      );
      expect(parseJson<Array<{ model: string | null }>>(history).map((item) => item.model)).toEqual([
        'phi-2',
      ]);
    });

    it('returns_400_for_an_unknown_analyzer_type_without_fetching_the_url', async () => {
      const extractor = new StubExtractor();
      ({ server } = await buildWithPrograms(extractor));
      const cookie = await loginAs(server, 'alice');

      const response = await analyze(server, { url: ARTICLE_URL, analyzer_type: 'astrology' }, cookie);

      expect(response.statusCode).toBe(400);
      expect(parseJson(response)).toEqual({
        error: {
          code: 'UNKNOWN_ANALYZER_KIND',
          message: 'Unknown analyzer type: astrology',
          statusCode: 400,
          details: { known: ['lexicon', 'transformer'] },
        },
      });
      expect(extractor.calls).toEqual([]);
    });
  });
});
