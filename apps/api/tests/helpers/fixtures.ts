import { fileURLToPath } from 'node:url';
import { type ExtractedText, ExtractionOutcome, ExtractionStrategy } from '../../src/core/types.js';

export const ANALYZER_FIXTURES_DIR = fileURLToPath(new URL('../fixtures/analyzers', import.meta.url));

export const analyzerScript = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/analyzers/${name}`, import.meta.url));

// 224 characters, single spaced
export const PARAGRAPH =
  'The regional council approved a new transit budget on Tuesday after a long debate over fares, ' +
  'service hours and the cost of extending the northern line, with supporters calling it overdue ' +
  'and critics warning of higher taxes.';

export const HTML_FIXTURES = {
  mainContainer: `<!DOCTYPE html>
<html>
<head><title>Transit budget</title><style>p { color: red; }</style></head>
<body>
  <nav>Home News Sport</nav>
  <main><p>${PARAGRAPH}</p></main>
  <footer>Copyright</footer>
</body>
</html>`,

  contentClass: `<!DOCTYPE html>
<html>
<body>
  <article>Too short</article>
  <div class="content"><p>${PARAGRAPH}</p></div>
</body>
</html>`,

  fullPage: `<!DOCTYPE html>
<html>
<body><script>var tracking = true;</script><div><p>Alpha beta</p>
  <p>gamma</p></div></body>
</html>`,

  readableArticle: `<!DOCTYPE html>
<html>
<head><title>Transit budget approved</title></head>
<body>
  <header><a href="/">Daily Example</a></header>
  <article>
    <h1>Transit budget approved</h1>
    <p>${PARAGRAPH}</p>
    <p>${PARAGRAPH}</p>
    <p>${PARAGRAPH}</p>
    <p>${PARAGRAPH}</p>
  </article>
</body>
</html>`,
};

export const articleText = (text: string): ExtractedText => ({
  text,
  outcome: ExtractionOutcome.Article,
  strategy: ExtractionStrategy.Readability,
  cached: false,
});
