import { JSDOM } from 'jsdom';
import { ExtractionStrategy } from '../../core/types.js';
import { collapseWhitespace } from '../../lib/text-utils.js';

const NON_CONTENT_TAGS = 'script, style, nav, header, footer, meta';

// Tried in order; the first container with enough text wins
export const CONTENT_SELECTORS = [
  'article',
  'main',
  '[role="main"]',
  '.content',
  '#content',
  '.article-body',
  '.story-body',
] as const;

export const MIN_CONTAINER_LENGTH = 200;

export interface SelectedContent {
  text: string;
  strategy: ExtractionStrategy.ContentSelector | ExtractionStrategy.FullPage;
  selector?: string;
}

/**
 * Picks the main content container of a page, or the whole page's visible text
 * when no container holds more than MIN_CONTAINER_LENGTH characters.
 * The returned text is whitespace-collapsed but not truncated.
 */
export function selectMainContent(html: string): SelectedContent {
  const dom = new JSDOM(html);
  const { document } = dom.window;

  for (const element of document.querySelectorAll(NON_CONTENT_TAGS)) {
    element.remove();
  }

  for (const selector of CONTENT_SELECTORS) {
    const container = document.querySelector(selector);
    if (!container) continue;

    const text = collapseWhitespace(container.textContent ?? '');
    if (text.length > MIN_CONTAINER_LENGTH) {
      dom.window.close();
      return { text, strategy: ExtractionStrategy.ContentSelector, selector };
    }
  }

  const text = collapseWhitespace(document.body?.textContent ?? '');
  dom.window.close();
  return { text, strategy: ExtractionStrategy.FullPage };
}
