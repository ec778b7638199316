import { describe, expect, it } from 'vitest';
import { selectMainContent } from '../../../../src/features/extract/content-selector.js';
import { HTML_FIXTURES, PARAGRAPH } from '../../../helpers/fixtures.js';

describe('selectMainContent', () => {
  it('prefers_the_main_container_and_drops_navigation', () => {
    expect(selectMainContent(HTML_FIXTURES.mainContainer)).toEqual({
      text: PARAGRAPH,
      strategy: 'content-selector',
      selector: 'main',
    });
  });

  it('skips_containers_with_too_little_text', () => {
    expect(selectMainContent(HTML_FIXTURES.contentClass)).toEqual({
      text: PARAGRAPH,
      strategy: 'content-selector',
      selector: '.content',
    });
  });

  it('falls_back_to_the_page_body_without_scripts', () => {
    expect(selectMainContent(HTML_FIXTURES.fullPage)).toEqual({
      text: 'Alpha beta gamma',
      strategy: 'full-page',
    });
  });
});
