import { describe, expect, it } from 'vitest';
import { collapseWhitespace, isDownloadLink, truncateText } from '../../../src/lib/text-utils.js';

describe('collapseWhitespace', () => {
  it('joins_lines_and_runs_of_spaces_into_single_spaces', () => {
    expect(collapseWhitespace('  First line\n\n  second\t\tline  ')).toBe('First line second line');
  });

  it('returns_empty_string_for_whitespace_only_input', () => {
    expect(collapseWhitespace(' \n\t ')).toBe('');
  });
});

describe('truncateText', () => {
  it('keeps_text_within_the_limit', () => {
    expect(truncateText('short', 5)).toBe('short');
  });

  it('cuts_text_to_exactly_the_limit', () => {
    expect(truncateText('abcdefghij', 4)).toBe('abcd');
  });

  it('drops_a_surrogate_pair_that_straddles_the_limit', () => {
    // '\u{1F5F3}' is two UTF-16 units
    expect(truncateText('abc\u{1F5F3}def', 4)).toBe('abc');
    expect(truncateText('abc\u{1F5F3}def', 5)).toBe('abc\u{1F5F3}');
  });
});

describe('isDownloadLink', () => {
  const downloads = [
    'https://example.com/files/report.pdf',
    'https://example.com/files/REPORT.PDF?download=1',
    'https://example.com/slides.pptx#page=2',
    'https://example.com/archive.zip',
  ];

  for (const url of downloads) {
    it(`detects_${url}`, () => {
      expect(isDownloadLink(url)).toBe(true);
    });
  }

  it('ignores_html_pages', () => {
    expect(isDownloadLink('https://example.com/news/story.html')).toBe(false);
  });

  it('ignores_dots_in_directory_names', () => {
    expect(isDownloadLink('https://example.com/v1.2/story')).toBe(false);
  });

  it('ignores_extensions_in_the_query_string', () => {
    expect(isDownloadLink('https://example.com/story?file=report.pdf')).toBe(false);
  });

  it('checks_the_raw_string_when_the_url_does_not_parse', () => {
    expect(isDownloadLink('not a url/file.zip')).toBe(true);
  });
});
