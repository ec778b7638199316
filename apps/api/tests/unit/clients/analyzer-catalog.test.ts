import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import {
  loadAnalyzerCatalog,
  parseAnalyzerCatalog,
} from '../../../src/clients/analyzer-catalog.js';

const SHIPPED_CATALOG = fileURLToPath(new URL('../../../config/analyzers.json', import.meta.url));

describe('parseAnalyzerCatalog', () => {
  it('applies_program_defaults', () => {
    const catalog = parseAnalyzerCatalog({ lexicon: { command: 'lexicon-bin' } })._unsafeUnwrap();

    expect(catalog).toEqual({ lexicon: { command: 'lexicon-bin', args: [], acceptsModel: false } });
  });

  it('rejects_an_empty_catalog', () => {
    expect(parseAnalyzerCatalog({})._unsafeUnwrapErr()).toBe(
      'catalog: At least one analyzer must be configured'
    );
  });

  it('names_the_entry_with_a_bad_field', () => {
    const error = parseAnalyzerCatalog({ llm: { command: '' } })._unsafeUnwrapErr();

    expect(error.startsWith('llm.command:')).toBe(true);
  });
});

describe('loadAnalyzerCatalog', () => {
  it('loads_the_shipped_catalog', () => {
    const catalog = loadAnalyzerCatalog(SHIPPED_CATALOG)._unsafeUnwrap();

    expect(Object.keys(catalog)).toEqual(['lexicon', 'transformer', 'llm']);
    expect(catalog.transformer?.acceptsModel).toBe(true);
    expect(catalog.lexicon?.acceptsModel).toBe(false);
  });

  it('reports_missing_files', () => {
    const error = loadAnalyzerCatalog('/nonexistent/analyzers.json')._unsafeUnwrapErr();

    expect(error.startsWith('Cannot read analyzer catalog:')).toBe(true);
  });
});
