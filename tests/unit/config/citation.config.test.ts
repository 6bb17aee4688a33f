import { describe, it, expect } from 'vitest';
import { loadCitationConfig } from '../../../src/config/citation.config';

describe('loadCitationConfig', () => {
  it('falls back to the default styles and ordering', () => {
    expect(loadCitationConfig({})).toEqual({
      defaultCitationStyle: 'square-brace',
      defaultReferenceStyle: 'digit-dot',
      defaultOrderBy: 'citation-first',
      renderer: {
        superscriptStyleId: 'SFWPCharacterStyle-50000',
        spanTag: 'sf:span',
        styleAttribute: 'sf:style',
      },
    });
  });

  it('reads styles, ordering and the superscript style id from the environment', () => {
    const config = loadCitationConfig({
      CITATION_STYLE: 'parens',
      REFERENCE_STYLE: 'square-brace',
      CITATION_ORDER_BY: 'reference-first',
      CITATION_SUPERSCRIPT_STYLE_ID: 'SFWPCharacterStyle-900',
    });

    expect(config.defaultCitationStyle).toBe('parens');
    expect(config.defaultReferenceStyle).toBe('square-brace');
    expect(config.defaultOrderBy).toBe('reference-first');
    expect(config.renderer.superscriptStyleId).toBe('SFWPCharacterStyle-900');
  });

  it('throws on an unsupported style', () => {
    expect(() => loadCitationConfig({ CITATION_STYLE: 'footnote' })).toThrow(
      /^Invalid citation configuration: CITATION_STYLE: /
    );
  });
});
