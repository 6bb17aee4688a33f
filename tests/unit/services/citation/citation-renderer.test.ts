import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { isTag, isText } from 'domhandler';
import {
  referencePrefix,
  renderCitation,
  renderCitationText,
  renderReference,
  renderReferenceText,
} from '../../../../src/services/citation/citation-renderer';
import type { RendererConfig } from '../../../../src/services/citation/citation.types';

const renderer: RendererConfig = {
  superscriptStyleId: 'test-superscript',
  spanTag: 'sf:span',
  styleAttribute: 'sf:style',
};

const loadParagraph = (xml: string) => {
  const $ = cheerio.load(xml, { xmlMode: true });
  const paragraph = $('sf\\:p').toArray().filter(isTag)[0];
  return { $, paragraph };
};

describe('renderCitation', () => {
  it('renders square-brace citations as text', () => {
    const node = renderCitation('square-brace', 3, renderer);
    expect(isText(node) && node.data).toBe('[3]');
  });

  it('renders parens citations as text', () => {
    const node = renderCitation('parens', 12, renderer);
    expect(isText(node) && node.data).toBe('(12)');
  });

  it('renders superscript citations as a styled span', () => {
    const node = renderCitation('superscript', 4, renderer);

    expect(isTag(node)).toBe(true);
    if (isTag(node)) {
      expect(node.name).toBe('sf:span');
      expect(node.attribs).toEqual({ 'sf:style': 'test-superscript' });
      expect(cheerio.load('', { xmlMode: true }).xml(node)).toBe(
        '<sf:span sf:style="test-superscript">4</sf:span>'
      );
    }
  });
});

describe('renderCitationText', () => {
  it('renders each style as plain text', () => {
    expect(renderCitationText('square-brace', 7)).toBe('[7]');
    expect(renderCitationText('parens', 7)).toBe('(7)');
    expect(renderCitationText('superscript', 12)).toBe('¹²');
  });
});

describe('referencePrefix', () => {
  it('renders digit-dot and square-brace prefixes', () => {
    expect(referencePrefix('digit-dot', 2)).toBe('2. ');
    expect(referencePrefix('square-brace', 2)).toBe('[2] ');
  });
});

describe('renderReference', () => {
  it('replaces the marker and keeps formatting runs', () => {
    const { $, paragraph } = loadParagraph(
      String.raw`<sf:p sf:style="ref">\bibitem{smith} Smith, <sf:span sf:style="italic">A Title</sf:span>, 2020</sf:p>`
    );

    const rendered = renderReference('digit-dot', { label: 'smith', index: 2, content: paragraph });

    expect($.xml(rendered)).toBe(
      '<sf:p sf:style="ref">2. Smith, <sf:span sf:style="italic">A Title</sf:span>, 2020</sf:p>'
    );
  });

  it('returns a copy and leaves the source paragraph alone', () => {
    const { $, paragraph } = loadParagraph(String.raw`<sf:p>\bibitem{a} Text A</sf:p>`);

    const rendered = renderReference('square-brace', { label: 'a', index: 1, content: paragraph });

    expect(rendered).not.toBe(paragraph);
    expect($.xml(rendered)).toBe('<sf:p>[1] Text A</sf:p>');
    expect($.xml(paragraph)).toBe(String.raw`<sf:p>\bibitem{a} Text A</sf:p>`);
  });

  it('only replaces the marker of the rendered label', () => {
    const { $, paragraph } = loadParagraph(String.raw`<sf:p>\bibitem{a} see \bibitem{b}</sf:p>`);

    const rendered = renderReference('digit-dot', { label: 'a', index: 1, content: paragraph });

    expect($.xml(rendered)).toBe(String.raw`<sf:p>1. see \bibitem{b}</sf:p>`);
  });
});

describe('renderReferenceText', () => {
  it('prefixes the reference text', () => {
    expect(renderReferenceText('digit-dot', { label: 'a', index: 1, content: 'Text A' })).toBe('1. Text A');
    expect(renderReferenceText('square-brace', { label: 'a', index: 3, content: 'Text A' })).toBe('[3] Text A');
  });
});
