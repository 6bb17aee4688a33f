/**
 * Citation Renderer
 * Turns assigned sequence numbers into the text or markup that replaces each marker.
 *
 * Styles dispatch through Record tables keyed by the style unions, so a style
 * added to citation.types.ts does not compile until it is rendered here.
 */

import { cloneNode, type ChildNode, type Element } from 'domhandler';
import { toSuperscript } from '../../utils/unicode';
import { createElement, createText, textNodes } from '../shared/xml-tree';
import { bibItemPatternFor } from './marker-scanner';
import type {
  BibliographyEntry,
  CitationStyle,
  ReferenceStyle,
  RendererConfig,
} from './citation.types';

type CitationNodeRenderer = (index: number, config: RendererConfig) => ChildNode;

const citationNodeRenderers: Record<CitationStyle, CitationNodeRenderer> = {
  'square-brace': (index) => createText(`[${index}]`),
  parens: (index) => createText(`(${index})`),
  superscript: (index, config) =>
    createElement(config.spanTag, { [config.styleAttribute]: config.superscriptStyleId }, [
      createText(String(index)),
    ]),
};

const citationTextRenderers: Record<CitationStyle, (index: number) => string> = {
  'square-brace': (index) => `[${index}]`,
  parens: (index) => `(${index})`,
  superscript: (index) => toSuperscript(String(index)),
};

const referencePrefixes: Record<ReferenceStyle, (index: number) => string> = {
  'digit-dot': (index) => `${index}. `,
  'square-brace': (index) => `[${index}] `,
};

export function renderCitation(style: CitationStyle, index: number, config: RendererConfig): ChildNode {
  return citationNodeRenderers[style](index, config);
}

export function renderCitationText(style: CitationStyle, index: number): string {
  return citationTextRenderers[style](index);
}

export function referencePrefix(style: ReferenceStyle, index: number): string {
  return referencePrefixes[style](index);
}

/**
 * Render a bibliography entry whose content is the paragraph that carried its
 * `\bibitem` marker. Returns a detached copy with the marker replaced by the
 * numbered prefix; formatting runs inside the paragraph are kept as they were.
 */
export function renderReference(style: ReferenceStyle, entry: BibliographyEntry<Element>): Element {
  const rendered = cloneNode(entry.content, true);
  const prefix = referencePrefix(style, entry.index);

  for (const textNode of textNodes(rendered)) {
    textNode.data = textNode.data.replace(bibItemPatternFor(entry.label), () => prefix);
  }

  return rendered;
}

export function renderReferenceText(style: ReferenceStyle, entry: BibliographyEntry<string>): string {
  return referencePrefix(style, entry.index) + entry.content;
}
