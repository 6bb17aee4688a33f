/**
 * Citation Processor Service
 * Replaces `\cite{label}` markers with numbers and renumbers `\bibitem{label}` entries
 *
 * Runs in four phases over a document's text-bearing nodes:
 * 1. Scan every node once, numbering labels and collecting marker-bearing nodes
 * 2. Validate that citations and references name the same labels
 * 3. Rewrite citation markers in place
 * 4. Render the bibliography in sequence order and splice it over the reference nodes
 *
 * Nothing is mutated until phase 2 has passed, so a failed run leaves the nodes untouched.
 */

import { isText, type ChildNode, type Element } from 'domhandler';
import { logger } from '../../lib/logger';
import { citationConfig } from '../../config/citation.config';
import { createText, fullText, replaceNode, splice, textNodes } from '../shared/xml-tree';
import { Bibliography } from './bibliography';
import {
  InvalidCitationOptionError,
  MissingReferenceError,
  UncitedReferenceError,
} from './citation-errors';
import {
  renderCitation,
  renderCitationText,
  renderReference,
  renderReferenceText,
} from './citation-renderer';
import { citationPattern, scanNode } from './marker-scanner';
import {
  CITATION_STYLES,
  ORDER_POLICIES,
  REFERENCE_STYLES,
  type CitationOptions,
  type CitationProcessingResult,
  type CitationStyle,
  type RendererConfig,
  type TextProcessingResult,
} from './citation.types';

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && (values as readonly string[]).includes(value);
}

class CitationProcessorService {
  /**
   * Number and render every citation and bibliography entry in `nodes`.
   * The nodes are mutated in place; their order is document order.
   */
  processCitations(
    nodes: readonly Element[],
    options: CitationOptions,
    renderer: RendererConfig = citationConfig.renderer
  ): CitationProcessingResult {
    this.assertSupportedOptions(options);

    const bibliography = new Bibliography<Element>(options.orderBy);
    const citationNodes: Element[] = [];
    const referenceNodes: Element[] = [];

    for (const node of nodes) {
      const { citations, bibItem } = scanNode(fullText(node));

      if (citations.length > 0) {
        citationNodes.push(node);
        for (const citation of citations) {
          bibliography.addCitation(citation.label);
        }
      }

      if (bibItem) {
        referenceNodes.push(node);
        bibliography.addReference(bibItem.label, node);
      }
    }

    this.assertConsistent(bibliography);

    logger.info(
      `[CitationProcessor] Found ${bibliography.citations.length} citations and ${referenceNodes.length} references (${options.orderBy})`
    );

    for (const node of citationNodes) {
      this.rewriteCitationNode(node, options.citationStyle, bibliography, renderer);
    }

    // Every entry is rendered before any splice so no entry reads an overwritten node
    const renderedReferences = bibliography
      .entries()
      .map((entry) => renderReference(options.referenceStyle, entry));

    renderedReferences.forEach((rendered, position) => {
      splice(rendered, referenceNodes[position]);
    });

    return {
      citationCount: bibliography.citations.length,
      referenceCount: renderedReferences.length,
      order: bibliography.numbering(),
    };
  }

  /**
   * Same algorithm for a plain-text document: each line is a node and a
   * reference's content is the trimmed text after its marker.
   */
  processCitationText(text: string, options: CitationOptions): TextProcessingResult {
    this.assertSupportedOptions(options);

    // The capture group keeps each line's own ending at the odd positions
    const parts = text.split(/(\r?\n)/);
    const lines = parts.filter((_, position) => position % 2 === 0);
    const lineBreaks = parts.filter((_, position) => position % 2 === 1);
    const bibliography = new Bibliography<string>(options.orderBy);
    const citationLines: number[] = [];
    const referenceLines: number[] = [];

    lines.forEach((line, lineNumber) => {
      const { citations, bibItem } = scanNode(line);

      if (citations.length > 0) {
        citationLines.push(lineNumber);
        for (const citation of citations) {
          bibliography.addCitation(citation.label);
        }
      }

      if (bibItem) {
        referenceLines.push(lineNumber);
        bibliography.addReference(bibItem.label, bibItem.text);
      }
    });

    this.assertConsistent(bibliography);

    const replaceCitations = (value: string): string =>
      value.replace(citationPattern(), (_marker, label: string) =>
        renderCitationText(options.citationStyle, bibliography.indexOf(label))
      );

    const output = [...lines];
    for (const lineNumber of citationLines) {
      output[lineNumber] = replaceCitations(lines[lineNumber]);
    }

    const entries = bibliography.entries();
    entries.forEach((entry, position) => {
      output[referenceLines[position]] = replaceCitations(
        renderReferenceText(options.referenceStyle, entry)
      );
    });

    return {
      text: output.map((line, lineNumber) => line + (lineBreaks[lineNumber] ?? '')).join(''),
      result: {
        citationCount: bibliography.citations.length,
        referenceCount: entries.length,
        order: bibliography.numbering(),
      },
    };
  }

  /** Reject unsupported styles before anything is scanned */
  assertSupportedOptions(options: CitationOptions): void {
    if (!isOneOf(CITATION_STYLES, options.citationStyle)) {
      throw new InvalidCitationOptionError('citation style', options.citationStyle, CITATION_STYLES);
    }
    if (!isOneOf(REFERENCE_STYLES, options.referenceStyle)) {
      throw new InvalidCitationOptionError('reference style', options.referenceStyle, REFERENCE_STYLES);
    }
    if (!isOneOf(ORDER_POLICIES, options.orderBy)) {
      throw new InvalidCitationOptionError('ordering', options.orderBy, ORDER_POLICIES);
    }
  }

  private assertConsistent<TContent>(bibliography: Bibliography<TContent>): void {
    if (bibliography.isConsistent()) return;

    const missing = bibliography.missingLabels();
    if (missing.length > 0) {
      logger.warn(`[CitationProcessor] Citations without references: ${missing.join(', ')}`);
      throw new MissingReferenceError(missing);
    }

    const uncited = bibliography.uncitedLabels();
    logger.warn(`[CitationProcessor] References never cited: ${uncited.join(', ')}`);
    throw new UncitedReferenceError(uncited);
  }

  /**
   * Replace the markers in each descendant text node independently, so
   * formatting elements between markers are left where they are.
   */
  private rewriteCitationNode(
    node: Element,
    style: CitationStyle,
    bibliography: Bibliography<Element>,
    renderer: RendererConfig
  ): void {
    for (const textNode of textNodes(node)) {
      // With a capture group, split yields text and labels alternately
      const pieces = textNode.data.split(citationPattern());
      if (pieces.length === 1) continue;

      const replacements: ChildNode[] = [];
      let pending = '';

      pieces.forEach((piece, position) => {
        if (position % 2 === 0) {
          pending += piece;
          return;
        }

        const rendered = renderCitation(style, bibliography.indexOf(piece), renderer);
        if (isText(rendered)) {
          pending += rendered.data;
          return;
        }

        if (pending) replacements.push(createText(pending));
        pending = '';
        replacements.push(rendered);
      });

      if (pending) replacements.push(createText(pending));
      replaceNode(textNode, replacements);
    }
  }
}

export const citationProcessorService = new CitationProcessorService();
export { CitationProcessorService };
