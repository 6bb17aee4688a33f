/**
 * Marker Scanner
 * Finds `\cite{label}` and `\bibitem{label} text` markers in a node's visible text.
 *
 * Only the literal marker syntax is recognised; escaping and nesting are not.
 */

import type { BibItemMarker, CitationMarker, NodeMarkers } from './citation.types';

export const CITATION_MARKER_SOURCE = String.raw`\\cite\{(\w+)\}`;
export const BIBITEM_MARKER_SOURCE = String.raw`\\bibitem\{(\w+)\} ?(.*)`;

// Regexes are created per call so no lastIndex state survives between scans.
export function citationPattern(): RegExp {
  return new RegExp(CITATION_MARKER_SOURCE, 'g');
}

/** Matches the marker for one label plus the single space that may follow it */
export function bibItemPatternFor(label: string): RegExp {
  return new RegExp(String.raw`\\bibitem\{${escapeRegExp(label)}\} ?`, 'g');
}

export function scanCitations(text: string): CitationMarker[] {
  const markers: CitationMarker[] = [];
  for (const match of text.matchAll(citationPattern())) {
    markers.push({ label: match[1], match: match[0] });
  }
  return markers;
}

export function scanBibItem(text: string): BibItemMarker | null {
  const match = new RegExp(BIBITEM_MARKER_SOURCE).exec(text);
  if (!match) return null;

  return {
    label: match[1],
    match: match[0],
    text: match[2].trim(),
  };
}

export function scanNode(text: string): NodeMarkers {
  return {
    citations: scanCitations(text),
    bibItem: scanBibItem(text),
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
