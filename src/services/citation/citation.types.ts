/**
 * Citation Processing Type Definitions
 */

// ============================================
// STYLES AND POLICIES
// ============================================

export const CITATION_STYLES = ['square-brace', 'superscript', 'parens'] as const;
export const REFERENCE_STYLES = ['square-brace', 'digit-dot'] as const;
export const ORDER_POLICIES = ['citation-first', 'reference-first'] as const;

/** How an in-text `\cite{label}` marker is printed */
export type CitationStyle = (typeof CITATION_STYLES)[number];

/** How the number in front of a bibliography entry is printed */
export type ReferenceStyle = (typeof REFERENCE_STYLES)[number];

/** Whether numbers follow first citation or first bibliography entry */
export type OrderPolicy = (typeof ORDER_POLICIES)[number];

export interface CitationOptions {
  citationStyle: CitationStyle;
  referenceStyle: ReferenceStyle;
  orderBy: OrderPolicy;
}

/**
 * Markup used when a citation needs an inline element rather than plain text.
 * Tag and attribute names belong to the host document format.
 */
export interface RendererConfig {
  superscriptStyleId: string;
  spanTag: string;
  styleAttribute: string;
}

// ============================================
// BIBLIOGRAPHY
// ============================================

export interface BibliographyEntry<TContent> {
  label: string;
  index: number;
  content: TContent;
}

export interface LabelIndex {
  label: string;
  index: number;
}

// ============================================
// SCANNING
// ============================================

export interface CitationMarker {
  label: string;
  match: string;
}

export interface BibItemMarker {
  label: string;
  match: string;
  /** Text after the marker up to the end of its line, trimmed */
  text: string;
}

export interface NodeMarkers {
  citations: CitationMarker[];
  bibItem: BibItemMarker | null;
}

// ============================================
// RESULTS
// ============================================

export interface CitationProcessingResult {
  citationCount: number;
  referenceCount: number;
  order: LabelIndex[];
}

export interface TextProcessingResult {
  text: string;
  result: CitationProcessingResult;
}
