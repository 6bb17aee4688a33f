import { describe, it, expect } from 'vitest';
import {
  bibItemPatternFor,
  scanBibItem,
  scanCitations,
  scanNode,
} from '../../../../src/services/citation/marker-scanner';

describe('scanCitations', () => {
  it('finds every citation marker in order, repeats included', () => {
    const text = String.raw`See \cite{b}, \cite{a} and again \cite{b}.`;

    expect(scanCitations(text).map((marker) => marker.label)).toEqual(['b', 'a', 'b']);
  });

  it('returns the full matched marker', () => {
    expect(scanCitations(String.raw`x \cite{smith_2020} y`)).toEqual([
      { label: 'smith_2020', match: String.raw`\cite{smith_2020}` },
    ]);
  });

  it('ignores markers whose label is not made of word characters', () => {
    expect(scanCitations(String.raw`\cite{} \cite{a-b} \cite{a b}`)).toEqual([]);
  });

  it('does not carry state between calls', () => {
    const text = String.raw`\cite{a}`;
    expect(scanCitations(text)).toHaveLength(1);
    expect(scanCitations(text)).toHaveLength(1);
  });
});

describe('scanBibItem', () => {
  it('captures the label and the trimmed text after it', () => {
    expect(scanBibItem(String.raw`\bibitem{a}   Text A  `)).toEqual({
      label: 'a',
      match: String.raw`\bibitem{a}   Text A  `,
      text: 'Text A',
    });
  });

  it('allows the marker with no text after it', () => {
    expect(scanBibItem(String.raw`\bibitem{a}`)).toEqual({
      label: 'a',
      match: String.raw`\bibitem{a}`,
      text: '',
    });
  });

  it('stops the text at the end of the line', () => {
    expect(scanBibItem(String.raw`\bibitem{a} First line` + '\nSecond line')?.text).toBe('First line');
  });

  it('honours only the first marker', () => {
    expect(scanBibItem(String.raw`\bibitem{a} A \bibitem{b} B`)?.label).toBe('a');
  });

  it('returns null without a marker', () => {
    expect(scanBibItem('plain paragraph')).toBeNull();
  });
});

describe('scanNode', () => {
  it('reports citations and a bib item found in the same text', () => {
    const markers = scanNode(String.raw`\bibitem{a} Alpha, compare \cite{b}`);

    expect(markers.citations.map((marker) => marker.label)).toEqual(['b']);
    expect(markers.bibItem?.label).toBe('a');
    expect(markers.bibItem?.text).toBe(String.raw`Alpha, compare \cite{b}`);
  });
});

describe('bibItemPatternFor', () => {
  it('matches the marker for one label and a single following space', () => {
    const text = String.raw`\bibitem{a}  Text`;
    expect(text.replace(bibItemPatternFor('a'), '1. ')).toBe('1.  Text');
  });

  it('does not match other labels', () => {
    expect(bibItemPatternFor('a').test(String.raw`\bibitem{ab} Text`)).toBe(false);
  });
});
