/**
 * Bibliography
 *
 * Numbers labels in the order they are first seen (by citation or by reference,
 * depending on the order policy) and holds the single reference per label.
 * Built fresh for each processing run; read-only once the scan is complete.
 */

import { DuplicateReferenceError, UnknownLabelError } from './citation-errors';
import type { BibliographyEntry, LabelIndex, OrderPolicy } from './citation.types';

export class Bibliography<TContent> {
  private readonly order = new Map<string, number>();
  private readonly references = new Map<string, TContent>();
  private readonly cited: string[] = [];

  constructor(public readonly orderBy: OrderPolicy = 'citation-first') {}

  /** Every citation occurrence in scan order, repeats included */
  get citations(): readonly string[] {
    return this.cited;
  }

  addCitation(label: string): void {
    this.cited.push(label);

    if (this.orderBy === 'citation-first') {
      this.assignIndex(label);
    }
  }

  addReference(label: string, content: TContent): void {
    if (this.references.has(label)) {
      throw new DuplicateReferenceError([label]);
    }

    this.references.set(label, content);

    if (this.orderBy === 'reference-first') {
      this.assignIndex(label);
    }
  }

  indexOf(label: string): number {
    const index = this.order.get(label);
    if (index === undefined) {
      throw new UnknownLabelError(label);
    }
    return index;
  }

  referenceByLabel(label: string): BibliographyEntry<TContent> {
    return { label, index: this.indexOf(label), content: this.contentOf(label) };
  }

  entryByIndex(index: number): BibliographyEntry<TContent> {
    if (!Number.isInteger(index) || index < 1 || index > this.count()) {
      throw new RangeError(`Reference index ${index} is outside 1..${this.count()}`);
    }

    for (const [label, assigned] of this.order) {
      if (assigned === index) {
        return { label, index, content: this.contentOf(label) };
      }
    }

    throw new RangeError(`No label has been assigned index ${index}`);
  }

  /** Entries in sequence-number order */
  entries(): BibliographyEntry<TContent>[] {
    const entries: BibliographyEntry<TContent>[] = [];
    for (let index = 1; index <= this.count(); index++) {
      entries.push(this.entryByIndex(index));
    }
    return entries;
  }

  isConsistent(): boolean {
    return this.missingLabels().length === 0 && this.uncitedLabels().length === 0;
  }

  /** Cited labels with no reference, in first-citation order */
  missingLabels(): string[] {
    return [...new Set(this.cited)].filter((label) => !this.references.has(label));
  }

  /** Referenced labels that are never cited, in reference order */
  uncitedLabels(): string[] {
    const cited = new Set(this.cited);
    return [...this.references.keys()].filter((label) => !cited.has(label));
  }

  count(): number {
    return Math.max(this.order.size, this.references.size);
  }

  /** Assigned numbers as label/index pairs, lowest index first */
  numbering(): LabelIndex[] {
    return [...this.order]
      .map(([label, index]) => ({ label, index }))
      .sort((a, b) => a.index - b.index);
  }

  private contentOf(label: string): TContent {
    const content = this.references.get(label);
    if (content === undefined) {
      throw new UnknownLabelError(label);
    }
    return content;
  }

  private assignIndex(label: string): void {
    if (!this.order.has(label)) {
      this.order.set(label, this.order.size + 1);
    }
  }
}
