import { AppError } from '../../utils/app-error';
import { ErrorCodes } from '../../utils/error-codes';

/**
 * Base for failures where the document's citations and bibliography disagree.
 * Raised before any node has been rewritten.
 */
export abstract class BibliographyConsistencyError extends AppError {
  constructor(
    message: string,
    code: string,
    public readonly labels: string[]
  ) {
    super(message, 422, code, { labels });
  }
}

export class DuplicateReferenceError extends BibliographyConsistencyError {
  constructor(labels: string[]) {
    super(
      `Duplicate references found for: ${labels.join(', ')}`,
      ErrorCodes.CITATION_DUPLICATE_REFERENCE,
      labels
    );
  }
}

export class MissingReferenceError extends BibliographyConsistencyError {
  constructor(
    labels: string[],
    message = `Encountered citations without a corresponding reference: ${labels.join(', ')}`,
    code: string = ErrorCodes.CITATION_MISSING_REFERENCE
  ) {
    super(message, code, labels);
  }
}

/** The other half of a mismatched label set: bibliography entries nothing cites */
export class UncitedReferenceError extends MissingReferenceError {
  constructor(labels: string[]) {
    super(
      labels,
      `Encountered references that are never cited: ${labels.join(', ')}`,
      ErrorCodes.CITATION_UNCITED_REFERENCE
    );
  }
}

export class InvalidCitationOptionError extends AppError {
  constructor(
    public readonly option: string,
    public readonly value: unknown,
    supported: readonly string[]
  ) {
    super(
      `${String(value)} is not a supported ${option}. Expected one of: ${supported.join(', ')}`,
      400,
      ErrorCodes.CITATION_UNSUPPORTED_OPTION,
      { option, value, supported }
    );
  }
}

/** Lookup of a label that was never numbered; a caller bug, not bad input. */
export class UnknownLabelError extends AppError {
  constructor(public readonly label: string) {
    super(`Label "${label}" has no assigned index`, 500, ErrorCodes.CITATION_UNKNOWN_LABEL);
  }
}
