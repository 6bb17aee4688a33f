export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  NOT_FOUND: 'NOT_FOUND',

  FILE_INVALID_TYPE: 'FILE_INVALID_TYPE',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  FILE_MISSING: 'FILE_MISSING',

  PAGES_INVALID_DOCUMENT: 'PAGES_INVALID_DOCUMENT',

  CITATION_DUPLICATE_REFERENCE: 'CITATION_DUPLICATE_REFERENCE',
  CITATION_MISSING_REFERENCE: 'CITATION_MISSING_REFERENCE',
  CITATION_UNCITED_REFERENCE: 'CITATION_UNCITED_REFERENCE',
  CITATION_UNSUPPORTED_OPTION: 'CITATION_UNSUPPORTED_OPTION',
  CITATION_UNKNOWN_LABEL: 'CITATION_UNKNOWN_LABEL',
} as const;
