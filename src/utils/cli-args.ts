import { citationOptionsSchema } from '../schemas/citation.schemas';
import type { CitationOptions } from '../services/citation/citation.types';
import { AppError } from './app-error';
import { ErrorCodes } from './error-codes';

export interface ProcessPagesArgs {
  input: string;
  output: string;
  options: CitationOptions;
}

const OPTION_FLAGS = {
  '--citation-style': 'citationStyle',
  '--reference-style': 'referenceStyle',
  '--order-by': 'orderBy',
} as const;

type OptionFlag = keyof typeof OPTION_FLAGS;

const isOptionFlag = (flag: string): flag is OptionFlag => flag in OPTION_FLAGS;

export const PROCESS_PAGES_USAGE =
  'Usage: process-pages <input.pages> [output.pages] [--citation-style square-brace|superscript|parens] ' +
  '[--reference-style square-brace|digit-dot] [--order-by citation-first|reference-first]';

/**
 * Parse `process-pages` arguments. Flags take their value as the next
 * argument or after `=`; the output path defaults to the input path.
 */
export function parseProcessPagesArgs(argv: readonly string[]): ProcessPagesArgs {
  const positional: string[] = [];
  const raw: Partial<Record<(typeof OPTION_FLAGS)[OptionFlag], string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const [flag, inlineValue] = arg.split('=', 2);
    if (!isOptionFlag(flag)) {
      throw AppError.badRequest(`Unknown option ${flag}. ${PROCESS_PAGES_USAGE}`, ErrorCodes.VALIDATION_ERROR);
    }

    const value = inlineValue ?? argv[++i];
    if (value === undefined) {
      throw AppError.badRequest(`Option ${flag} needs a value`, ErrorCodes.VALIDATION_ERROR);
    }
    raw[OPTION_FLAGS[flag]] = value;
  }

  const [input, output, ...extra] = positional;
  if (!input || extra.length > 0) {
    throw AppError.badRequest(PROCESS_PAGES_USAGE, ErrorCodes.VALIDATION_ERROR);
  }

  const parsed = citationOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw AppError.badRequest(`Invalid options: ${issues}`, ErrorCodes.VALIDATION_ERROR);
  }

  return { input, output: output ?? input, options: parsed.data };
}
