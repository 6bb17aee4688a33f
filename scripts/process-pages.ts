/**
 * Rewrite \cite{} and \bibitem{} markers in a Pages document
 *
 * Usage:
 *   npx tsx scripts/process-pages.ts paper.pages
 *   npx tsx scripts/process-pages.ts paper.pages paper-cited.pages --citation-style superscript
 *
 * Options:
 *   --citation-style    square-brace | superscript | parens
 *   --reference-style   square-brace | digit-dot
 *   --order-by          citation-first | reference-first
 *
 * Defaults come from CITATION_STYLE, REFERENCE_STYLE and CITATION_ORDER_BY.
 */

import { PagesDocument } from '../src/services/document/pages-document.service';
import { BibliographyConsistencyError } from '../src/services/citation/citation-errors';
import { parseProcessPagesArgs } from '../src/utils/cli-args';

async function main() {
  const { input, output, options } = parseProcessPagesArgs(process.argv.slice(2));

  console.log('\n=== Citation Processing ===');
  console.log(`Input: ${input}`);
  console.log(`Output: ${output}`);
  console.log(`Citations: ${options.citationStyle}, references: ${options.referenceStyle}, order: ${options.orderBy}`);

  const document = await PagesDocument.open(input);
  const result = document.processCitations(options);
  await document.materialize(output);

  console.log('\n=== Numbering ===');
  for (const { label, index } of result.order) {
    console.log(`${index}. ${label}`);
  }
  console.log(`\n${result.citationCount} citations, ${result.referenceCount} references`);
}

main().catch((error: unknown) => {
  if (error instanceof BibliographyConsistencyError) {
    console.error(`${error.message}`);
    console.error(`Labels: ${error.labels.join(', ')}`);
  } else {
    console.error('Citation processing failed:', error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
