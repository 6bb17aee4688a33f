import { z } from 'zod';
import {
  CITATION_STYLES,
  ORDER_POLICIES,
  REFERENCE_STYLES,
  type RendererConfig,
} from '../services/citation/citation.types';

const citationEnvSchema = z.object({
  CITATION_STYLE: z.enum(CITATION_STYLES).default('square-brace'),
  REFERENCE_STYLE: z.enum(REFERENCE_STYLES).default('digit-dot'),
  CITATION_ORDER_BY: z.enum(ORDER_POLICIES).default('citation-first'),
  // High enough that no real document allocates it
  CITATION_SUPERSCRIPT_STYLE_ID: z.string().min(1).default('SFWPCharacterStyle-50000'),
});

export type CitationEnv = z.infer<typeof citationEnvSchema>;

export function loadCitationConfig(env: NodeJS.ProcessEnv = process.env) {
  const result = citationEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid citation configuration: ${issues}`);
  }

  const renderer: RendererConfig = {
    superscriptStyleId: result.data.CITATION_SUPERSCRIPT_STYLE_ID,
    spanTag: 'sf:span',
    styleAttribute: 'sf:style',
  };

  return {
    defaultCitationStyle: result.data.CITATION_STYLE,
    defaultReferenceStyle: result.data.REFERENCE_STYLE,
    defaultOrderBy: result.data.CITATION_ORDER_BY,
    renderer,
  };
}

export type CitationConfig = ReturnType<typeof loadCitationConfig>;

export const citationConfig: CitationConfig = loadCitationConfig();
