/**
 * Citation Processing Validation Schemas
 *
 * Zod schemas for validating citation processing API requests.
 * Controllers parse with these; a ZodError reaches the error handler as a 400.
 */

import { z } from 'zod';
import { citationConfig } from '../config/citation.config';
import {
  CITATION_STYLES,
  ORDER_POLICIES,
  REFERENCE_STYLES,
} from '../services/citation/citation.types';

// ============================================
// ENUMS
// ============================================

export const citationStyleEnum = z.enum(CITATION_STYLES);

export const referenceStyleEnum = z.enum(REFERENCE_STYLES);

export const orderPolicyEnum = z.enum(ORDER_POLICIES);

// ============================================
// BODY SCHEMAS
// ============================================

/**
 * Rendering options; omitted fields fall back to the configured defaults.
 * Also the multipart fields sent alongside an uploaded Pages package.
 */
export const citationOptionsSchema = z.object({
  citationStyle: citationStyleEnum.default(citationConfig.defaultCitationStyle),
  referenceStyle: referenceStyleEnum.default(citationConfig.defaultReferenceStyle),
  orderBy: orderPolicyEnum.default(citationConfig.defaultOrderBy),
});

export const processTextBodySchema = citationOptionsSchema.extend({
  text: z.string().min(1, 'Text is required'),
});
