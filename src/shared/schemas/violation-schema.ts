/**
 * Zod schema for the normalized violations corpus (`{ "violations": [...] }`).
 *
 * The ETL pipeline writes snake_case fields; parsing maps them onto
 * ViolationRecord. A missing penalty is kept as `null` so that graph
 * construction can reject it with a GraphBuildError naming the record.
 */

import { z } from 'zod';
import type { ViolationRecord } from '../types/knowledge-graph';

const RawPenaltySchema = z.object({
  fine_min: z.number(),
  fine_max: z.number(),
  currency: z.string().default('VNĐ'),
  fine_text: z.string().optional(),
});

const RawLegalBasisSchema = z.union([
  z.object({
    article: z.string(),
    document: z.string().default(''),
    full_reference: z.string().optional(),
  }),
  // Older exports carried the article reference as a bare string
  z.string().transform((article) => ({ article, document: '', full_reference: undefined })),
]);

export const RawViolationSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((v) => String(v)),
  description: z.string(),
  category: z.string(),
  penalty: RawPenaltySchema.nullable().optional(),
  additional_measures: z.array(z.string()).default([]),
  legal_basis: RawLegalBasisSchema,
  severity: z.string().default('Unknown'),
  keywords: z.array(z.string()).default([]),
});

export const ViolationCorpusSchema = z.object({
  violations: z.array(RawViolationSchema),
});

export type RawViolation = z.infer<typeof RawViolationSchema>;
export type ViolationCorpus = z.infer<typeof ViolationCorpusSchema>;

export function toViolationRecord(raw: RawViolation): ViolationRecord {
  return {
    id: raw.id,
    description: raw.description,
    category: raw.category,
    penalty: raw.penalty
      ? {
          fineMin: raw.penalty.fine_min,
          fineMax: raw.penalty.fine_max,
          currency: raw.penalty.currency,
          fineText: raw.penalty.fine_text,
        }
      : null,
    additionalMeasures: raw.additional_measures,
    legalBasis: {
      article: raw.legal_basis.article,
      document: raw.legal_basis.document,
      fullReference: raw.legal_basis.full_reference,
    },
    severity: raw.severity,
    keywords: raw.keywords,
  };
}
