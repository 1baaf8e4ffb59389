/**
 * Zod schema for the QA core configuration.
 *
 * Single source of truth for config shape, defaults, and validation.
 * Every tunable threshold of the pipeline lives here rather than in code.
 *
 * @module shared/schemas/config-schema
 */

import { z } from 'zod';

// ─── Sub-schemas ───

const EmbeddingConfigSchema = z.object({
  /** `openai` calls the embeddings API, `tfidf` runs the local feature-hashing model */
  provider: z.enum(['openai', 'tfidf']).default('tfidf'),
  /** Model name; the provider default is used when omitted */
  model: z.string().min(1).optional(),
  /** Environment variable holding the API key */
  apiKeyEnv: z.string().default('OPENAI_API_KEY'),
  /** SQLite file for the persistent vector cache, `:memory:` keeps it in-process */
  cachePath: z.string().default(':memory:'),
  hotCacheSize: z.number().int().positive().default(10_000),
});

const MatcherConfigSchema = z.object({
  /** Minimum cosine similarity for a match to count (inclusive) */
  similarityThreshold: z.number().min(-1).max(1).default(0.6),
  topK: z.number().int().positive().default(5),
});

const GraphConfigSchema = z.object({
  /** Keyword Jaccard similarity a SIMILAR_TO edge must exceed */
  similarityEdgeThreshold: z.number().min(0).max(1).default(0.3),
});

const ReasonerConfigSchema = z.object({
  maxDepth: z.number().int().min(1).max(6).default(2),
  /** Scores equal at this many decimals count as equally similar when ranking */
  rankingScoreDecimals: z.number().int().min(0).max(6).default(2),
  dropVehicleMismatches: z.boolean().default(false),
  similarLimit: z.number().int().positive().default(5),
});

const ConfidenceConfigSchema = z
  .object({
    high: z.number().min(0).max(1).default(0.8),
    medium: z.number().min(0).max(1).default(0.6),
  })
  .refine((c) => c.medium <= c.high, { message: 'confidence.medium must not exceed confidence.high' });

// ─── Main config schema ───

export const QAConfigSchema = z.object({
  /** Schema version for migrations */
  _version: z.number().default(1),

  /** Normalized violations JSON produced by the ETL pipeline */
  corpusPath: z.string().default('./data/violations.json'),

  embedding: EmbeddingConfigSchema.default({}),
  matcher: MatcherConfigSchema.default({}),
  graph: GraphConfigSchema.default({}),
  reasoner: ReasonerConfigSchema.default({}),
  confidence: ConfidenceConfigSchema.default({}),

  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

// ─── Derived types ───

/** Full config after parsing (defaults applied, all fields present) */
export type QAConfigParsed = z.infer<typeof QAConfigSchema>;

/** Config input (all fields optional), as read from a file or passed as overrides */
export type QAConfigInput = z.input<typeof QAConfigSchema>;

export type EmbeddingConfig = QAConfigParsed['embedding'];
export type MatcherConfig = QAConfigParsed['matcher'];
export type ReasonerConfig = QAConfigParsed['reasoner'];
export type ConfidenceThresholds = QAConfigParsed['confidence'];

// ─── Migration system ───

export const CURRENT_CONFIG_VERSION = 1;

export type ConfigMigration = (config: Record<string, unknown>) => Record<string, unknown>;

/**
 * Ordered migrations: key = source version, value = transform to next version.
 */
export const CONFIG_MIGRATIONS: Record<number, ConfigMigration> = {
  // v0 kept the match threshold at the top level
  0: (cfg) => {
    const { similarityThreshold, ...rest } = cfg;
    if (typeof similarityThreshold !== 'number') return { ...rest, _version: 1 };
    const matcher = typeof rest.matcher === 'object' && rest.matcher !== null ? rest.matcher : {};
    return { ...rest, matcher: { ...matcher, similarityThreshold }, _version: 1 };
  },
};
