/**
 * Per-request query types: intents, entities, candidates, reasoning paths
 * and the structured answer handed to the consumer.
 */

import type { BehaviorNode, EdgeType, KGNode, KGStats, NodeType } from './knowledge-graph';
import type { QAError } from './errors';

// ─── Intent ───

export type IntentType =
  | 'penalty_inquiry'
  | 'law_reference'
  | 'behavior_check'
  | 'similar_cases'
  | 'additional_measures'
  | 'general_info';

export interface DetectedIntent {
  type: IntentType;
  confidence: number;
  /** Label of the rule that fired, `default` when none did */
  rule: string;
  /** Version of the ordered rule table that produced this result */
  rulesVersion: string;
}

// ─── Entities ───

export type EntityKind = 'VEHICLE' | 'SPEED' | 'ALCOHOL' | 'KEYWORD';

interface BaseEntity {
  /** Surface text as found in the normalized query */
  text: string;
  start: number;
  end: number;
}

export interface VehicleEntity extends BaseEntity {
  kind: 'VEHICLE';
  /** Canonical vehicle id */
  value: string;
}

export interface SpeedEntity extends BaseEntity {
  kind: 'SPEED';
  /** km/h */
  value: number;
}

export interface AlcoholEntity extends BaseEntity {
  kind: 'ALCOHOL';
  /** Measured level, null for a plain mention ("say rượu") */
  value: number | null;
  unit: string | null;
}

export interface KeywordEntity extends BaseEntity {
  kind: 'KEYWORD';
  /** Canonical concept id */
  value: string;
}

export type Entity = VehicleEntity | SpeedEntity | AlcoholEntity | KeywordEntity;

export interface ExtractedEntities {
  VEHICLE: VehicleEntity[];
  SPEED: SpeedEntity[];
  ALCOHOL: AlcoholEntity[];
  KEYWORD: KeywordEntity[];
}

// ─── Matching & reasoning ───

export interface MatchCandidate {
  behaviorId: string;
  score: number;
}

export type EntityAgreement = 'full' | 'partial' | 'none' | 'not_applicable';

export interface PathStep {
  node: KGNode;
  /** Edge the node was reached by, null for the starting behavior */
  via: EdgeType | null;
  depth: number;
  /** SIMILAR_TO weight for similar-case steps */
  weight?: number;
}

export interface ReasoningPath {
  behavior: BehaviorNode;
  score: number;
  steps: PathStep[];
  requiredTypes: NodeType[];
  missingTypes: NodeType[];
  complete: boolean;
  agreement: EntityAgreement;
  /** Canonical vehicle ids the behavior applies to */
  vehicles: string[];
}

// ─── Answer ───

export type ConfidenceLevel = 'HIGH' | 'MEDIUM' | 'LOW' | 'NONE';

export interface PenaltyInfo {
  fineMin: number;
  fineMax: number;
  currency: string;
  text: string;
}

export interface Citation {
  article: string;
  documentSource: string;
  documentType: string;
  fullReference: string;
}

export interface SimilarCase {
  behaviorId: string;
  description: string;
  category: string;
  weight: number;
}

export interface RelatedCandidate {
  behaviorId: string;
  description: string;
  score: number;
  agreement: EntityAgreement;
}

export interface QAAnswer {
  question: string;
  normalizedQuestion: string;
  intent: DetectedIntent;
  entities: Entity[];
  confidence: ConfidenceLevel;
  /** Top semantic-match score, null when nothing matched */
  score: number | null;
  agreement: EntityAgreement;
  pathComplete: boolean;
  missingTypes: NodeType[];
  behavior: {
    id: string;
    description: string;
    category: string;
    severity: string;
  } | null;
  penalty: PenaltyInfo | null;
  additionalMeasures: string[];
  citations: Citation[];
  similarCases: SimilarCase[];
  relatedCandidates: RelatedCandidate[];
  message: string;
  suggestions: string[];
}

export type QAResponse =
  | { ok: true; answer: QAAnswer; elapsedMs: number }
  | { ok: false; question: string; error: ReturnType<QAError['toJSON']>; elapsedMs: number };

export interface AskOptions {
  topK?: number;
  signal?: AbortSignal;
}

// ─── Service extras ───

export interface SimilarViolation {
  behaviorId: string;
  description: string;
  category: string;
  weight: number;
  penalty: PenaltyInfo | null;
  legalBasis: string[];
}

export interface QAStatistics {
  graph: KGStats;
  embeddingModel: string | null;
  indexedBehaviors: number;
  intentRulesVersion: string;
}

export interface BenchmarkResult {
  question: string;
  ok: boolean;
  confidence: ConfidenceLevel | null;
  intent: IntentType | null;
  elapsedMs: number;
}

export interface BenchmarkReport {
  totalQueries: number;
  /** Share of queries answered with HIGH or MEDIUM confidence */
  successRate: number;
  averageElapsedMs: number;
  errorCount: number;
  confidenceDistribution: Record<ConfidenceLevel, number>;
  intentDistribution: Record<IntentType, number>;
  results: BenchmarkResult[];
}
