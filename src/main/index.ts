/**
 * Public API of the traffic-law QA core.
 */

export { bootstrap } from './main';
export { ServiceContainer, createEmbeddingProvider } from './services/service-container';
export type { ServiceMap, ServiceKey, ServiceContainerOptions } from './services/service-container';
export { ConfigService } from './services/config';
export type { ConfigServiceOptions } from './services/config';
export { createLogger, setLogLevel, getLogLevel } from './services/logger';
export type { Logger, LogLevel } from './services/logger';
export { TextPreprocessor } from './services/text-preprocessor';
export { Taxonomy } from './services/taxonomy';
export { IntentDetector, INTENT_RULES, INTENT_RULES_VERSION } from './services/intent-detector';
export type { IntentRule } from './services/intent-detector';
export { EntityExtractor } from './services/entity-extractor';
export { KnowledgeGraphService, formatFineRange, jaccard } from './services/knowledge-graph-service';
export type { KnowledgeGraphOptions } from './services/knowledge-graph-service';
export { EmbeddingService, cosineSimilarity } from './services/embedding-service';
export { EmbeddingStore } from './services/embedding-store';
export { HashingEmbeddingProvider, OpenAIEmbeddingProvider } from './services/embedding-providers';
export type { ConceptLexicon, EmbeddingProvider, HashingEmbeddingOptions } from './services/embedding-providers';
export { SemanticMatcher } from './services/semantic-matcher';
export { KnowledgeReasoner, INTENT_GOALS } from './services/knowledge-reasoner';
export { AnswerSynthesizer } from './services/answer-synthesizer';
export { QAService } from './services/qa-service';
export { loadCorpus, parseCorpus } from './services/corpus-loader';
export * from '../shared/types';
export { QAConfigSchema } from '../shared/schemas/config-schema';
export type { QAConfigInput, QAConfigParsed } from '../shared/schemas/config-schema';
