/**
 * ServiceContainer: lightweight DI container for the QA core services.
 *
 * Provides typed access, phased initialization (config → text services →
 * graph → embeddings and index → pipeline) and ordered shutdown.
 *
 * Usage:
 *   const container = new ServiceContainer({ configOptions: { configPath: 'qa.config.json' } });
 *   await container.init();
 *   const response = await container.get('qa').ask('Xe máy vượt đèn đỏ bị phạt bao nhiêu?');
 *   ...
 *   await container.shutdown();
 */

import { createLogger, setLogLevel } from './logger';
import { ConfigService, type ConfigServiceOptions } from './config';
import { TextPreprocessor } from './text-preprocessor';
import { Taxonomy } from './taxonomy';
import { IntentDetector } from './intent-detector';
import { EntityExtractor } from './entity-extractor';
import { KnowledgeGraphService } from './knowledge-graph-service';
import { EmbeddingStore } from './embedding-store';
import { EmbeddingService } from './embedding-service';
import {
  HashingEmbeddingProvider,
  OpenAIEmbeddingProvider,
  type ConceptLexicon,
  type EmbeddingProvider,
} from './embedding-providers';
import { SemanticMatcher } from './semantic-matcher';
import { KnowledgeReasoner } from './knowledge-reasoner';
import { AnswerSynthesizer } from './answer-synthesizer';
import { QAService } from './qa-service';
import { loadCorpus } from './corpus-loader';
import { EmbeddingUnavailableError, ErrorCode, QAError } from '../../shared/types/errors';
import type { EmbeddingConfig } from '../../shared/schemas/config-schema';
import type { ViolationRecord } from '../../shared/types/knowledge-graph';

const log = createLogger('Container');

// ─── Service Map: typed registry of all services ───

export interface ServiceMap {
  config: ConfigService;
  preprocessor: TextPreprocessor;
  taxonomy: Taxonomy;
  intentDetector: IntentDetector;
  entityExtractor: EntityExtractor;
  graph: KnowledgeGraphService;
  embeddingStore: EmbeddingStore;
  embedding: EmbeddingService;
  matcher: SemanticMatcher;
  reasoner: KnowledgeReasoner;
  synthesizer: AnswerSynthesizer;
  qa: QAService;
}

export type ServiceKey = keyof ServiceMap;

export interface ServiceContainerOptions {
  /** Ready-made config; otherwise built from configOptions */
  config?: ConfigService;
  configOptions?: ConfigServiceOptions;
  /** Corpus records; otherwise read from config corpusPath */
  records?: ViolationRecord[];
  /** Embedding capability; otherwise chosen by config embedding.provider */
  embeddingProvider?: EmbeddingProvider;
}

/** Build the provider named in config. The local provider takes the taxonomy concepts. */
export function createEmbeddingProvider(
  config: EmbeddingConfig,
  env: NodeJS.ProcessEnv = process.env,
  concepts?: ConceptLexicon,
): EmbeddingProvider {
  if (config.provider === 'tfidf') return new HashingEmbeddingProvider({ concepts });

  const apiKey = env[config.apiKeyEnv];
  if (!apiKey) {
    throw new EmbeddingUnavailableError(`OpenAI embeddings need an API key in ${config.apiKeyEnv}`, {
      model: config.model,
    });
  }
  return new OpenAIEmbeddingProvider({ apiKey, model: config.model });
}

export class ServiceContainer {
  private services: Partial<ServiceMap> = {};
  private initialized = false;

  constructor(private readonly options: ServiceContainerOptions = {}) {}

  /**
   * Get a registered service by key (typed).
   * Throws if the container hasn't been initialized yet or service doesn't exist.
   */
  get<K extends ServiceKey>(key: K): ServiceMap[K] {
    if (!this.initialized) {
      throw new QAError('ServiceContainer not initialized, call init() first', ErrorCode.INVALID_STATE);
    }
    const svc = this.services[key];
    if (!svc) {
      throw new QAError(`Service '${key}' not found in container`, ErrorCode.INVALID_STATE);
    }
    return svc;
  }

  has(key: ServiceKey): boolean {
    return this.services[key] !== undefined;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Initialize all services in dependency order. A failure closes whatever
   * was opened and is rethrown; GraphBuildError aborts startup here.
   */
  async init(): Promise<void> {
    if (this.initialized) {
      throw new QAError('ServiceContainer already initialized', ErrorCode.INVALID_STATE);
    }

    log.info('Initializing services...');
    const t0 = Date.now();

    try {
      // ── Phase 1: Config ──
      const config = this.options.config ?? new ConfigService(this.options.configOptions);
      setLogLevel(config.get('logLevel'));
      this.set('config', config);

      // ── Phase 2: Text services (pure, no I/O) ──
      const preprocessor = new TextPreprocessor();
      const taxonomy = new Taxonomy(preprocessor);
      this.set('preprocessor', preprocessor);
      this.set('taxonomy', taxonomy);
      this.set('intentDetector', new IntentDetector(preprocessor));
      this.set('entityExtractor', new EntityExtractor(preprocessor, taxonomy));

      // ── Phase 3: Knowledge graph ──
      const records = this.options.records ?? (await loadCorpus(config.resolvePath(config.get('corpusPath'))));
      const graph = new KnowledgeGraphService(preprocessor, taxonomy, config.get('graph'));
      graph.build(records);
      this.set('graph', graph);

      // ── Phase 4: Embeddings + behavior index ──
      const embeddingConfig = config.get('embedding');
      const provider =
        this.options.embeddingProvider ??
        createEmbeddingProvider(embeddingConfig, this.options.configOptions?.env, {
          vehicles: taxonomy.vehicleAliases(),
          contexts: taxonomy.contextAliases(),
        });
      const store = new EmbeddingStore(config.resolvePath(embeddingConfig.cachePath));
      this.set('embeddingStore', store);
      const embedding = new EmbeddingService(provider, store, { hotCacheSize: embeddingConfig.hotCacheSize });
      this.set('embedding', embedding);

      const matcher = new SemanticMatcher(graph, preprocessor, embedding, config.get('matcher'));
      if (provider instanceof HashingEmbeddingProvider) {
        provider.fit(matcher.documentTexts());
      }
      await matcher.initialize();
      this.set('matcher', matcher);

      // ── Phase 5: Pipeline ──
      const reasoner = new KnowledgeReasoner(graph, config.get('reasoner'));
      const synthesizer = new AnswerSynthesizer(config.get('confidence'));
      this.set('reasoner', reasoner);
      this.set('synthesizer', synthesizer);
      this.set(
        'qa',
        new QAService({
          preprocessor,
          intentDetector: this.require('intentDetector'),
          entityExtractor: this.require('entityExtractor'),
          graph,
          matcher,
          reasoner,
          synthesizer,
        }),
      );
    } catch (err) {
      log.error('Service initialization failed:', err instanceof Error ? err.message : err);
      this.trySync('embeddingStore', (s) => s.close());
      this.services = {};
      throw err;
    }

    this.initialized = true;
    log.info(`All services initialized in ${Date.now() - t0}ms`);
  }

  /**
   * Graceful shutdown. Releases resources in reverse dependency order.
   */
  async shutdown(): Promise<void> {
    if (!this.initialized) return;

    log.info('Graceful shutdown started');
    const t0 = Date.now();

    // ── Close the embedding cache (must be last) ──
    this.trySync('embeddingStore', (s) => s.close());

    this.initialized = false;
    this.services = {};
    log.info(`Graceful shutdown completed in ${Date.now() - t0}ms`);
  }

  // ─── Private helpers ───

  private set<K extends ServiceKey>(key: K, service: ServiceMap[K]): void {
    this.services[key] = service;
  }

  /** Access during init(), before the container is marked initialized. */
  private require<K extends ServiceKey>(key: K): ServiceMap[K] {
    const svc = this.services[key];
    if (!svc) throw new QAError(`Service '${key}' was not registered`, ErrorCode.INVALID_STATE);
    return svc;
  }

  /** Safely call a sync method on a service, logging errors. */
  private trySync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => void): void {
    const svc = this.services[key];
    if (!svc) return;
    try {
      fn(svc);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }
}
