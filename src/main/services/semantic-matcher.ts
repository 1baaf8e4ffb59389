/**
 * SemanticMatcher: ranks BEHAVIOR nodes by cosine similarity to a question.
 *
 * Behavior vectors are computed once in initialize() and shared read-only by
 * every query. The query embedding is the only asynchronous step of a match.
 */

import { createLogger } from './logger';
import { cosineSimilarity, type EmbeddingService } from './embedding-service';
import type { KnowledgeGraphService } from './knowledge-graph-service';
import type { TextPreprocessor } from './text-preprocessor';
import { ErrorCode, QAError } from '../../shared/types/errors';
import type { BehaviorNode } from '../../shared/types/knowledge-graph';
import type { MatchCandidate } from '../../shared/types/query';

const log = createLogger('SemanticMatcher');

export interface SemanticMatcherOptions {
  /** Minimum cosine similarity kept (inclusive) */
  similarityThreshold: number;
  topK: number;
}

interface IndexedBehavior {
  behaviorId: string;
  vector: number[];
}

export class SemanticMatcher {
  private index: IndexedBehavior[] = [];
  private indexedModel: string | null = null;

  constructor(
    private readonly graph: KnowledgeGraphService,
    private readonly preprocessor: TextPreprocessor,
    private readonly embeddings: EmbeddingService,
    private readonly options: SemanticMatcherOptions,
  ) {}

  /** Text embedded for a behavior: its description plus keyword tags. */
  behaviorText(node: BehaviorNode): string {
    return this.preprocessor.prepareForEmbedding(`${node.description} ${node.keywords.join(' ')}`);
  }

  /** Embedding input of every behavior, in graph order. */
  documentTexts(): string[] {
    return this.graph.findNodesByType('BEHAVIOR').map((node) => this.behaviorText(node));
  }

  async initialize(): Promise<void> {
    if (!this.graph.isBuilt()) {
      throw new QAError('Knowledge graph must be built before indexing', ErrorCode.GRAPH_NOT_BUILT, {
        severity: 'fatal',
        recoverable: false,
      });
    }

    const behaviors = this.graph.findNodesByType('BEHAVIOR');
    const vectors = await this.embeddings.embedBatch(behaviors.map((node) => this.behaviorText(node)));
    this.index = behaviors.map((node, i) => ({ behaviorId: node.id, vector: vectors[i] }));
    this.indexedModel = this.embeddings.getModelName();
    log.info(`Indexed ${this.index.length} behaviors (model: ${this.indexedModel})`);
  }

  isReady(): boolean {
    return this.indexedModel !== null;
  }

  /** Model that produced the stored behavior vectors. */
  getEmbeddingModel(): string | null {
    return this.indexedModel;
  }

  getIndexedCount(): number {
    return this.index.length;
  }

  getThreshold(): number {
    return this.options.similarityThreshold;
  }

  /**
   * Behaviors scoring at or above the threshold, by score descending and id
   * ascending. An empty result means nothing in the corpus matches.
   */
  async match(queryText: string, topK: number = this.options.topK, signal?: AbortSignal): Promise<MatchCandidate[]> {
    if (this.indexedModel === null) {
      throw new QAError('Semantic matcher is not initialized', ErrorCode.MATCHER_NOT_READY);
    }
    if (this.embeddings.getModelName() !== this.indexedModel) {
      throw new QAError(
        `Query model ${this.embeddings.getModelName()} differs from index model ${this.indexedModel}`,
        ErrorCode.INVALID_STATE,
      );
    }

    const prepared = this.preprocessor.prepareForEmbedding(queryText);
    if (prepared.length === 0) return [];

    const queryVector = await this.embeddings.embed(prepared, signal);
    const threshold = this.options.similarityThreshold;

    const candidates: MatchCandidate[] = [];
    for (const { behaviorId, vector } of this.index) {
      const score = cosineSimilarity(queryVector, vector);
      if (score >= threshold) candidates.push({ behaviorId, score });
    }

    candidates.sort(
      (a, b) => b.score - a.score || (a.behaviorId < b.behaviorId ? -1 : a.behaviorId > b.behaviorId ? 1 : 0),
    );
    log.debug(`"${prepared}" → ${candidates.length} candidates ≥ ${threshold}`);
    return candidates.slice(0, Math.max(0, topK));
  }
}
