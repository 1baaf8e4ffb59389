/**
 * QAService: the question-answering pipeline and its boundary.
 *
 * question → preprocess → intent + entities → semantic match → reasoning
 * → synthesis. Per-question failures never escape ask(): they come back as
 * `{ ok: false, error }` and leave the shared graph and index untouched.
 */

import { createLogger } from './logger';
import { INTENT_RULES_VERSION, type IntentDetector } from './intent-detector';
import type { KnowledgeGraphService } from './knowledge-graph-service';
import type { AnswerSynthesizer } from './answer-synthesizer';
import type { EntityExtractor } from './entity-extractor';
import type { KnowledgeReasoner } from './knowledge-reasoner';
import type { SemanticMatcher } from './semantic-matcher';
import type { TextPreprocessor } from './text-preprocessor';
import { ErrorCode, QAError } from '../../shared/types/errors';
import type { KGExport } from '../../shared/types/knowledge-graph';
import type {
  AskOptions,
  BenchmarkReport,
  BenchmarkResult,
  QAAnswer,
  QAResponse,
  QAStatistics,
  SimilarViolation,
} from '../../shared/types/query';

const log = createLogger('QAService');

export interface QAServiceDeps {
  preprocessor: TextPreprocessor;
  intentDetector: IntentDetector;
  entityExtractor: EntityExtractor;
  graph: KnowledgeGraphService;
  matcher: SemanticMatcher;
  reasoner: KnowledgeReasoner;
  synthesizer: AnswerSynthesizer;
}

function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new QAError(`Query cancelled before ${stage}`, ErrorCode.QUERY_CANCELLED, { context: { stage } });
  }
}

function elapsedSince(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

export class QAService {
  constructor(private readonly deps: QAServiceDeps) {}

  /** Answer one question. Never rejects for a per-question failure. */
  async ask(question: string, options: AskOptions = {}): Promise<QAResponse> {
    const start = performance.now();
    try {
      const answer = await this.answer(question, options);
      return { ok: true, answer, elapsedMs: elapsedSince(start) };
    } catch (err) {
      const error = QAError.from(err);
      if (error.code === ErrorCode.QUERY_CANCELLED) {
        log.info(`Question cancelled: ${error.message}`);
      } else {
        log.error(`Question failed (${error.code}): ${error.message}`);
      }
      return { ok: false, question, error: error.toJSON(), elapsedMs: elapsedSince(start) };
    }
  }

  private async answer(question: string, options: AskOptions): Promise<QAAnswer> {
    const { preprocessor, intentDetector, entityExtractor, matcher, reasoner, synthesizer } = this.deps;
    const signal = options.signal;

    throwIfAborted(signal, 'preprocessing');
    const normalized = preprocessor.normalize(question);
    if (normalized.length === 0) {
      throw new QAError('Question is empty', ErrorCode.INVALID_QUERY);
    }

    const intent = intentDetector.detect(normalized);
    const extracted = entityExtractor.extract(normalized);

    throwIfAborted(signal, 'matching');
    const candidates = await matcher.match(normalized, options.topK, signal);

    throwIfAborted(signal, 'reasoning');
    const paths = reasoner.reason(candidates, intent.type, extracted);

    throwIfAborted(signal, 'synthesis');
    const answer = synthesizer.synthesize({
      question,
      normalizedQuestion: normalized,
      intent,
      entities: entityExtractor.flatten(extracted),
      paths,
    });
    log.debug(`"${normalized}" → ${intent.type}, ${candidates.length} candidates, ${answer.confidence}`);
    return answer;
  }

  /** Answer only when the match is HIGH or MEDIUM confidence. */
  async getViolationByBehavior(description: string): Promise<QAAnswer | null> {
    const response = await this.ask(description);
    if (!response.ok) return null;
    const { confidence } = response.answer;
    return confidence === 'HIGH' || confidence === 'MEDIUM' ? response.answer : null;
  }

  /** Behaviors similar to one behavior, with their penalty and legal basis. Accepts a node or record id. */
  findSimilarViolations(behaviorId: string, limit = 5): SimilarViolation[] {
    const { graph } = this.deps;
    const id = graph.hasNode(behaviorId) ? behaviorId : `behavior:${behaviorId}`;

    return graph.similarBehaviors(id, limit).map(({ node, weight }) => {
      const chain = graph.getBehaviorChain(node.id);
      const [penalty] = chain.penalties;
      return {
        behaviorId: node.id,
        description: node.description,
        category: node.category,
        weight,
        penalty: penalty
          ? { fineMin: penalty.fineMin, fineMax: penalty.fineMax, currency: penalty.currency, text: penalty.fineText }
          : null,
        legalBasis: chain.lawArticles.map((law) => law.fullReference),
      };
    });
  }

  getStatistics(): QAStatistics {
    return {
      graph: this.deps.graph.getStatistics(),
      embeddingModel: this.deps.matcher.getEmbeddingModel(),
      indexedBehaviors: this.deps.matcher.getIndexedCount(),
      intentRulesVersion: INTENT_RULES_VERSION,
    };
  }

  exportGraph(): KGExport {
    return this.deps.graph.exportGraph();
  }

  /** Run a list of questions sequentially and summarize the outcomes. */
  async benchmark(questions: string[]): Promise<BenchmarkReport> {
    const report: BenchmarkReport = {
      totalQueries: questions.length,
      successRate: 0,
      averageElapsedMs: 0,
      errorCount: 0,
      confidenceDistribution: { HIGH: 0, MEDIUM: 0, LOW: 0, NONE: 0 },
      intentDistribution: {
        penalty_inquiry: 0,
        law_reference: 0,
        behavior_check: 0,
        similar_cases: 0,
        additional_measures: 0,
        general_info: 0,
      },
      results: [],
    };

    let successes = 0;
    let totalElapsed = 0;
    for (const question of questions) {
      const response = await this.ask(question);
      totalElapsed += response.elapsedMs;

      let result: BenchmarkResult;
      if (response.ok) {
        const { confidence, intent } = response.answer;
        report.confidenceDistribution[confidence]++;
        report.intentDistribution[intent.type]++;
        if (confidence === 'HIGH' || confidence === 'MEDIUM') successes++;
        result = { question, ok: true, confidence, intent: intent.type, elapsedMs: response.elapsedMs };
      } else {
        report.errorCount++;
        result = { question, ok: false, confidence: null, intent: null, elapsedMs: response.elapsedMs };
      }
      report.results.push(result);
    }

    if (questions.length > 0) {
      report.successRate = successes / questions.length;
      report.averageElapsedMs = Math.round((totalElapsed / questions.length) * 100) / 100;
    }
    log.info(`Benchmark: ${questions.length} questions, success rate ${(report.successRate * 100).toFixed(1)}%`);
    return report;
  }
}
