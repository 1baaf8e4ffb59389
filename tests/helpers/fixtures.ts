/**
 * Shared test fixtures: a small violation corpus and a deterministic
 * embedding provider whose vectors are concept-presence flags, so cosine
 * scores can be worked out by hand.
 */

import type { EmbeddingProvider } from '../../src/main/services/embedding-providers';
import { EmbeddingService } from '../../src/main/services/embedding-service';
import { EntityExtractor } from '../../src/main/services/entity-extractor';
import { IntentDetector } from '../../src/main/services/intent-detector';
import { KnowledgeGraphService } from '../../src/main/services/knowledge-graph-service';
import { KnowledgeReasoner, type KnowledgeReasonerOptions } from '../../src/main/services/knowledge-reasoner';
import { AnswerSynthesizer } from '../../src/main/services/answer-synthesizer';
import { QAService } from '../../src/main/services/qa-service';
import { SemanticMatcher, type SemanticMatcherOptions } from '../../src/main/services/semantic-matcher';
import { Taxonomy } from '../../src/main/services/taxonomy';
import { TextPreprocessor } from '../../src/main/services/text-preprocessor';
import type { ViolationRecord } from '../../src/shared/types/knowledge-graph';

// ─── Corpus ───

export const TEST_RECORDS: ViolationRecord[] = [
  {
    id: 'mc-red-light',
    description:
      'Người điều khiển xe mô tô, xe gắn máy không chấp hành hiệu lệnh của đèn tín hiệu giao thông (vượt đèn đỏ)',
    category: 'Xe mô tô, xe gắn máy',
    penalty: { fineMin: 800000, fineMax: 1000000, currency: 'VNĐ' },
    additionalMeasures: ['Tước quyền sử dụng giấy phép lái xe từ 01 tháng đến 03 tháng'],
    legalBasis: { article: 'Điều 6 khoản 4 điểm e', document: 'Nghị định 100/2019/NĐ-CP' },
    severity: 'Nghiêm trọng',
    keywords: ['đèn đỏ', 'vượt đèn'],
  },
  {
    id: 'mc-no-helmet',
    description: 'Không đội mũ bảo hiểm hoặc đội mũ bảo hiểm không cài quai đúng quy cách',
    category: 'Xe mô tô, xe gắn máy',
    penalty: { fineMin: 200000, fineMax: 300000, currency: 'VNĐ' },
    additionalMeasures: [],
    legalBasis: { article: 'Điều 6 khoản 2 điểm i', document: 'Nghị định 100/2019/NĐ-CP' },
    severity: 'Trung bình',
    keywords: ['mũ bảo hiểm'],
  },
  {
    id: 'car-red-light',
    description: 'Người điều khiển xe ô tô không chấp hành hiệu lệnh của đèn tín hiệu giao thông',
    category: 'Xe ô tô',
    penalty: { fineMin: 4000000, fineMax: 6000000, currency: 'VNĐ' },
    additionalMeasures: ['Tước quyền sử dụng giấy phép lái xe từ 01 tháng đến 03 tháng'],
    legalBasis: { article: 'Điều 5 khoản 5 điểm a', document: 'Nghị định 100/2019/NĐ-CP' },
    severity: 'Nghiêm trọng',
    keywords: ['đèn đỏ'],
  },
  {
    id: 'pedestrian-red-light',
    description: 'Người đi bộ không chấp hành hiệu lệnh của đèn tín hiệu giao thông',
    category: 'Người đi bộ',
    penalty: { fineMin: 60000, fineMax: 100000, currency: 'VNĐ' },
    additionalMeasures: [],
    legalBasis: { article: 'Điều 9 khoản 1 điểm a', document: 'Nghị định 100/2019/NĐ-CP' },
    severity: 'Nhẹ',
    keywords: ['đèn đỏ'],
  },
  {
    id: 'mc-passenger-no-helmet',
    description: 'Chở người ngồi trên xe không đội mũ bảo hiểm',
    category: 'Xe mô tô, xe gắn máy',
    penalty: { fineMin: 200000, fineMax: 300000, currency: 'VNĐ' },
    additionalMeasures: [],
    legalBasis: { article: 'Điều 6 khoản 2 điểm i', document: 'Nghị định 100/2019/NĐ-CP' },
    severity: 'Trung bình',
    keywords: ['mũ bảo hiểm', 'chở người'],
  },
  {
    id: 'car-speed',
    description: 'Điều khiển xe ô tô chạy quá tốc độ quy định từ 20 km/h đến 35 km/h',
    category: 'Xe ô tô',
    penalty: { fineMin: 6000000, fineMax: 8000000, currency: 'VNĐ' },
    additionalMeasures: ['Tước quyền sử dụng giấy phép lái xe từ 02 tháng đến 04 tháng'],
    legalBasis: { article: 'Điều 5 khoản 6 điểm a', document: 'Nghị định 100/2019/NĐ-CP' },
    severity: 'Nghiêm trọng',
    keywords: ['quá tốc độ'],
  },
  {
    id: 'alcohol',
    description: 'Điều khiển xe trên đường mà trong máu hoặc hơi thở có nồng độ cồn',
    category: 'Nồng độ cồn',
    penalty: { fineMin: 2000000, fineMax: 3000000, currency: 'VNĐ' },
    additionalMeasures: [],
    legalBasis: { article: 'Điều 6 khoản 6 điểm c', document: 'Nghị định 100/2019/NĐ-CP' },
    severity: 'Rất nghiêm trọng',
    keywords: ['nồng độ cồn'],
  },
];

/** Deep copy so a test can alter records without touching the shared corpus. */
export function cloneRecords(): ViolationRecord[] {
  return structuredClone(TEST_RECORDS);
}

// ─── Concept embedding ───

/** One vector dimension per concept; a dimension is 1 when any trigger phrase occurs. */
export const CONCEPTS: ReadonlyArray<readonly string[]> = [
  ['đèn đỏ', 'đèn tín hiệu', 'vượt đèn'],
  ['mũ bảo hiểm'],
  ['xe máy', 'mô tô'],
  ['ô tô'],
  ['tốc độ'],
  ['nồng độ cồn', 'rượu'],
  ['đi bộ'],
  ['dây an toàn'],
  ['điện thoại'],
  ['giấy phép lái xe'],
  ['xăng'],
  ['chở người'],
];

const CONCEPT_PATTERNS = CONCEPTS.map(
  (triggers) => new RegExp(`(?<![\\p{L}\\p{N}])(?:${triggers.join('|')})(?![\\p{L}\\p{N}])`, 'u'),
);

export function conceptVector(text: string): number[] {
  return CONCEPT_PATTERNS.map((pattern) => (pattern.test(text) ? 1 : 0));
}

export class ConceptEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'concept-test-v1';
  calls = 0;
  /** When set, every call rejects with this error */
  failWith: Error | null = null;

  async embed(text: string): Promise<number[]> {
    this.calls++;
    if (this.failWith) throw this.failWith;
    return conceptVector(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls++;
    if (this.failWith) throw this.failWith;
    return texts.map(conceptVector);
  }
}

// ─── Wiring ───

export interface PipelineOptions {
  records?: ViolationRecord[];
  provider?: EmbeddingProvider;
  matcher?: Partial<SemanticMatcherOptions>;
  reasoner?: Partial<KnowledgeReasonerOptions>;
  confidence?: { high: number; medium: number };
}

export interface TestPipeline {
  preprocessor: TextPreprocessor;
  taxonomy: Taxonomy;
  graph: KnowledgeGraphService;
  embeddings: EmbeddingService;
  matcher: SemanticMatcher;
  reasoner: KnowledgeReasoner;
  synthesizer: AnswerSynthesizer;
  extractor: EntityExtractor;
  qa: QAService;
}

export function createGraph(records: ViolationRecord[] = TEST_RECORDS): {
  preprocessor: TextPreprocessor;
  taxonomy: Taxonomy;
  graph: KnowledgeGraphService;
} {
  const preprocessor = new TextPreprocessor();
  const taxonomy = new Taxonomy(preprocessor);
  const graph = new KnowledgeGraphService(preprocessor, taxonomy, { similarityEdgeThreshold: 0.3 });
  graph.build(records);
  return { preprocessor, taxonomy, graph };
}

export async function createPipeline(options: PipelineOptions = {}): Promise<TestPipeline> {
  const { preprocessor, taxonomy, graph } = createGraph(options.records);
  const embeddings = new EmbeddingService(options.provider ?? new ConceptEmbeddingProvider());
  const matcher = new SemanticMatcher(graph, preprocessor, embeddings, {
    similarityThreshold: 0.6,
    topK: 5,
    ...options.matcher,
  });
  await matcher.initialize();

  const reasoner = new KnowledgeReasoner(graph, {
    maxDepth: 2,
    rankingScoreDecimals: 2,
    dropVehicleMismatches: false,
    similarLimit: 5,
    ...options.reasoner,
  });
  const synthesizer = new AnswerSynthesizer(options.confidence ?? { high: 0.8, medium: 0.6 });
  const extractor = new EntityExtractor(preprocessor, taxonomy);
  const qa = new QAService({
    preprocessor,
    intentDetector: new IntentDetector(preprocessor),
    entityExtractor: extractor,
    graph,
    matcher,
    reasoner,
    synthesizer,
  });

  return { preprocessor, taxonomy, graph, embeddings, matcher, reasoner, synthesizer, extractor, qa };
}
