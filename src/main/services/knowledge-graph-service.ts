/**
 * KnowledgeGraphService: typed graph of violations, penalties and the legal
 * basis behind them.
 *
 * Built once from the violation corpus and read-only afterwards. Nodes live in
 * an arena keyed by id; edges are indexed by (node id, edge type, direction)
 * so neighbor and similar-behavior lookups are plain map reads.
 *
 * One record yields one BEHAVIOR and one PENALTY node. LAW_ARTICLE,
 * ADDITIONAL_MEASURE, VEHICLE_TYPE and VIOLATION_CONTEXT nodes are shared
 * between records and deduplicated by their normalized text. Only behaviors
 * and penalties have outgoing structural edges, so following edges from one
 * behavior never reaches another record's penalty.
 */

import { createLogger } from './logger';
import { ErrorCode, GraphBuildError, NotFoundError, QAError } from '../../shared/types/errors';
import type {
  BehaviorChain,
  BehaviorNode,
  EdgeDirection,
  EdgeType,
  KGEdge,
  KGExport,
  KGNode,
  KGStats,
  LegalDocumentType,
  NodeOfType,
  NodeType,
  SimilarBehavior,
  ViolationRecord,
} from '../../shared/types/knowledge-graph';
import type { Taxonomy } from './taxonomy';
import type { TextPreprocessor } from './text-preprocessor';

const log = createLogger('KnowledgeGraph');

export interface KnowledgeGraphOptions {
  /** Keyword Jaccard similarity a SIMILAR_TO edge must exceed */
  similarityEdgeThreshold: number;
}

const DEFAULT_OPTIONS: KnowledgeGraphOptions = { similarityEdgeThreshold: 0.3 };

export function isNodeOfType<T extends NodeType>(node: KGNode, type: T): node is NodeOfType<T> {
  return node.type === type;
}

/** 1500000 → "1.500.000" */
export function formatAmount(amount: number): string {
  return String(Math.trunc(amount)).replace(/\B(?=(\d{3})+(?!\d))/g, '.');
}

export function formatFineRange(fineMin: number, fineMax: number, currency: string): string {
  if (fineMin === 0 && fineMax === 0) return 'Chưa xác định';
  if (fineMin === fineMax) return `Phạt tiền ${formatAmount(fineMin)} ${currency}`;
  return `Phạt tiền từ ${formatAmount(fineMin)} đến ${formatAmount(fineMax)} ${currency}`;
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

function emptyNodeCounts(): Record<NodeType, number> {
  return {
    BEHAVIOR: 0,
    PENALTY: 0,
    LAW_ARTICLE: 0,
    ADDITIONAL_MEASURE: 0,
    VEHICLE_TYPE: 0,
    VIOLATION_CONTEXT: 0,
  };
}

function emptyEdgeCounts(): Record<EdgeType, number> {
  return {
    LEADS_TO_PENALTY: 0,
    BASED_ON_LAW: 0,
    HAS_ADDITIONAL: 0,
    APPLIES_TO_VEHICLE: 0,
    IN_CONTEXT: 0,
    SIMILAR_TO: 0,
  };
}

export class KnowledgeGraphService {
  private nodes = new Map<string, KGNode>();
  private edges: KGEdge[] = [];
  private adjacency = new Map<string, KGEdge[]>();
  private edgeKeys = new Set<string>();
  private behaviorKeywords = new Map<string, ReadonlySet<string>>();
  private readonly contextByAlias: Map<string, string>;
  private readonly options: KnowledgeGraphOptions;
  private built = false;

  constructor(
    private readonly preprocessor: TextPreprocessor,
    private readonly taxonomy: Taxonomy,
    options: Partial<KnowledgeGraphOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.contextByAlias = new Map(taxonomy.contextAliases().map((entry) => [entry.alias, entry.canonical]));
  }

  // ═══════════════════════════════════════════════════
  //  Construction
  // ═══════════════════════════════════════════════════

  /**
   * Build the graph from the full corpus, replacing any previous content.
   * The whole corpus is validated before anything is inserted.
   */
  build(records: readonly ViolationRecord[]): KGStats {
    this.validate(records);
    this.reset();

    for (const record of records) {
      this.addRecord(record);
    }
    const similarPairs = this.addSimilarityEdges();
    this.built = true;

    const stats = this.getStatistics();
    log.info(
      `Built knowledge graph: ${stats.totalNodes} nodes, ${stats.totalEdges} edges, ` +
        `${records.length} behaviors, ${similarPairs} similar pairs`,
    );
    if (records.length === 0) log.warn('Knowledge graph built from an empty corpus');
    return stats;
  }

  isBuilt(): boolean {
    return this.built;
  }

  private reset(): void {
    this.nodes = new Map();
    this.edges = [];
    this.adjacency = new Map();
    this.edgeKeys = new Set();
    this.behaviorKeywords = new Map();
    this.built = false;
  }

  private validate(records: readonly ViolationRecord[]): void {
    const ids = new Set<string>();
    for (const record of records) {
      const context = { recordId: record.id };
      if (ids.has(record.id)) {
        throw new GraphBuildError(`Duplicate violation id "${record.id}"`, context);
      }
      ids.add(record.id);

      if (record.description.trim().length === 0) {
        throw new GraphBuildError(`Violation "${record.id}" has an empty description`, context);
      }
      if (record.penalty === null) {
        throw new GraphBuildError(`Violation "${record.id}" has no penalty`, context);
      }
      const { fineMin, fineMax } = record.penalty;
      if (fineMin < 0 || fineMax < 0 || fineMin > fineMax) {
        throw new GraphBuildError(`Violation "${record.id}" has an invalid fine range ${fineMin}–${fineMax}`, {
          ...context,
          fineMin,
          fineMax,
        });
      }
      if (this.taxonomy.resolveCategory(record.category) === null) {
        throw new GraphBuildError(`Violation "${record.id}" has unknown category "${record.category}"`, {
          ...context,
          category: record.category,
        });
      }
    }
  }

  private addRecord(record: ViolationRecord): void {
    const penalty = record.penalty;
    const category = this.taxonomy.resolveCategory(record.category);
    // Both were checked in validate()
    if (penalty === null || category === null) {
      throw new QAError(`Violation "${record.id}" changed during build`, ErrorCode.INVALID_STATE);
    }

    const keywords = this.behaviorKeywordsOf(record);
    const behaviorId = `behavior:${record.id}`;
    this.addNode({
      id: behaviorId,
      type: 'BEHAVIOR',
      text: record.description,
      recordId: record.id,
      description: record.description,
      category: record.category,
      severity: record.severity,
      keywords,
    });
    this.behaviorKeywords.set(behaviorId, new Set(keywords));

    const penaltyId = `penalty:${record.id}`;
    const fineText = penalty.fineText?.trim() || formatFineRange(penalty.fineMin, penalty.fineMax, penalty.currency);
    this.addNode({
      id: penaltyId,
      type: 'PENALTY',
      text: fineText,
      fineMin: penalty.fineMin,
      fineMax: penalty.fineMax,
      currency: penalty.currency,
      fineText,
    });
    this.addEdge(behaviorId, penaltyId, 'LEADS_TO_PENALTY');

    const { article, document } = record.legalBasis;
    if (article.trim().length > 0) {
      const lawId = `law:${this.preprocessor.normalize(article)}|${this.preprocessor.normalize(document)}`;
      const fullReference = record.legalBasis.fullReference?.trim() || `${article} ${document}`.trim();
      this.addNode({
        id: lawId,
        type: 'LAW_ARTICLE',
        text: fullReference,
        article,
        documentSource: document,
        documentType: this.detectDocumentType(document),
        fullReference,
      });
      this.addEdge(penaltyId, lawId, 'BASED_ON_LAW');
    }

    for (const measure of record.additionalMeasures) {
      const key = this.preprocessor.normalize(measure);
      if (key.length === 0) continue;
      const measureId = `measure:${key}`;
      this.addNode({ id: measureId, type: 'ADDITIONAL_MEASURE', text: measure, measure });
      this.addEdge(penaltyId, measureId, 'HAS_ADDITIONAL');
    }

    for (const vehicle of category.vehicles) {
      const vehicleId = `vehicle:${vehicle}`;
      this.addNode({ id: vehicleId, type: 'VEHICLE_TYPE', text: this.taxonomy.vehicleLabel(vehicle), vehicle });
      this.addEdge(behaviorId, vehicleId, 'APPLIES_TO_VEHICLE');
    }

    for (const context of this.contextsOf(record, category.context)) {
      const contextId = `context:${context}`;
      this.addNode({ id: contextId, type: 'VIOLATION_CONTEXT', text: this.taxonomy.contextLabel(context), context });
      this.addEdge(behaviorId, contextId, 'IN_CONTEXT');
    }
  }

  /** Record tags first, then description tokens; normalized and unique. */
  private behaviorKeywordsOf(record: ViolationRecord): string[] {
    const keywords = new Set<string>();
    for (const keyword of record.keywords) {
      const normalized = this.preprocessor.normalize(keyword);
      if (normalized.length > 0) keywords.add(normalized);
    }
    for (const token of this.preprocessor.extractKeywords(record.description)) {
      keywords.add(token);
    }
    return [...keywords];
  }

  private contextsOf(record: ViolationRecord, categoryContext: string | null): string[] {
    const contexts = new Set<string>();
    if (categoryContext !== null) contexts.add(categoryContext);
    for (const keyword of record.keywords) {
      const normalized = this.preprocessor.normalize(keyword);
      const context = this.contextByAlias.get(normalized) ?? (this.taxonomy.hasContext(keyword) ? keyword : undefined);
      if (context !== undefined) contexts.add(context);
    }
    return [...contexts];
  }

  private detectDocumentType(document: string): LegalDocumentType {
    const normalized = this.preprocessor.normalize(document);
    if (normalized.includes('nghị định')) return 'Nghị định';
    if (normalized.includes('thông tư')) return 'Thông tư';
    if (normalized.includes('luật')) return 'Luật';
    return 'Khác';
  }

  /** Pairwise keyword Jaccard; each pair is scored once and stored both ways. */
  private addSimilarityEdges(): number {
    const behaviors = [...this.behaviorKeywords.entries()];
    let pairs = 0;
    for (let i = 0; i < behaviors.length; i++) {
      for (let j = i + 1; j < behaviors.length; j++) {
        const [aId, aKeywords] = behaviors[i];
        const [bId, bKeywords] = behaviors[j];
        const weight = jaccard(aKeywords, bKeywords);
        if (weight > this.options.similarityEdgeThreshold) {
          this.addEdge(aId, bId, 'SIMILAR_TO', weight);
          this.addEdge(bId, aId, 'SIMILAR_TO', weight);
          pairs++;
        }
      }
    }
    return pairs;
  }

  private addNode(node: KGNode): void {
    if (!this.nodes.has(node.id)) this.nodes.set(node.id, node);
  }

  private addEdge(sourceId: string, targetId: string, type: EdgeType, weight = 1): void {
    const key = `${sourceId}\u0000${targetId}\u0000${type}`;
    if (this.edgeKeys.has(key)) return;
    this.edgeKeys.add(key);

    const edge: KGEdge = { sourceId, targetId, type, weight };
    this.edges.push(edge);
    this.adjacencyList(sourceId, type, 'out').push(edge);
    this.adjacencyList(targetId, type, 'in').push(edge);
  }

  private adjacencyList(id: string, type: EdgeType, direction: EdgeDirection): KGEdge[] {
    const key = `${id}\u0000${type}\u0000${direction}`;
    let list = this.adjacency.get(key);
    if (!list) {
      list = [];
      this.adjacency.set(key, list);
    }
    return list;
  }

  // ═══════════════════════════════════════════════════
  //  Queries
  // ═══════════════════════════════════════════════════

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): KGNode {
    const node = this.nodes.get(id);
    if (!node) throw new NotFoundError(id);
    return node;
  }

  getBehavior(id: string): BehaviorNode {
    const node = this.getNode(id);
    if (!isNodeOfType(node, 'BEHAVIOR')) {
      throw new QAError(`Node ${id} is a ${node.type}, not a BEHAVIOR`, ErrorCode.INVALID_QUERY, { context: { id } });
    }
    return node;
  }

  /** Nodes at the other end of `id`'s edges of one type, in insertion order. */
  neighbors(id: string, edgeType: EdgeType, direction: EdgeDirection = 'out'): KGNode[] {
    this.getNode(id);
    return this.edgesOf(id, edgeType, direction).map((edge) =>
      this.getNode(direction === 'out' ? edge.targetId : edge.sourceId),
    );
  }

  edgesOf(id: string, edgeType: EdgeType, direction: EdgeDirection = 'out'): readonly KGEdge[] {
    return this.adjacency.get(`${id}\u0000${edgeType}\u0000${direction}`) ?? [];
  }

  /** SIMILAR_TO neighbors by weight descending, ties by id ascending. */
  similarBehaviors(id: string, limit = 5): SimilarBehavior[] {
    this.getNode(id);
    const similar: SimilarBehavior[] = [];
    for (const edge of this.edgesOf(id, 'SIMILAR_TO', 'out')) {
      const node = this.getNode(edge.targetId);
      if (isNodeOfType(node, 'BEHAVIOR')) similar.push({ node, weight: edge.weight });
    }
    similar.sort((a, b) => b.weight - a.weight || (a.node.id < b.node.id ? -1 : a.node.id > b.node.id ? 1 : 0));
    return similar.slice(0, Math.max(0, limit));
  }

  findNodesByType<T extends NodeType>(type: T): NodeOfType<T>[] {
    const out: NodeOfType<T>[] = [];
    for (const node of this.nodes.values()) {
      if (isNodeOfType(node, type)) out.push(node);
    }
    return out;
  }

  /** Behavior → penalties → laws and measures. */
  getBehaviorChain(behaviorId: string): BehaviorChain {
    const behavior = this.getBehavior(behaviorId);
    const chain: BehaviorChain = { behavior, penalties: [], lawArticles: [], additionalMeasures: [] };

    for (const penalty of this.neighbors(behaviorId, 'LEADS_TO_PENALTY')) {
      if (!isNodeOfType(penalty, 'PENALTY')) continue;
      chain.penalties.push(penalty);
      for (const law of this.neighbors(penalty.id, 'BASED_ON_LAW')) {
        if (isNodeOfType(law, 'LAW_ARTICLE')) chain.lawArticles.push(law);
      }
      for (const measure of this.neighbors(penalty.id, 'HAS_ADDITIONAL')) {
        if (isNodeOfType(measure, 'ADDITIONAL_MEASURE')) chain.additionalMeasures.push(measure);
      }
    }
    return chain;
  }

  getStatistics(): KGStats {
    const nodeTypes = emptyNodeCounts();
    const edgeTypes = emptyEdgeCounts();
    for (const node of this.nodes.values()) nodeTypes[node.type]++;
    for (const edge of this.edges) edgeTypes[edge.type]++;

    const totalNodes = this.nodes.size;
    const totalEdges = this.edges.length;
    return {
      totalNodes,
      totalEdges,
      nodeTypes,
      edgeTypes,
      density: totalNodes > 1 ? totalEdges / (totalNodes * (totalNodes - 1)) : 0,
      averageDegree: totalNodes > 0 ? (2 * totalEdges) / totalNodes : 0,
    };
  }

  /** JSON-serializable snapshot of the whole graph. */
  exportGraph(): KGExport {
    const stats = this.getStatistics();
    return {
      metadata: {
        exportedAt: new Date().toISOString(),
        totalNodes: stats.totalNodes,
        totalEdges: stats.totalEdges,
        nodeTypes: stats.nodeTypes,
      },
      // Copies: callers may not reach the live arena through an export
      nodes: [...this.nodes.values()].map((node) => structuredClone(node)),
      edges: this.edges.map((edge) => ({ ...edge })),
    };
  }
}
