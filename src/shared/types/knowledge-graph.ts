/**
 * Knowledge Graph types: violations, penalties and the legal basis behind them.
 * Nodes = behaviors, penalties, law articles, measures, vehicles, contexts.
 * Edges = typed, directed links built once from the violation corpus.
 */

// ─── Node Types ───

export type NodeType =
  | 'BEHAVIOR'
  | 'PENALTY'
  | 'LAW_ARTICLE'
  | 'ADDITIONAL_MEASURE'
  | 'VEHICLE_TYPE'
  | 'VIOLATION_CONTEXT';

export const NODE_TYPES: readonly NodeType[] = [
  'BEHAVIOR',
  'PENALTY',
  'LAW_ARTICLE',
  'ADDITIONAL_MEASURE',
  'VEHICLE_TYPE',
  'VIOLATION_CONTEXT',
];

interface BaseNode {
  /** Unique within the graph */
  id: string;
  /** Display text */
  text: string;
}

export interface BehaviorNode extends BaseNode {
  type: 'BEHAVIOR';
  recordId: string;
  description: string;
  category: string;
  severity: string;
  /** Record concept tags followed by description tokens */
  keywords: string[];
}

export interface PenaltyNode extends BaseNode {
  type: 'PENALTY';
  fineMin: number;
  fineMax: number;
  currency: string;
  fineText: string;
}

export type LegalDocumentType = 'Nghị định' | 'Luật' | 'Thông tư' | 'Khác';

export interface LawArticleNode extends BaseNode {
  type: 'LAW_ARTICLE';
  article: string;
  documentSource: string;
  documentType: LegalDocumentType;
  fullReference: string;
}

export interface AdditionalMeasureNode extends BaseNode {
  type: 'ADDITIONAL_MEASURE';
  measure: string;
}

export interface VehicleTypeNode extends BaseNode {
  type: 'VEHICLE_TYPE';
  /** Canonical vehicle id, e.g. `motorcycle` */
  vehicle: string;
}

export interface ViolationContextNode extends BaseNode {
  type: 'VIOLATION_CONTEXT';
  /** Canonical context id, e.g. `traffic_light` */
  context: string;
}

export type KGNode =
  | BehaviorNode
  | PenaltyNode
  | LawArticleNode
  | AdditionalMeasureNode
  | VehicleTypeNode
  | ViolationContextNode;

/** Narrow a node union member by its type tag */
export type NodeOfType<T extends NodeType> = Extract<KGNode, { type: T }>;

// ─── Edge Types ───

export type EdgeType =
  | 'LEADS_TO_PENALTY'
  | 'BASED_ON_LAW'
  | 'HAS_ADDITIONAL'
  | 'APPLIES_TO_VEHICLE'
  | 'IN_CONTEXT'
  | 'SIMILAR_TO';

export const EDGE_TYPES: readonly EdgeType[] = [
  'LEADS_TO_PENALTY',
  'BASED_ON_LAW',
  'HAS_ADDITIONAL',
  'APPLIES_TO_VEHICLE',
  'IN_CONTEXT',
  'SIMILAR_TO',
];

export type EdgeDirection = 'out' | 'in';

export interface KGEdge {
  sourceId: string;
  targetId: string;
  type: EdgeType;
  /** Pairwise similarity for SIMILAR_TO, 1 for every other edge */
  weight: number;
}

// ─── Input records ───

export interface ViolationPenalty {
  fineMin: number;
  fineMax: number;
  currency: string;
  fineText?: string;
}

export interface LegalBasis {
  /** e.g. "Điều 7 khoản 4 điểm a" */
  article: string;
  /** e.g. "Nghị định 100/2019/NĐ-CP" */
  document: string;
  fullReference?: string;
}

/** One normalized violation, produced by the ETL collaborator. */
export interface ViolationRecord {
  id: string;
  description: string;
  category: string;
  /** Null when the source row carried no penalty (rejected at build time) */
  penalty: ViolationPenalty | null;
  additionalMeasures: string[];
  legalBasis: LegalBasis;
  severity: string;
  keywords: string[];
}

// ─── Query results ───

export interface SimilarBehavior {
  node: BehaviorNode;
  weight: number;
}

export interface BehaviorChain {
  behavior: BehaviorNode;
  penalties: PenaltyNode[];
  lawArticles: LawArticleNode[];
  additionalMeasures: AdditionalMeasureNode[];
}

export interface KGStats {
  totalNodes: number;
  totalEdges: number;
  nodeTypes: Record<NodeType, number>;
  edgeTypes: Record<EdgeType, number>;
  density: number;
  averageDegree: number;
}

export interface KGExport {
  metadata: {
    exportedAt: string;
    totalNodes: number;
    totalEdges: number;
    nodeTypes: Record<NodeType, number>;
  };
  nodes: KGNode[];
  edges: KGEdge[];
}
