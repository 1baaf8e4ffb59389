import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

import {
  KnowledgeGraphService,
  formatAmount,
  formatFineRange,
  jaccard,
} from '../src/main/services/knowledge-graph-service';
import { GraphBuildError, NotFoundError, QAError } from '../src/shared/types/errors';
import { NODE_TYPES } from '../src/shared/types/knowledge-graph';
import { TEST_RECORDS, cloneRecords, createGraph } from './helpers/fixtures';

describe('KnowledgeGraphService', () => {
  let graph: KnowledgeGraphService;

  beforeEach(() => {
    graph = createGraph().graph;
  });

  // ─── Helpers ───

  describe('formatting', () => {
    it('groups thousands with dots', () => {
      expect(formatAmount(1500000)).toBe('1.500.000');
      expect(formatAmount(800)).toBe('800');
    });

    it.each<[number, number, string]>([
      [0, 0, 'Chưa xác định'],
      [200000, 200000, 'Phạt tiền 200.000 VNĐ'],
      [800000, 1000000, 'Phạt tiền từ 800.000 đến 1.000.000 VNĐ'],
    ])('formats %d–%d', (min, max, expected) => {
      expect(formatFineRange(min, max, 'VNĐ')).toBe(expected);
    });

    it('computes Jaccard similarity', () => {
      expect(jaccard(new Set(['a', 'b']), new Set(['b', 'c']))).toBe(1 / 3);
      expect(jaccard(new Set(), new Set(['a']))).toBe(0);
    });
  });

  // ─── Build ───

  describe('build', () => {
    it('creates the expected nodes and edges', () => {
      const stats = graph.getStatistics();
      expect(stats.nodeTypes).toEqual({
        BEHAVIOR: 7,
        PENALTY: 7,
        LAW_ARTICLE: 6,
        ADDITIONAL_MEASURE: 2,
        VEHICLE_TYPE: 3,
        VIOLATION_CONTEXT: 5,
      });
      expect(stats.edgeTypes).toEqual({
        LEADS_TO_PENALTY: 7,
        BASED_ON_LAW: 7,
        HAS_ADDITIONAL: 3,
        APPLIES_TO_VEHICLE: 6,
        IN_CONTEXT: 8,
        SIMILAR_TO: 8,
      });
      expect(stats.totalNodes).toBe(30);
      expect(stats.totalEdges).toBe(39);
      expect(stats.averageDegree).toBe(78 / 30);
      expect(stats.density).toBe(39 / (30 * 29));
    });

    it('gives every behavior exactly one penalty and every penalty a law', () => {
      for (const behavior of graph.findNodesByType('BEHAVIOR')) {
        const penalties = graph.neighbors(behavior.id, 'LEADS_TO_PENALTY');
        expect(penalties).toHaveLength(1);
        expect(graph.neighbors(penalties[0].id, 'BASED_ON_LAW').length).toBeGreaterThanOrEqual(1);
      }
    });

    it('shares one law node between records citing the same article', () => {
      const laws = graph.findNodesByType('LAW_ARTICLE').filter((n) => n.article === 'Điều 6 khoản 2 điểm i');
      expect(laws).toHaveLength(1);
      expect(laws[0].documentType).toBe('Nghị định');
      expect(laws[0].fullReference).toBe('Điều 6 khoản 2 điểm i Nghị định 100/2019/NĐ-CP');
      expect(graph.neighbors(laws[0].id, 'BASED_ON_LAW', 'in').map((n) => n.id)).toEqual([
        'penalty:mc-no-helmet',
        'penalty:mc-passenger-no-helmet',
      ]);
    });

    it('formats the fine text when the record has none', () => {
      const penalty = graph.getNode('penalty:mc-red-light');
      expect(penalty.type === 'PENALTY' && penalty.fineText).toBe('Phạt tiền từ 800.000 đến 1.000.000 VNĐ');
    });

    it('keeps a supplied fine text', () => {
      const records = cloneRecords();
      const [first] = records;
      if (first.penalty) first.penalty.fineText = ' Phạt tiền 1 triệu ';
      const built = createGraph(records).graph;
      const penalty = built.getNode('penalty:mc-red-light');
      expect(penalty.type === 'PENALTY' && penalty.fineText).toBe('Phạt tiền 1 triệu');
    });

    it('links categories to vehicles and keyword tags to contexts', () => {
      expect(graph.neighbors('behavior:mc-red-light', 'APPLIES_TO_VEHICLE').map((n) => n.id)).toEqual([
        'vehicle:motorcycle',
      ]);
      expect(graph.neighbors('behavior:mc-passenger-no-helmet', 'IN_CONTEXT').map((n) => n.id)).toEqual([
        'context:helmet',
        'context:passenger',
      ]);
      expect(graph.neighbors('behavior:alcohol', 'APPLIES_TO_VEHICLE')).toEqual([]);
      expect(graph.neighbors('behavior:alcohol', 'IN_CONTEXT').map((n) => n.id)).toEqual(['context:alcohol']);
    });

    it('is idempotent', () => {
      const first = graph.exportGraph();
      graph.build(TEST_RECORDS);
      const second = graph.exportGraph();
      expect(second.nodes).toEqual(first.nodes);
      expect(second.edges).toEqual(first.edges);
    });

    it('builds an empty graph from an empty corpus', () => {
      const stats = createGraph([]).graph.getStatistics();
      expect(stats.totalNodes).toBe(0);
      expect(stats.density).toBe(0);
      expect(stats.averageDegree).toBe(0);
    });
  });

  // ─── Validation ───

  describe('validation', () => {
    it('rejects duplicate ids', () => {
      const records = [...cloneRecords(), cloneRecords()[0]];
      expect(() => graph.build(records)).toThrow(GraphBuildError);
    });

    it('rejects a record without a penalty', () => {
      const records = cloneRecords();
      records[2].penalty = null;
      expect(() => graph.build(records)).toThrow('Violation "car-red-light" has no penalty');
    });

    it('rejects an empty description', () => {
      const records = cloneRecords();
      records[0].description = '   ';
      expect(() => graph.build(records)).toThrow(GraphBuildError);
    });

    it('rejects an inverted fine range', () => {
      const records = cloneRecords();
      records[0].penalty = { fineMin: 5, fineMax: 1, currency: 'VNĐ' };
      expect(() => graph.build(records)).toThrow(GraphBuildError);
    });

    it('rejects an unknown category', () => {
      const records = cloneRecords();
      records[0].category = 'Tàu hỏa';
      expect(() => graph.build(records)).toThrow(GraphBuildError);
    });

    it('leaves the previous graph intact when a build fails', () => {
      const records = cloneRecords();
      records[1].penalty = null;
      expect(() => graph.build(records)).toThrow(GraphBuildError);
      expect(graph.isBuilt()).toBe(true);
      expect(graph.getStatistics().totalNodes).toBe(30);
    });
  });

  // ─── Similarity ───

  describe('SIMILAR_TO', () => {
    it('is symmetric with equal weights', () => {
      const edges = graph.exportGraph().edges.filter((e) => e.type === 'SIMILAR_TO');
      expect(edges.length).toBeGreaterThan(0);
      for (const edge of edges) {
        const reverse = graph.edgesOf(edge.targetId, 'SIMILAR_TO').find((e) => e.targetId === edge.sourceId);
        expect(reverse?.weight).toBe(edge.weight);
      }
    });

    it('orders similar behaviors by weight', () => {
      expect(graph.similarBehaviors('behavior:car-red-light').map((s) => [s.node.id, s.weight])).toEqual([
        ['behavior:pedestrian-red-light', 11 / 13],
        ['behavior:mc-red-light', 13 / 17],
      ]);
    });

    it('honours the limit', () => {
      expect(graph.similarBehaviors('behavior:mc-red-light', 1).map((s) => s.node.id)).toEqual([
        'behavior:car-red-light',
      ]);
    });

    it('drops pairs below the edge threshold', () => {
      const { preprocessor, taxonomy } = createGraph();
      const strict = new KnowledgeGraphService(preprocessor, taxonomy, { similarityEdgeThreshold: 0.8 });
      strict.build(TEST_RECORDS);
      expect(strict.getStatistics().edgeTypes.SIMILAR_TO).toBe(2);
    });

    it('drops a pair whose similarity equals the edge threshold', () => {
      const { preprocessor, taxonomy } = createGraph();
      const atWeight = new KnowledgeGraphService(preprocessor, taxonomy, { similarityEdgeThreshold: 11 / 13 });
      atWeight.build(TEST_RECORDS);
      expect(atWeight.similarBehaviors('behavior:car-red-light')).toEqual([]);
      expect(atWeight.getStatistics().edgeTypes.SIMILAR_TO).toBe(0);
    });
  });

  // ─── Queries ───

  describe('queries', () => {
    it('throws NotFoundError for unknown ids', () => {
      expect(() => graph.getNode('behavior:missing')).toThrow(NotFoundError);
      expect(() => graph.neighbors('behavior:missing', 'LEADS_TO_PENALTY')).toThrow(NotFoundError);
    });

    it('refuses to treat other nodes as behaviors', () => {
      expect(() => graph.getBehavior('penalty:mc-red-light')).toThrow(QAError);
    });

    it('returns the penalty chain of a behavior', () => {
      const chain = graph.getBehaviorChain('behavior:mc-red-light');
      expect(chain.penalties.map((p) => p.id)).toEqual(['penalty:mc-red-light']);
      expect(chain.lawArticles.map((l) => l.article)).toEqual(['Điều 6 khoản 4 điểm e']);
      expect(chain.additionalMeasures.map((m) => m.measure)).toEqual([
        'Tước quyền sử dụng giấy phép lái xe từ 01 tháng đến 03 tháng',
      ]);
    });

    it('shares measure nodes between records', () => {
      const [measure] = graph.getBehaviorChain('behavior:car-red-light').additionalMeasures;
      expect(graph.neighbors(measure.id, 'HAS_ADDITIONAL', 'in').map((n) => n.id)).toEqual([
        'penalty:mc-red-light',
        'penalty:car-red-light',
      ]);
    });

    it('exports every node type', () => {
      const exported = graph.exportGraph();
      expect(exported.metadata.totalNodes).toBe(30);
      expect(new Set(exported.nodes.map((n) => n.type))).toEqual(new Set(NODE_TYPES));
    });

    it('exports copies that do not write back into the graph', () => {
      const exported = graph.exportGraph();
      for (const node of exported.nodes) {
        if (node.type === 'PENALTY') node.fineText = 'altered';
        if (node.type === 'BEHAVIOR') node.keywords.push('altered');
      }

      const penalty = graph.getNode('penalty:mc-red-light');
      expect(penalty.type === 'PENALTY' && penalty.fineText).toBe('Phạt tiền từ 800.000 đến 1.000.000 VNĐ');
      expect(graph.getBehavior('behavior:mc-red-light').keywords).not.toContain('altered');
      expect(graph.exportGraph().nodes).not.toEqual(exported.nodes);
    });
  });
});
