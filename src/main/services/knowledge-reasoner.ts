/**
 * KnowledgeReasoner: expands matched behaviors into reasoning paths.
 *
 * For every candidate a depth-first walk starts at the BEHAVIOR node and
 * follows only the edge types that lead to the node types the intent asks
 * for. similar_cases uses the precomputed SIMILAR_TO neighbors instead.
 * Candidates are then reordered so that, among equally similar behaviors,
 * those applying to the vehicle named in the question come first.
 */

import { createLogger } from './logger';
import type { KnowledgeGraphService } from './knowledge-graph-service';
import type { EdgeType, NodeType } from '../../shared/types/knowledge-graph';
import type {
  EntityAgreement,
  ExtractedEntities,
  IntentType,
  MatchCandidate,
  PathStep,
  ReasoningPath,
} from '../../shared/types/query';

const log = createLogger('KnowledgeReasoner');

export interface IntentGoal {
  /** Types that must be reached for the path to be complete */
  required: NodeType[];
  /** Types collected when reachable */
  optional: NodeType[];
  /** Answer from SIMILAR_TO neighbors instead of walking the chain */
  similar?: boolean;
}

export const INTENT_GOALS: Readonly<Record<IntentType, IntentGoal>> = {
  // A behavior without measures still fully answers a penalty question
  penalty_inquiry: { required: ['PENALTY'], optional: ['ADDITIONAL_MEASURE', 'LAW_ARTICLE'] },
  law_reference: { required: ['LAW_ARTICLE'], optional: ['PENALTY'] },
  additional_measures: { required: ['ADDITIONAL_MEASURE'], optional: ['PENALTY', 'LAW_ARTICLE'] },
  behavior_check: {
    required: ['PENALTY', 'LAW_ARTICLE'],
    optional: ['ADDITIONAL_MEASURE', 'VEHICLE_TYPE', 'VIOLATION_CONTEXT'],
  },
  general_info: {
    required: ['PENALTY'],
    optional: ['LAW_ARTICLE', 'ADDITIONAL_MEASURE', 'VEHICLE_TYPE', 'VIOLATION_CONTEXT'],
  },
  similar_cases: { required: [], optional: [], similar: true },
};

/** Edge types on the way from a behavior to each target type */
const EDGES_TO_TARGET: Readonly<Record<Exclude<NodeType, 'BEHAVIOR'>, EdgeType[]>> = {
  PENALTY: ['LEADS_TO_PENALTY'],
  LAW_ARTICLE: ['LEADS_TO_PENALTY', 'BASED_ON_LAW'],
  ADDITIONAL_MEASURE: ['LEADS_TO_PENALTY', 'HAS_ADDITIONAL'],
  VEHICLE_TYPE: ['APPLIES_TO_VEHICLE'],
  VIOLATION_CONTEXT: ['IN_CONTEXT'],
};

/** Fixed traversal order, keeps paths deterministic */
const TRAVERSAL_ORDER: readonly EdgeType[] = [
  'LEADS_TO_PENALTY',
  'BASED_ON_LAW',
  'HAS_ADDITIONAL',
  'APPLIES_TO_VEHICLE',
  'IN_CONTEXT',
];

const AGREEMENT_RANK: Readonly<Record<EntityAgreement, number>> = {
  full: 3,
  partial: 2,
  not_applicable: 1,
  none: 0,
};

export interface KnowledgeReasonerOptions {
  maxDepth: number;
  rankingScoreDecimals: number;
  dropVehicleMismatches: boolean;
  similarLimit: number;
}

export class KnowledgeReasoner {
  constructor(
    private readonly graph: KnowledgeGraphService,
    private readonly options: KnowledgeReasonerOptions,
  ) {}

  /** One path per candidate, ranked. */
  reason(candidates: MatchCandidate[], intent: IntentType, entities: ExtractedEntities): ReasoningPath[] {
    const goal = INTENT_GOALS[intent];
    const queryVehicles = [...new Set(entities.VEHICLE.map((e) => e.value))];

    let paths = candidates.map((candidate) => this.buildPath(candidate, goal, queryVehicles));

    if (this.options.dropVehicleMismatches && paths.some((p) => p.agreement === 'full' || p.agreement === 'partial')) {
      paths = paths.filter((p) => p.agreement !== 'none');
    }

    const ranked = this.rank(paths);
    log.debug(`Reasoned ${ranked.length} paths for ${intent}`);
    return ranked;
  }

  /** Ordering: rounded score, vehicle agreement, raw score, id. */
  rank(paths: ReasoningPath[]): ReasoningPath[] {
    const factor = 10 ** this.options.rankingScoreDecimals;
    const rounded = (score: number): number => Math.round(score * factor) / factor;
    return [...paths].sort((a, b) => {
      const byRounded = rounded(b.score) - rounded(a.score);
      if (byRounded !== 0) return byRounded;
      const byAgreement = AGREEMENT_RANK[b.agreement] - AGREEMENT_RANK[a.agreement];
      if (byAgreement !== 0) return byAgreement;
      if (b.score !== a.score) return b.score - a.score;
      return a.behavior.id < b.behavior.id ? -1 : a.behavior.id > b.behavior.id ? 1 : 0;
    });
  }

  agreementOf(queryVehicles: string[], candidateVehicles: string[]): EntityAgreement {
    if (queryVehicles.length === 0 || candidateVehicles.length === 0) return 'not_applicable';
    const matching = queryVehicles.filter((v) => candidateVehicles.includes(v)).length;
    if (matching === queryVehicles.length) return 'full';
    return matching > 0 ? 'partial' : 'none';
  }

  private buildPath(candidate: MatchCandidate, goal: IntentGoal, queryVehicles: string[]): ReasoningPath {
    const behavior = this.graph.getBehavior(candidate.behaviorId);
    const vehicles: string[] = [];
    for (const node of this.graph.neighbors(behavior.id, 'APPLIES_TO_VEHICLE', 'out')) {
      if (node.type === 'VEHICLE_TYPE') vehicles.push(node.vehicle);
    }
    const agreement = this.agreementOf(queryVehicles, vehicles);
    const root: PathStep = { node: behavior, via: null, depth: 0 };

    if (goal.similar) {
      const similar = this.graph.similarBehaviors(behavior.id, this.options.similarLimit);
      const steps: PathStep[] = [
        root,
        ...similar.map(({ node, weight }): PathStep => ({ node, via: 'SIMILAR_TO', depth: 1, weight })),
      ];
      const complete = similar.length > 0;
      return {
        behavior,
        score: candidate.score,
        steps,
        requiredTypes: ['BEHAVIOR'],
        missingTypes: complete ? [] : ['BEHAVIOR'],
        complete,
        agreement,
        vehicles,
      };
    }

    const steps = this.walk(behavior.id, [...goal.required, ...goal.optional]);
    const reached = new Set(steps.map((s) => s.node.type));
    const missingTypes = goal.required.filter((type) => !reached.has(type));
    return {
      behavior,
      score: candidate.score,
      steps,
      requiredTypes: [...goal.required],
      missingTypes,
      complete: missingTypes.length === 0,
      agreement,
      vehicles,
    };
  }

  /**
   * Bounded depth-first walk over the edges relevant to the target types.
   * A visited set guards against revisiting shared nodes.
   */
  private walk(behaviorId: string, targets: NodeType[]): PathStep[] {
    const relevant = new Set<EdgeType>();
    for (const type of targets) {
      if (type !== 'BEHAVIOR') EDGES_TO_TARGET[type].forEach((edge) => relevant.add(edge));
    }
    const edgeOrder = TRAVERSAL_ORDER.filter((edge) => relevant.has(edge));

    const steps: PathStep[] = [{ node: this.graph.getNode(behaviorId), via: null, depth: 0 }];
    const visited = new Set<string>([behaviorId]);

    const visit = (id: string, depth: number): void => {
      if (depth >= this.options.maxDepth) return;
      for (const edgeType of edgeOrder) {
        for (const node of this.graph.neighbors(id, edgeType, 'out')) {
          if (visited.has(node.id)) continue;
          visited.add(node.id);
          steps.push({ node, via: edgeType, depth: depth + 1 });
          visit(node.id, depth + 1);
        }
      }
    };
    visit(behaviorId, 0);
    return steps;
  }
}
