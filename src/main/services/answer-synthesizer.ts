/**
 * AnswerSynthesizer: turns ranked reasoning paths into a confidence level and
 * a structured answer.
 *
 * Pure: the answer depends only on the paths, the detected intent and the
 * extracted entities. Nothing is rendered as HTML or Markdown; presentation
 * belongs to the consumer.
 */

import { isNodeOfType } from './knowledge-graph-service';
import type { ConfidenceThresholds } from '../../shared/schemas/config-schema';
import {
  LOW_CONFIDENCE_NOTICE,
  LOW_CONFIDENCE_SUGGESTIONS,
  NO_DATA_MESSAGE,
  NO_DATA_SUGGESTIONS,
} from '../../shared/constants';
import type {
  Citation,
  ConfidenceLevel,
  DetectedIntent,
  Entity,
  EntityAgreement,
  PenaltyInfo,
  QAAnswer,
  ReasoningPath,
  SimilarCase,
} from '../../shared/types/query';

export interface ConfidenceSignals {
  /** Top match score, null when no candidate cleared the matcher threshold */
  topScore: number | null;
  agreement: EntityAgreement;
  pathComplete: boolean;
}

export interface SynthesisInput {
  question: string;
  normalizedQuestion: string;
  intent: DetectedIntent;
  entities: Entity[];
  paths: ReasoningPath[];
}

export class AnswerSynthesizer {
  constructor(private readonly thresholds: ConfidenceThresholds) {}

  confidenceOf(signals: ConfidenceSignals): ConfidenceLevel {
    const { topScore, agreement, pathComplete } = signals;
    if (topScore === null) return 'NONE';

    const { high, medium } = this.thresholds;
    let level: ConfidenceLevel;
    if (topScore >= high && pathComplete) level = 'HIGH';
    else if (topScore >= medium && pathComplete) level = 'MEDIUM';
    else if (topScore >= high) level = 'MEDIUM';
    else level = 'LOW';

    // A vehicle the behavior does not cover weakens anything short of a strong match
    if (level === 'MEDIUM' && topScore < high && (agreement === 'partial' || agreement === 'none')) {
      level = 'LOW';
    }
    return level;
  }

  synthesize(input: SynthesisInput): QAAnswer {
    const [top, ...others] = input.paths;
    if (!top) return this.noData(input);

    const confidence = this.confidenceOf({
      topScore: top.score,
      agreement: top.agreement,
      pathComplete: top.complete,
    });

    let penalty: PenaltyInfo | null = null;
    const additionalMeasures: string[] = [];
    const citations: Citation[] = [];
    const similarCases: SimilarCase[] = [];

    for (const step of top.steps) {
      const node = step.node;
      if (isNodeOfType(node, 'PENALTY') && penalty === null) {
        penalty = { fineMin: node.fineMin, fineMax: node.fineMax, currency: node.currency, text: node.fineText };
      } else if (isNodeOfType(node, 'ADDITIONAL_MEASURE')) {
        additionalMeasures.push(node.measure);
      } else if (isNodeOfType(node, 'LAW_ARTICLE')) {
        citations.push({
          article: node.article,
          documentSource: node.documentSource,
          documentType: node.documentType,
          fullReference: node.fullReference,
        });
      } else if (isNodeOfType(node, 'BEHAVIOR') && step.via === 'SIMILAR_TO') {
        similarCases.push({
          behaviorId: node.id,
          description: node.description,
          category: node.category,
          weight: step.weight ?? 0,
        });
      }
    }

    const body =
      input.intent.type === 'similar_cases'
        ? this.similarMessage(top.behavior.description, similarCases)
        : this.chainMessage(top.behavior.description, penalty, additionalMeasures, citations);

    return {
      question: input.question,
      normalizedQuestion: input.normalizedQuestion,
      intent: input.intent,
      entities: input.entities,
      confidence,
      score: top.score,
      agreement: top.agreement,
      pathComplete: top.complete,
      missingTypes: [...top.missingTypes],
      behavior: {
        id: top.behavior.id,
        description: top.behavior.description,
        category: top.behavior.category,
        severity: top.behavior.severity,
      },
      penalty,
      additionalMeasures,
      citations,
      similarCases,
      relatedCandidates: others.map((path) => ({
        behaviorId: path.behavior.id,
        description: path.behavior.description,
        score: path.score,
        agreement: path.agreement,
      })),
      message: confidence === 'LOW' ? `${LOW_CONFIDENCE_NOTICE}\n${body}` : body,
      suggestions: confidence === 'LOW' ? [...LOW_CONFIDENCE_SUGGESTIONS] : [],
    };
  }

  /** Canonical refusal: no behavior, no penalty, no citation. */
  private noData(input: SynthesisInput): QAAnswer {
    return {
      question: input.question,
      normalizedQuestion: input.normalizedQuestion,
      intent: input.intent,
      entities: input.entities,
      confidence: 'NONE',
      score: null,
      agreement: 'not_applicable',
      pathComplete: false,
      missingTypes: [],
      behavior: null,
      penalty: null,
      additionalMeasures: [],
      citations: [],
      similarCases: [],
      relatedCandidates: [],
      message: NO_DATA_MESSAGE,
      suggestions: [...NO_DATA_SUGGESTIONS],
    };
  }

  private chainMessage(
    description: string,
    penalty: PenaltyInfo | null,
    measures: string[],
    citations: Citation[],
  ): string {
    const lines = [`Hành vi: ${description}`];
    if (penalty) lines.push(`Mức phạt: ${penalty.text}`);
    if (measures.length > 0) lines.push(`Biện pháp bổ sung: ${measures.join('; ')}`);
    if (citations.length > 0) lines.push(`Căn cứ pháp lý: ${citations.map((c) => c.fullReference).join('; ')}`);
    return lines.join('\n');
  }

  private similarMessage(description: string, similar: SimilarCase[]): string {
    if (similar.length === 0) return `Không tìm thấy hành vi tương tự với: ${description}`;
    return [`Các hành vi tương tự với: ${description}`, ...similar.map((s) => s.description)].join('\n');
  }
}
